// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Record model
export * from './record/index.js';

// Query descriptor
export * from './descriptor/index.js';

// Time frames
export * from './time/index.js';

// Message bus
export * from './bus/index.js';
