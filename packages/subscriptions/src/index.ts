/**
 * @chronicle/subscriptions - Live queries over flushed telemetry
 *
 * @example
 * ```typescript
 * import { createLiveQueryStream } from '@chronicle/subscriptions';
 *
 * const stream = createLiveQueryStream({ flushes: buffer.flushed$, history: engine });
 * stream.subscribe(descriptor, { push: (batch) => send(batch) });
 * ```
 *
 * @module @chronicle/subscriptions
 */

export * from './live-query-stream.js';
export * from './subscription-registry.js';
export type * from './types.js';
