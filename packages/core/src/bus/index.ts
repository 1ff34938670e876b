export {
  isValidTopicFilter,
  topicMatches,
  type BusPayload,
  type MessageBus,
  type MessageHandler,
} from './message-bus.js';

export {
  MemoryMessageBus,
  createMemoryMessageBus,
  type MemoryMessageBusConfig,
  type PublishedMessage,
} from './memory-bus.js';
