/**
 * @chronicle/ingestion - from bus messages to flushed telemetry records
 *
 * @example
 * ```typescript
 * import { createEventRelay, createWriteBuffer } from '@chronicle/ingestion';
 *
 * const buffer = createWriteBuffer({ backend, flushIntervalMs: 1000 });
 * const relay = createEventRelay({ bus, sink: buffer });
 *
 * buffer.start();
 * await relay.start(['telemetry/history/#']);
 * ```
 */

export { decodeHistoryMessage, flattenFields, type HistoryEvent } from './payload-decoder.js';

export {
  WriteBuffer,
  createWriteBuffer,
  type BufferOverflowEvent,
  type FlushCompleted,
  type RecordSink,
  type WriteBufferConfig,
  type WriteBufferStats,
} from './write-buffer.js';

export {
  EventRelay,
  createEventRelay,
  type EventRelayConfig,
  type EventRelayStats,
} from './event-relay.js';

export { LatestValueCache, createLatestValueCache, type LatestValue } from './latest-value-cache.js';
