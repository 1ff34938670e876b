/**
 * @chronicle/time-series - storage and historical queries for telemetry records
 *
 * @example
 * ```typescript
 * import { createQueryDescriptor } from '@chronicle/core';
 * import { createQueryEngine, createVictoriaBackend } from '@chronicle/time-series';
 *
 * const backend = createVictoriaBackend({ url: 'http://victoria:8428/victoria' });
 * const engine = createQueryEngine({ backend });
 *
 * const records = await engine.query(
 *   createQueryDescriptor({ selectors: ['cpu/load'], range: { start: Date.now() - 60_000 } })
 * );
 * ```
 */

export type { BackendQuery, BackendRow, TimeSeriesBackend } from './types.js';

export { bucketStart, downsample, type DownsampleConfig } from './downsampler.js';

export { CSV_PRECISIONS, csvColumns, formatCsvTime, toCsvLines, type CsvPrecision } from './csv-export.js';

export { MemoryTimeSeriesBackend, createMemoryBackend } from './memory-backend.js';

export {
  VictoriaBackend,
  createVictoriaBackend,
  toLineProtocol,
  toSeriesSelector,
  type FetchLike,
  type VictoriaBackendConfig,
} from './victoria-backend.js';

export {
  QueryEngine,
  createQueryEngine,
  toRecords,
  type QueryEngineConfig,
  type ResolvedRange,
} from './query-engine.js';
