/**
 * Time-series backend contract shared by the in-memory and VictoriaMetrics backends
 */

import type { FieldValue, TelemetryRecord } from '@chronicle/core';

/**
 * Backend-level query. Times are epoch milliseconds; the range is `[start, end)`.
 */
export interface BackendQuery {
  /** Metric selectors (measurement, `measurement/field` or `prefix*`) */
  readonly selectors: readonly string[];
  readonly start: number;
  /** Open ended when absent */
  readonly end?: number;
  /** Bucket size for averaged points; raw points when absent */
  readonly interval?: number;
}

/**
 * One value of one metric as returned by a backend. Downsampled rows carry the
 * bucket start as timestamp.
 */
export interface BackendRow {
  readonly source: string;
  /** `measurement/field` */
  readonly metric: string;
  readonly timestamp: number;
  readonly value: FieldValue;
}

/**
 * Storage for flushed records.
 *
 * Failures are reported by rejecting with a `BackendUnavailableError`.
 */
export interface TimeSeriesBackend {
  /** Persist a batch. Fails as a unit; partial success is never assumed. */
  write(records: readonly TelemetryRecord[]): Promise<void>;

  /** Read rows for a query, in no particular order */
  query(query: BackendQuery): Promise<BackendRow[]>;

  /** Metric names with data at or after `start`, sorted */
  fields(start: number): Promise<string[]>;

  /** Resolve when the backend is reachable */
  ping(): Promise<void>;

  close(): Promise<void>;
}
