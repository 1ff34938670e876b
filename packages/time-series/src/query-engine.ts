/**
 * One-shot historical queries over the time-series backend.
 */

import {
  BackendUnavailableError,
  ChronicleError,
  DEFAULT_DURATION_MS,
  type FieldValue,
  type Logger,
  type QueryDescriptor,
  RecordMatcher,
  type TelemetryRecord,
  createQuietLogger,
  createRecord,
  splitMetricName,
  toError,
  validateQueryDescriptor,
} from '@chronicle/core';
import type { BackendQuery, BackendRow, TimeSeriesBackend } from './types.js';

export interface QueryEngineConfig {
  backend: TimeSeriesBackend;
  /** Span used when a descriptor has no start (default: 1 day) */
  defaultDurationMs?: number;
  logger?: Logger;
  /** Clock, for tests */
  now?: () => number;
}

/** Resolved query window */
export interface ResolvedRange {
  start: number;
  end?: number;
}

/**
 * Translates query descriptors into backend queries and shapes the rows into
 * records, ascending by timestamp.
 *
 * @example
 * ```typescript
 * const engine = createQueryEngine({ backend });
 * const records = await engine.query(
 *   createQueryDescriptor({ selectors: ['cpu/load'], range: { start: 0, end: 10 } })
 * );
 * ```
 */
export class QueryEngine {
  private readonly backend: TimeSeriesBackend;
  private readonly defaultDurationMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(config: QueryEngineConfig) {
    this.backend = config.backend;
    this.defaultDurationMs = config.defaultDurationMs ?? DEFAULT_DURATION_MS;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('query');
    this.now = config.now ?? Date.now;
  }

  /**
   * Run a descriptor against the backend. Read-only and idempotent.
   *
   * @throws ValidationError before any backend call for a malformed descriptor
   * @throws BackendUnavailableError when the backend fails
   */
  async query(descriptor: QueryDescriptor): Promise<TelemetryRecord[]> {
    validateQueryDescriptor(descriptor);

    const range = this.resolveRange(descriptor);
    const backendQuery: BackendQuery = {
      selectors: descriptor.selectors,
      start: range.start,
      ...(range.end !== undefined ? { end: range.end } : {}),
      ...(descriptor.interval !== undefined ? { interval: descriptor.interval } : {}),
    };

    const end = this.logger.time('query');
    const rows = await this.call(() => this.backend.query(backendQuery));
    const records = new RecordMatcher({ selectors: descriptor.selectors, range }).select(toRecords(rows));
    end({ selectors: descriptor.selectors.length, rows: rows.length, records: records.length });

    return records;
  }

  /** Metric names with data in the last `durationMs` */
  async fields(durationMs: number = this.defaultDurationMs): Promise<string[]> {
    return this.call(() => this.backend.fields(this.now() - durationMs));
  }

  /** @throws BackendUnavailableError when the backend is unreachable */
  async ping(): Promise<void> {
    await this.call(() => this.backend.ping());
  }

  /** Concrete window of a descriptor; a missing start counts back from end (or now) */
  resolveRange(descriptor: QueryDescriptor): ResolvedRange {
    const { start, end } = descriptor.range;
    return {
      start: start ?? (end ?? this.now()) - this.defaultDurationMs,
      ...(end !== undefined ? { end } : {}),
    };
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (ChronicleError.isCategory(error, 'backend')) throw error;
      const cause = toError(error);
      this.logger.warn('Backend call failed', { error: cause.message });
      throw new BackendUnavailableError('CHRONICLE_B202', cause.message, undefined, cause);
    }
  }
}

/**
 * Group rows sharing source, measurement and timestamp back into records,
 * in order of first appearance.
 */
export function toRecords(rows: Iterable<BackendRow>): TelemetryRecord[] {
  const groups = new Map<string, { source: string; measurement: string; timestamp: number; fields: Record<string, FieldValue> }>();

  for (const row of rows) {
    const name = splitMetricName(row.metric);
    if (!name) continue;

    const key = `${row.source}\u0000${name.measurement}\u0000${row.timestamp}`;
    let group = groups.get(key);
    if (!group) {
      group = { source: row.source, measurement: name.measurement, timestamp: row.timestamp, fields: {} };
      groups.set(key, group);
    }
    group.fields[name.field] = row.value;
  }

  return [...groups.values()].map((group) => createRecord(group));
}

export function createQueryEngine(config: QueryEngineConfig): QueryEngine {
  return new QueryEngine(config);
}
