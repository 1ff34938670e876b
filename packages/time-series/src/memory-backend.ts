/**
 * In-memory time-series backend
 */

import {
  BackendUnavailableError,
  InternalError,
  RecordMatcher,
  type TelemetryRecord,
  metricName,
} from '@chronicle/core';
import { downsample } from './downsampler.js';
import type { BackendQuery, BackendRow, TimeSeriesBackend } from './types.js';

/**
 * Keeps every written record in write order. Used by tests and by gateways
 * started with `--backend memory`.
 *
 * Availability can be switched off to simulate an unreachable database:
 *
 * @example
 * ```typescript
 * const backend = createMemoryBackend();
 * backend.failNextWrites(1);          // next write rejects, later ones succeed
 * backend.setAvailable(false);        // every call rejects until switched back
 * ```
 */
export class MemoryTimeSeriesBackend implements TimeSeriesBackend {
  private readonly records: TelemetryRecord[] = [];
  private readonly batches: TelemetryRecord[][] = [];
  private available = true;
  private pendingFailures = 0;
  private closed = false;

  /** Successfully written batches, oldest first */
  get writes(): readonly (readonly TelemetryRecord[])[] {
    return this.batches;
  }

  /** Every stored record in write order */
  get stored(): readonly TelemetryRecord[] {
    return this.records;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  /** Make the next `count` writes fail */
  failNextWrites(count: number): void {
    this.pendingFailures = count;
  }

  async write(records: readonly TelemetryRecord[]): Promise<void> {
    this.assertOpen();
    if (!this.available || this.pendingFailures > 0) {
      this.pendingFailures = Math.max(this.pendingFailures - 1, 0);
      throw new BackendUnavailableError('CHRONICLE_B201', undefined, { records: records.length });
    }

    this.batches.push([...records]);
    this.records.push(...records);
  }

  async query(query: BackendQuery): Promise<BackendRow[]> {
    this.assertOpen();
    if (!this.available) {
      throw new BackendUnavailableError('CHRONICLE_B202');
    }

    const matcher = new RecordMatcher({
      selectors: query.selectors,
      range: { start: query.start, end: query.end },
    });

    const rows: BackendRow[] = [];
    for (const record of matcher.select(this.records)) {
      for (const [field, value] of Object.entries(record.fields)) {
        rows.push({
          source: record.source,
          metric: metricName(record.measurement, field),
          timestamp: record.timestamp,
          value,
        });
      }
    }

    return query.interval === undefined
      ? rows
      : downsample(rows, { interval: query.interval, origin: query.start });
  }

  async fields(start: number): Promise<string[]> {
    this.assertOpen();
    if (!this.available) {
      throw new BackendUnavailableError('CHRONICLE_B202');
    }

    const names = new Set<string>();
    for (const record of this.records) {
      if (record.timestamp < start) continue;
      for (const field of Object.keys(record.fields)) {
        names.add(metricName(record.measurement, field));
      }
    }
    return [...names].sort();
  }

  async ping(): Promise<void> {
    this.assertOpen();
    if (!this.available) {
      throw new BackendUnavailableError('CHRONICLE_B200');
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new InternalError('CHRONICLE_X901', 'Time-series backend is closed');
    }
  }
}

export function createMemoryBackend(): MemoryTimeSeriesBackend {
  return new MemoryTimeSeriesBackend();
}
