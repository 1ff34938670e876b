/**
 * Most recent numeric value per metric, fed by successful flushes.
 */

import type { Observable, Subscription } from 'rxjs';
import { type TelemetryRecord, metricName, toNumeric } from '@chronicle/core';
import type { FlushCompleted } from './write-buffer.js';

export interface LatestValue {
  /** `measurement/field` */
  readonly metric: string;
  readonly value: number;
  readonly timestamp: number;
}

/**
 * Keeps the newest value of every numeric or boolean field that was flushed.
 * A late record never replaces a newer value.
 */
export class LatestValueCache {
  private readonly values = new Map<string, LatestValue>();
  private subscription: Subscription | null = null;

  /** Follow a flush stream until {@link close} */
  attach(flushed$: Observable<FlushCompleted>): void {
    this.subscription?.unsubscribe();
    this.subscription = flushed$.subscribe((event) => this.update(event.records));
  }

  update(records: Iterable<TelemetryRecord>): void {
    for (const record of records) {
      for (const [field, raw] of Object.entries(record.fields)) {
        const value = toNumeric(raw);
        if (value === null) continue;

        const metric = metricName(record.measurement, field);
        const current = this.values.get(metric);
        if (current && current.timestamp > record.timestamp) continue;

        this.values.set(metric, { metric, value, timestamp: record.timestamp });
      }
    }
  }

  /** Cached values for the requested metrics, in request order; unknown names are skipped */
  get(metrics: Iterable<string>): LatestValue[] {
    const result: LatestValue[] = [];
    for (const metric of new Set(metrics)) {
      const value = this.values.get(metric);
      if (value) result.push(value);
    }
    return result;
  }

  get size(): number {
    return this.values.size;
  }

  close(): void {
    this.subscription?.unsubscribe();
    this.subscription = null;
  }
}

export function createLatestValueCache(): LatestValueCache {
  return new LatestValueCache();
}
