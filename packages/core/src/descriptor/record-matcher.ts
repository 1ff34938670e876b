/**
 * RecordMatcher - evaluates a query descriptor against in-memory records
 *
 * Used by the live query stream to filter freshly flushed records and by the
 * in-memory backend to answer queries, so both apply the same predicate.
 */

import { type FieldValue, type TelemetryRecord, createRecord, metricName, sortByTimestamp } from '../record/record.js';
import type { QueryDescriptor, TimeRange } from './query-descriptor.js';

const WILDCARD = '*';

/**
 * Test a single selector against a field.
 *
 * - `cpu` matches every field of measurement `cpu`
 * - `cpu/load` matches exactly that field
 * - `cpu/*` or `c*` matches every metric name with that prefix
 */
export function matchesSelector(selector: string, measurement: string, field: string): boolean {
  if (selector.endsWith(WILDCARD)) {
    return metricName(measurement, field).startsWith(selector.slice(0, -1));
  }
  return selector === measurement || selector === metricName(measurement, field);
}

/** Whether `timestamp` falls inside the half-open range */
export function inRange(range: TimeRange, timestamp: number): boolean {
  if (range.start !== undefined && timestamp < range.start) return false;
  if (range.end !== undefined && timestamp >= range.end) return false;
  return true;
}

/**
 * Matches records against the selectors and range of one descriptor.
 *
 * @example
 * ```typescript
 * const matcher = new RecordMatcher(createQueryDescriptor({ selectors: ['cpu/load'] }));
 * matcher.select(batch); // records projected to their cpu/load field, oldest first
 * ```
 */
export class RecordMatcher {
  private readonly selectors: readonly string[];
  private readonly range: TimeRange;

  constructor(descriptor: Pick<QueryDescriptor, 'selectors' | 'range'>) {
    this.selectors = descriptor.selectors;
    this.range = descriptor.range;
  }

  /** Whether any selector matches the field */
  matchesField(measurement: string, field: string): boolean {
    return this.selectors.some((selector) => matchesSelector(selector, measurement, field));
  }

  /**
   * Project a record onto the selected fields.
   * Returns null when the record is out of range or no field is selected.
   */
  project(record: TelemetryRecord): TelemetryRecord | null {
    if (!inRange(this.range, record.timestamp)) return null;

    const fields: Record<string, FieldValue> = {};
    let selected = 0;
    for (const [field, value] of Object.entries(record.fields)) {
      if (this.matchesField(record.measurement, field)) {
        fields[field] = value;
        selected++;
      }
    }

    if (selected === 0) return null;
    if (selected === Object.keys(record.fields).length) return record;
    return createRecord({ ...record, fields });
  }

  /** Project every record and return the matches in stable timestamp order */
  select(records: Iterable<TelemetryRecord>): TelemetryRecord[] {
    const matched: TelemetryRecord[] = [];
    for (const record of records) {
      const projected = this.project(record);
      if (projected) matched.push(projected);
    }
    return sortByTimestamp(matched);
  }
}
