/**
 * Canonical in-memory measurement record
 */

/** A single field value. Objects and arrays are flattened away before a record is built. */
export type FieldValue = number | string | boolean;

/** Field map of a record, keyed by flattened field name */
export type FieldMap = Readonly<Record<string, FieldValue>>;

/**
 * One measurement batch: every field a source reported for a measurement at one instant.
 * Records are frozen on creation and never mutated.
 */
export interface TelemetryRecord {
  /** Where the record came from (the bus topic for relayed events) */
  readonly source: string;
  /** Measurement name (the event key) */
  readonly measurement: string;
  /** Unix timestamp in milliseconds */
  readonly timestamp: number;
  /** Field values by name */
  readonly fields: FieldMap;
}

/** Input accepted by {@link createRecord} */
export interface RecordInit {
  source: string;
  measurement: string;
  timestamp: number;
  fields: Record<string, FieldValue>;
}

/** Separator between the measurement and field part of a metric name */
export const METRIC_SEPARATOR = '/';

/**
 * Build an immutable record. The field map is copied so later changes to the
 * caller's object cannot leak into the record.
 */
export function createRecord(init: RecordInit): TelemetryRecord {
  return Object.freeze({
    source: init.source,
    measurement: init.measurement,
    timestamp: init.timestamp,
    fields: Object.freeze({ ...init.fields }),
  });
}

/** Metric name of a record field: `measurement/field` */
export function metricName(measurement: string, field: string): string {
  return `${measurement}${METRIC_SEPARATOR}${field}`;
}

/**
 * Split a metric name into measurement and field at the first separator.
 * Returns null when the name has no field part.
 */
export function splitMetricName(metric: string): { measurement: string; field: string } | null {
  const index = metric.indexOf(METRIC_SEPARATOR);
  if (index <= 0 || index === metric.length - 1) return null;
  return { measurement: metric.slice(0, index), field: metric.slice(index + 1) };
}

export function isFieldValue(value: unknown): value is FieldValue {
  return (
    (typeof value === 'number' && Number.isFinite(value)) ||
    typeof value === 'string' ||
    typeof value === 'boolean'
  );
}

/**
 * Numeric view of a field value: booleans become 1/0, numeric strings are parsed,
 * anything else is null.
 */
export function toNumeric(value: FieldValue): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value.trim() === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Stable ascending sort by timestamp. Records sharing a timestamp keep their input order.
 */
export function sortByTimestamp<T extends { readonly timestamp: number }>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => a.timestamp - b.timestamp);
}
