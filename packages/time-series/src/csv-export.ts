/**
 * CSV export of query results: one row per timestamp, one column per metric.
 */

import {
  type TelemetryRecord,
  matchesSelector,
  metricName,
  splitMetricName,
} from '@chronicle/core';

export const CSV_PRECISIONS = ['ns', 'ms', 's', 'ISO8601'] as const;

/** Unit of the `time` column */
export type CsvPrecision = (typeof CSV_PRECISIONS)[number];

/**
 * Escape a value for CSV output
 */
function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvTime(timestamp: number, precision: CsvPrecision): string {
  switch (precision) {
    case 'ns':
      return (BigInt(Math.round(timestamp)) * 1_000_000n).toString();
    case 's':
      return String(timestamp / 1000);
    case 'ISO8601':
      return new Date(timestamp).toISOString();
    case 'ms':
      return String(timestamp);
  }
}

/**
 * Column order of an export. A selector naming one metric always gets its
 * column, even without data; measurement and prefix selectors expand to the
 * metrics found, sorted.
 */
export function csvColumns(selectors: readonly string[], records: readonly TelemetryRecord[]): string[] {
  const found = new Map<string, { measurement: string; field: string }>();
  for (const record of records) {
    for (const field of Object.keys(record.fields)) {
      found.set(metricName(record.measurement, field), { measurement: record.measurement, field });
    }
  }

  const columns = new Set<string>();
  for (const selector of selectors) {
    if (!selector.endsWith('*') && splitMetricName(selector) !== null) {
      columns.add(selector);
      continue;
    }
    const matched = [...found]
      .filter(([, name]) => matchesSelector(selector, name.measurement, name.field))
      .map(([metric]) => metric)
      .sort();
    for (const metric of matched) columns.add(metric);
  }
  return [...columns];
}

/**
 * Lines of a CSV export, header first. `records` must be ascending by
 * timestamp, as the query engine returns them. Records of different sources
 * sharing a timestamp fill one row; a later value wins a shared cell.
 */
export function* toCsvLines(
  records: readonly TelemetryRecord[],
  selectors: readonly string[],
  precision: CsvPrecision = 'ms'
): Generator<string> {
  const columns = csvColumns(selectors, records);
  const index = new Map(columns.map((column, i) => [column, i]));
  yield ['time', ...columns].map(escapeCsvValue).join(',');

  let time: number | null = null;
  let row: string[] = [];
  for (const record of records) {
    if (record.timestamp !== time) {
      if (time !== null) yield [formatCsvTime(time, precision), ...row].join(',');
      time = record.timestamp;
      row = columns.map(() => '');
    }
    for (const [field, value] of Object.entries(record.fields)) {
      const i = index.get(metricName(record.measurement, field));
      if (i !== undefined) row[i] = escapeCsvValue(String(value));
    }
  }
  if (time !== null) yield [formatCsvTime(time, precision), ...row].join(',');
}
