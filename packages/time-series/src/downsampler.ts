/**
 * Bucketed averaging of backend rows.
 */

import { toNumeric } from '@chronicle/core';
import type { BackendRow } from './types.js';

export interface DownsampleConfig {
  /** Bucket size in milliseconds */
  interval: number;
  /** Bucket boundaries are aligned to this instant */
  origin: number;
}

/**
 * Average rows per source, metric and bucket. Non-numeric values are skipped;
 * booleans count as 1/0. Output is ordered by bucket, then by first appearance.
 */
export function downsample(rows: Iterable<BackendRow>, config: DownsampleConfig): BackendRow[] {
  const buckets = new Map<string, { row: BackendRow; sum: number; count: number }>();

  for (const row of rows) {
    const value = toNumeric(row.value);
    if (value === null) continue;

    const timestamp = bucketStart(row.timestamp, config);
    const key = `${row.source}\u0000${row.metric}\u0000${timestamp}`;
    const bucket = buckets.get(key);
    if (bucket) {
      bucket.sum += value;
      bucket.count++;
    } else {
      buckets.set(key, { row: { source: row.source, metric: row.metric, timestamp, value }, sum: value, count: 1 });
    }
  }

  const result: BackendRow[] = [];
  for (const { row, sum, count } of buckets.values()) {
    result.push({ ...row, value: sum / count });
  }

  return result.sort((a, b) => a.timestamp - b.timestamp);
}

/** Start of the bucket containing `timestamp` */
export function bucketStart(timestamp: number, config: DownsampleConfig): number {
  return config.origin + Math.floor((timestamp - config.origin) / config.interval) * config.interval;
}
