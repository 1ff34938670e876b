/**
 * Decoding of history event messages into telemetry records.
 *
 * A message is one event or an array of events:
 *
 * ```json
 * { "key": "rack1", "data": { "cpu": { "load": 0.4 }, "fans": [1200, 1180] }, "timestamp": 1700000000 }
 * ```
 *
 * `data` is flattened into `/`-separated field names (`cpu/load`, `fans/0`, `fans/1`).
 * The key names the measurement and may not contain `/`, since metric names
 * are read back by splitting at the first one.
 */

import {
  DecodeError,
  type FieldValue,
  METRIC_SEPARATOR,
  type TelemetryRecord,
  createRecord,
  isFieldValue,
  parseDatetime,
  toError,
} from '@chronicle/core';
import { z } from 'zod';

const historyEventSchema = z.object({
  key: z
    .string()
    .min(1, 'key must not be empty')
    .refine((key) => !key.includes(METRIC_SEPARATOR), `key must not contain "${METRIC_SEPARATOR}"`),
  data: z.record(z.unknown()),
  timestamp: z.union([z.number(), z.string()]).optional(),
});

const batchSchema = z.array(historyEventSchema);

export type HistoryEvent = z.infer<typeof historyEventSchema>;

const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Flatten nested objects and arrays into `/`-separated paths. Object keys are
 * visited in sorted order, array elements by index. Values that are not
 * numbers, strings or booleans are dropped.
 */
export function flattenFields(data: Record<string, unknown>): Record<string, FieldValue> {
  const fields: Record<string, FieldValue> = {};
  visit(data, '', fields);
  return fields;
}

function visit(value: unknown, path: string, out: Record<string, FieldValue>): void {
  if (isFieldValue(value)) {
    if (path !== '') out[path] = value;
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => visit(item, join(path, String(index)), out));
    return;
  }

  if (typeof value === 'object' && value !== null) {
    for (const key of Object.keys(value).sort()) {
      visit(Reflect.get(value, key), join(path, key), out);
    }
  }
}

function join(path: string, key: string): string {
  return path === '' ? key : `${path}${METRIC_SEPARATOR}${key}`;
}

/**
 * Decode one bus message into records. The topic becomes the record source and
 * each event key a measurement. Events without usable fields yield no record.
 *
 * @throws DecodeError when the payload is not UTF-8 JSON shaped like a history
 *   event, or a timestamp cannot be read
 */
export function decodeHistoryMessage(
  topic: string,
  payload: Uint8Array | string,
  now: number = Date.now()
): TelemetryRecord[] {
  let text: string;
  try {
    text = typeof payload === 'string' ? payload : textDecoder.decode(payload);
  } catch (error) {
    throw new DecodeError(topic, 'Message payload is not UTF-8', toError(error), 'CHRONICLE_D101');
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    throw new DecodeError(topic, undefined, toError(error), 'CHRONICLE_D101');
  }

  const parsed = Array.isArray(json) ? batchSchema.safeParse(json) : historyEventSchema.safeParse(json);
  if (!parsed.success) {
    const summary = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw new DecodeError(topic, `Malformed message payload: ${summary}`);
  }

  const events = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  const records: TelemetryRecord[] = [];

  for (const event of events) {
    const timestamp = parseDatetime(event.timestamp);
    if (timestamp === null) {
      throw new DecodeError(topic, `Invalid event timestamp: ${String(event.timestamp)}`, undefined, 'CHRONICLE_D102');
    }

    const fields = flattenFields(event.data);
    if (Object.keys(fields).length === 0) continue;

    records.push(
      createRecord({
        source: topic,
        measurement: event.key,
        timestamp: timestamp ?? now,
        fields,
      })
    );
  }

  return records;
}
