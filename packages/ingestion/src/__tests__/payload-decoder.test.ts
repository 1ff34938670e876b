import { describe, expect, it } from 'vitest';
import { DecodeError, createQueryDescriptor, createRecord } from '@chronicle/core';
import { QueryEngine, createMemoryBackend } from '@chronicle/time-series';
import { decodeHistoryMessage, flattenFields } from '../payload-decoder.js';

const TOPIC = 'telemetry/history/rack1';
const NOW = 1_700_000_123_000;

function decodeError(fn: () => unknown): DecodeError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) return error;
    throw error;
  }
  throw new Error('expected a DecodeError');
}

describe('flattenFields', () => {
  it('should join nested keys with slashes in sorted order', () => {
    const fields = flattenFields({
      block1: {
        sensor1: {
          values: { value: 'val', other: 1 },
          settings: { setting: 'setting' },
        },
      },
    });

    expect(Object.entries(fields)).toEqual([
      ['block1/sensor1/settings/setting', 'setting'],
      ['block1/sensor1/values/other', 1],
      ['block1/sensor1/values/value', 'val'],
    ]);
  });

  it('should index arrays and drop unusable values', () => {
    expect(flattenFields({ fans: [1200, null, { rpm: 3 }], on: true, nothing: {} })).toEqual({
      'fans/0': 1200,
      'fans/2/rpm': 3,
      on: true,
    });
  });
});

describe('decodeHistoryMessage', () => {
  it('should decode a single event', () => {
    const payload = new TextEncoder().encode(
      '{"key":"rack1","data":{"cpu":{"load":0.4}},"timestamp":1700000000}'
    );

    expect(decodeHistoryMessage(TOPIC, payload, NOW)).toEqual([
      createRecord({ source: TOPIC, measurement: 'rack1', timestamp: 1_700_000_000_000, fields: { 'cpu/load': 0.4 } }),
    ]);
  });

  it('should stamp events without a timestamp with the receive time', () => {
    const [record] = decodeHistoryMessage(TOPIC, '{"key":"k","data":{"v":1}}', NOW);
    expect(record?.timestamp).toBe(NOW);
  });

  it('should read ISO-8601 timestamps', () => {
    const [record] = decodeHistoryMessage(TOPIC, '{"key":"k","data":{"v":1},"timestamp":"2024-01-01T00:00:00Z"}', NOW);
    expect(record?.timestamp).toBe(Date.UTC(2024, 0, 1));
  });

  it('should decode batches and skip events without fields', () => {
    const records = decodeHistoryMessage(
      TOPIC,
      JSON.stringify([
        { key: 'a', data: { v: 1 }, timestamp: 1_700_000_000_500 },
        { key: 'b', data: { nested: {} } },
        { key: 'c', data: { v: 'on' } },
      ]),
      NOW
    );

    expect(records.map((r) => [r.measurement, r.timestamp])).toEqual([
      ['a', 1_700_000_000_500],
      ['c', NOW],
    ]);
  });

  it('should ignore unknown top level properties', () => {
    const [record] = decodeHistoryMessage(TOPIC, '{"key":"k","data":{"v":1},"origin":"x"}', NOW);
    expect(record?.fields).toEqual({ v: 1 });
  });

  it('should reject payloads that are not JSON', () => {
    expect(decodeError(() => decodeHistoryMessage(TOPIC, 'not json', NOW)).code).toBe('CHRONICLE_D101');
    expect(decodeError(() => decodeHistoryMessage(TOPIC, new Uint8Array([0xff, 0xfe]), NOW)).code).toBe(
      'CHRONICLE_D101'
    );
  });

  it('should reject events of the wrong shape', () => {
    const error = decodeError(() => decodeHistoryMessage(TOPIC, '{"data":{"v":1}}', NOW));
    expect(error.code).toBe('CHRONICLE_D100');
    expect(error.message).toBe('Malformed message payload: key: Required');
    expect(error.topic).toBe(TOPIC);
  });

  it('should reject keys containing the metric separator', () => {
    const error = decodeError(() => decodeHistoryMessage(TOPIC, '{"key":"rack/1","data":{"load":1}}', NOW));
    expect(error.code).toBe('CHRONICLE_D100');
    expect(error.message).toBe('Malformed message payload: key: key must not contain "/"');
  });

  it('should produce records that read back unchanged from the backend', async () => {
    const records = decodeHistoryMessage(TOPIC, '{"key":"rack-1","data":{"cpu":{"load":1}}}', NOW);
    const backend = createMemoryBackend();
    await backend.write(records);
    const engine = new QueryEngine({ backend });

    const stored = await engine.query(createQueryDescriptor({ selectors: ['rack-1'], range: { start: 0 } }));

    expect(records).toEqual([
      createRecord({ source: TOPIC, measurement: 'rack-1', timestamp: NOW, fields: { 'cpu/load': 1 } }),
    ]);
    expect(stored).toEqual(records);
  });

  it('should reject unreadable timestamps', () => {
    const error = decodeError(() =>
      decodeHistoryMessage(TOPIC, '{"key":"k","data":{"v":1},"timestamp":"yesterday"}', NOW)
    );
    expect(error.code).toBe('CHRONICLE_D102');
  });
});
