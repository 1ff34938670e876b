import { describe, expect, it, vi } from 'vitest';
import {
  BackendUnavailableError,
  ValidationError,
  createQueryDescriptor,
  createRecord,
  type QueryDescriptor,
} from '@chronicle/core';
import { createMemoryBackend } from '../memory-backend.js';
import { QueryEngine, toRecords } from '../query-engine.js';
import type { TimeSeriesBackend } from '../types.js';

function record(measurement: string, timestamp: number, fields: Record<string, number>, source = 'rack1') {
  return createRecord({ source, measurement, timestamp, fields });
}

describe('QueryEngine', () => {
  it('should return flushed records in timestamp order', async () => {
    const backend = createMemoryBackend();
    await backend.write([record('A', 1, { v: 1 }), record('A', 2, { v: 2 })]);
    const engine = new QueryEngine({ backend });

    const records = await engine.query(createQueryDescriptor({ selectors: ['A'], range: { start: 0, end: 10 } }));

    expect(records.map((r) => r.timestamp)).toEqual([1, 2]);
    expect(records[0]).toEqual(record('A', 1, { v: 1 }));
  });

  it('should keep write order for equal timestamps', async () => {
    const backend = createMemoryBackend();
    await backend.write([record('A', 5, { v: 1 }, 'x'), record('A', 3, { v: 2 }, 'y'), record('A', 5, { v: 3 }, 'z')]);
    const engine = new QueryEngine({ backend });

    const records = await engine.query(createQueryDescriptor({ selectors: ['A'], range: { start: 0 } }));

    expect(records.map((r) => r.source)).toEqual(['y', 'x', 'z']);
  });

  it('should be idempotent', async () => {
    const backend = createMemoryBackend();
    await backend.write([record('A', 1, { v: 1, w: 2 }), record('B', 2, { v: 3 })]);
    const engine = new QueryEngine({ backend });
    const descriptor = createQueryDescriptor({ selectors: ['A/v', 'B'], range: { start: 0, end: 10 } });

    const first = await engine.query(descriptor);
    const second = await engine.query(descriptor);

    expect(second).toEqual(first);
    expect(first.map((r) => r.fields)).toEqual([{ v: 1 }, { v: 3 }]);
  });

  it('should validate before calling the backend', async () => {
    const backend = createMemoryBackend();
    const spy = vi.spyOn(backend, 'query');
    const engine = new QueryEngine({ backend });
    const malformed: QueryDescriptor = { selectors: [], range: { start: 5, end: 1 } };

    await expect(engine.query(malformed)).rejects.toBeInstanceOf(ValidationError);
    expect(spy).not.toHaveBeenCalled();
  });

  it('should default the start to one duration before the end', () => {
    const engine = new QueryEngine({ backend: createMemoryBackend(), defaultDurationMs: 1000, now: () => 100_000 });

    expect(engine.resolveRange(createQueryDescriptor({ selectors: ['A'] }))).toEqual({ start: 99_000 });
    expect(engine.resolveRange(createQueryDescriptor({ selectors: ['A'], range: { end: 5000 } }))).toEqual({
      start: 4000,
      end: 5000,
    });
  });

  it('should average buckets when an interval is given', async () => {
    const backend = createMemoryBackend();
    await backend.write([record('A', 0, { v: 1 }), record('A', 4, { v: 3 }), record('A', 11, { v: 7 })]);
    const engine = new QueryEngine({ backend });

    const records = await engine.query(
      createQueryDescriptor({ selectors: ['A'], range: { start: 0, end: 20 }, interval: 10 })
    );

    expect(records).toEqual([record('A', 0, { v: 2 }), record('A', 10, { v: 7 })]);
  });

  it('should surface backend failures as retryable', async () => {
    const backend = createMemoryBackend();
    backend.setAvailable(false);
    const engine = new QueryEngine({ backend });

    const error = await engine.query(createQueryDescriptor({ selectors: ['A'] })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendUnavailableError);
    expect(error).toMatchObject({ retryable: true });
  });

  it('should wrap unexpected backend errors', async () => {
    const backend: TimeSeriesBackend = {
      write: async () => undefined,
      query: async () => {
        throw new Error('socket hang up');
      },
      fields: async () => [],
      ping: async () => undefined,
      close: async () => undefined,
    };
    const engine = new QueryEngine({ backend });

    await expect(engine.query(createQueryDescriptor({ selectors: ['A'] }))).rejects.toMatchObject({
      code: 'CHRONICLE_B202',
      message: 'socket hang up',
    });
  });

  it('should list fields for a trailing duration', async () => {
    const backend = createMemoryBackend();
    await backend.write([record('old', 500, { v: 1 }), record('new', 5000, { v: 1, w: 2 })]);
    const engine = new QueryEngine({ backend, now: () => 10_000 });

    expect(await engine.fields(6000)).toEqual(['new/v', 'new/w']);
  });

  it('should ping the backend', async () => {
    const backend = createMemoryBackend();
    const engine = new QueryEngine({ backend });
    await expect(engine.ping()).resolves.toBeUndefined();

    backend.setAvailable(false);
    await expect(engine.ping()).rejects.toBeInstanceOf(BackendUnavailableError);
  });
});

describe('toRecords', () => {
  it('should group rows by source, measurement and timestamp', () => {
    const records = toRecords([
      { source: 's', metric: 'cpu/load', timestamp: 1, value: 1 },
      { source: 's', metric: 'cpu/temp', timestamp: 1, value: 40 },
      { source: 't', metric: 'cpu/load', timestamp: 1, value: 2 },
      { source: 's', metric: 'invalid', timestamp: 1, value: 0 },
    ]);

    expect(records).toEqual([
      createRecord({ source: 's', measurement: 'cpu', timestamp: 1, fields: { load: 1, temp: 40 } }),
      createRecord({ source: 't', measurement: 'cpu', timestamp: 1, fields: { load: 2 } }),
    ]);
  });
});
