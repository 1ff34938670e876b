import { describe, expect, it } from 'vitest';
import { BackendUnavailableError, ChronicleError, createRecord } from '@chronicle/core';
import { bucketStart, downsample } from '../downsampler.js';
import { MemoryTimeSeriesBackend, createMemoryBackend } from '../memory-backend.js';

function cpu(timestamp: number, load: number, source = 'rack1') {
  return createRecord({ source, measurement: 'cpu', timestamp, fields: { load } });
}

describe('MemoryTimeSeriesBackend', () => {
  it('should create via factory', () => {
    expect(createMemoryBackend()).toBeInstanceOf(MemoryTimeSeriesBackend);
  });

  it('should return raw rows for matching records', async () => {
    const backend = createMemoryBackend();
    await backend.write([
      cpu(1, 10),
      createRecord({ source: 'rack1', measurement: 'mem', timestamp: 2, fields: { free: 5 } }),
      cpu(20, 30),
    ]);

    const rows = await backend.query({ selectors: ['cpu'], start: 0, end: 10 });

    expect(rows).toEqual([{ source: 'rack1', metric: 'cpu/load', timestamp: 1, value: 10 }]);
  });

  it('should average rows per bucket when an interval is given', async () => {
    const backend = createMemoryBackend();
    await backend.write([cpu(0, 1), cpu(5, 3), cpu(12, 10), cpu(7, 8, 'rack2')]);

    const rows = await backend.query({ selectors: ['cpu/load'], start: 0, interval: 10 });

    expect(rows).toEqual([
      { source: 'rack1', metric: 'cpu/load', timestamp: 0, value: 2 },
      { source: 'rack2', metric: 'cpu/load', timestamp: 0, value: 8 },
      { source: 'rack1', metric: 'cpu/load', timestamp: 10, value: 10 },
    ]);
  });

  it('should fail the requested number of writes', async () => {
    const backend = createMemoryBackend();
    backend.failNextWrites(1);

    await expect(backend.write([cpu(1, 1)])).rejects.toBeInstanceOf(BackendUnavailableError);
    await backend.write([cpu(2, 2)]);

    expect(backend.writes).toEqual([[cpu(2, 2)]]);
  });

  it('should reject everything while unavailable', async () => {
    const backend = createMemoryBackend();
    backend.setAvailable(false);

    await expect(backend.ping()).rejects.toMatchObject({ code: 'CHRONICLE_B200' });
    await expect(backend.query({ selectors: ['cpu'], start: 0 })).rejects.toMatchObject({
      code: 'CHRONICLE_B202',
    });
    await expect(backend.write([cpu(1, 1)])).rejects.toMatchObject({ code: 'CHRONICLE_B201' });

    backend.setAvailable(true);
    await expect(backend.ping()).resolves.toBeUndefined();
  });

  it('should list metric names seen since a start', async () => {
    const backend = createMemoryBackend();
    await backend.write([
      cpu(1, 1),
      createRecord({ source: 's', measurement: 'mem', timestamp: 50, fields: { used: 1, free: 2 } }),
      cpu(60, 1),
    ]);

    expect(await backend.fields(10)).toEqual(['cpu/load', 'mem/free', 'mem/used']);
    expect(await backend.fields(100)).toEqual([]);
  });

  it('should refuse use after close', async () => {
    const backend = createMemoryBackend();
    await backend.close();
    await expect(backend.ping()).rejects.toBeInstanceOf(ChronicleError);
  });
});

describe('downsample', () => {
  it('should align buckets to the origin', () => {
    expect(bucketStart(25, { interval: 10, origin: 3 })).toBe(23);
    expect(bucketStart(3, { interval: 10, origin: 3 })).toBe(3);
  });

  it('should skip non-numeric values and count booleans', () => {
    const rows = downsample(
      [
        { source: 's', metric: 'pump/on', timestamp: 1, value: true },
        { source: 's', metric: 'pump/on', timestamp: 2, value: false },
        { source: 's', metric: 'pump/mode', timestamp: 3, value: 'auto' },
      ],
      { interval: 10, origin: 0 }
    );

    expect(rows).toEqual([{ source: 's', metric: 'pump/on', timestamp: 0, value: 0.5 }]);
  });
});
