import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { WebSocket } from 'ws';
import { InternalError, MemoryMessageBus, createQuietLogger } from '@chronicle/core';
import { MemoryTimeSeriesBackend } from '@chronicle/time-series';
import { loadConfig } from '../config.js';
import { Gateway } from '../gateway.js';

const NOW = 1_700_000_000_000;

const event = JSON.stringify({ key: 'cpu', data: { load: 0.5 }, timestamp: NOW });

const relayed = { source: 'telemetry/history/rack1', measurement: 'cpu', timestamp: NOW, fields: { load: 0.5 } };

describe('Gateway', () => {
  let bus: MemoryMessageBus;
  let backend: MemoryTimeSeriesBackend;
  let gateway: Gateway;
  let base: string;

  beforeEach(async () => {
    bus = new MemoryMessageBus();
    backend = new MemoryTimeSeriesBackend();
    const config = loadConfig({}, [
      '--host',
      '127.0.0.1',
      '--port',
      '0',
      '--datastore',
      'memory',
      '--flush-interval-ms',
      '60000',
    ]);
    gateway = new Gateway({ config, bus, backend, logger: createQuietLogger('test'), now: () => NOW });
    await gateway.start();
    base = `127.0.0.1:${gateway.port}`;
  });

  afterEach(async () => {
    await gateway.stop();
  });

  it('should persist relayed events and serve them over HTTP', async () => {
    await bus.publish('telemetry/history/rack1', event);
    await gateway.buffer.flush();

    const query = await fetch(`http://${base}/query?metric=cpu/load&duration=1h`);
    expect(await query.json()).toEqual({ records: [relayed] });

    const latest = await fetch(`http://${base}/timeseries/metrics?metric=cpu/load`);
    expect(await latest.json()).toEqual({ metrics: [{ metric: 'cpu/load', value: 0.5, timestamp: NOW }] });
  });

  it('should push flushed records to live subscribers', async () => {
    const messages: unknown[] = [];
    const client = new WebSocket(`ws://${base}/query/stream`);
    client.on('message', (data) => messages.push(JSON.parse(data.toString())));
    await new Promise<void>((resolve, reject) => {
      client.once('open', () => resolve());
      client.once('error', reject);
    });

    client.send(JSON.stringify({ type: 'subscribe', id: 'cpu', query: { metrics: ['cpu/load'] } }));
    await vi.waitFor(() => expect(messages).toEqual([{ type: 'ack', id: 'cpu' }]));

    await bus.publish('telemetry/history/rack1', event);
    await gateway.buffer.flush();

    await vi.waitFor(() =>
      expect(messages[1]).toEqual({ type: 'data', id: 'cpu', initial: false, records: [relayed] })
    );
    client.close();
  });

  it('should flush pending records on stop and release the bus', async () => {
    await bus.publish('telemetry/history/rack1', event);
    expect(backend.stored).toEqual([]);

    await gateway.stop();
    await gateway.stop();

    expect(backend.stored).toEqual([relayed]);
    expect(gateway.isRunning).toBe(false);
    await expect(bus.publish('telemetry/history/rack1', event)).rejects.toBeInstanceOf(InternalError);
  });

  it('should report component statistics in health', async () => {
    const response = await fetch(`http://${base}/health`);

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      status: 'ok',
      name: 'history',
      version: '0.1.0',
      uptimeMs: 0,
      relay: { topics: 1 },
      live: { subscriptions: 0 },
      streams: { connections: 0, subscriptions: 0 },
    });
  });
});
