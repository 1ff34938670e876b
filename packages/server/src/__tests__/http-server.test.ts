import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MemoryMessageBus, createRecord } from '@chronicle/core';
import { ConfigStore, MemoryKeyValueBackend } from '@chronicle/datastore';
import { EventRelay, LatestValueCache } from '@chronicle/ingestion';
import { MemoryTimeSeriesBackend, QueryEngine } from '@chronicle/time-series';
import { HttpServer } from '../http-server.js';

const NOW = 1_000_000_000_000;
const decoder = new TextDecoder();

const sample = createRecord({
  source: 'rack1',
  measurement: 'cpu',
  timestamp: NOW - 60_000,
  fields: { load: 1, temp: 40 },
});

describe('HttpServer', () => {
  let backend: MemoryTimeSeriesBackend;
  let keyValue: MemoryKeyValueBackend;
  let bus: MemoryMessageBus;
  let relay: EventRelay;
  let latest: LatestValueCache;
  let server: HttpServer;
  let base: string;

  beforeEach(async () => {
    backend = new MemoryTimeSeriesBackend();
    keyValue = new MemoryKeyValueBackend();
    bus = new MemoryMessageBus({ recordPublished: true });
    relay = new EventRelay({ bus, sink: { enqueue: vi.fn() } });
    latest = new LatestValueCache();

    server = new HttpServer({
      port: 0,
      host: '127.0.0.1',
      engine: new QueryEngine({ backend, now: () => NOW }),
      store: new ConfigStore({ backend: keyValue, bus }),
      relay,
      latest,
      health: () => ({ name: 'test' }),
      now: () => NOW,
    });
    await server.start();
    base = `http://127.0.0.1:${server.port}`;
  });

  afterEach(async () => {
    await server.stop();
  });

  async function request(method: string, path: string, body?: unknown) {
    const response = await fetch(base + path, {
      method,
      ...(body === undefined
        ? {}
        : {
            headers: { 'Content-Type': 'application/json' },
            body: typeof body === 'string' ? body : JSON.stringify(body),
          }),
    });
    const text = await response.text();
    const json: unknown = text ? JSON.parse(text) : null;
    return { status: response.status, headers: response.headers, json };
  }

  describe('query', () => {
    beforeEach(async () => {
      await backend.write([sample]);
    });

    it('should return projected records for a time frame', async () => {
      const { status, json } = await request('GET', '/query?metric=cpu/load&duration=5m');

      expect(status).toBe(200);
      expect(json).toEqual({
        records: [{ source: 'rack1', measurement: 'cpu', timestamp: NOW - 60_000, fields: { load: 1 } }],
      });
    });

    it('should reject a query without metrics', async () => {
      const { status, json } = await request('GET', '/query');

      expect(status).toBe(400);
      expect(json).toMatchObject({ error: { code: 'CHRONICLE_V301', category: 'validation', retryable: false } });
    });

    it('should answer 503 with Retry-After when the backend is down', async () => {
      backend.setAvailable(false);

      const { status, headers, json } = await request('GET', '/query?metric=cpu');

      expect(status).toBe(503);
      expect(headers.get('retry-after')).toBe('5');
      expect(json).toMatchObject({ error: { code: 'CHRONICLE_B202', retryable: true } });
    });

    it('should export ranges as CSV', async () => {
      await backend.write([
        createRecord({ source: 'rack1', measurement: 'cpu', timestamp: NOW - 30_000, fields: { load: 2 } }),
      ]);

      const seconds = await fetch(`${base}/timeseries/csv`, {
        method: 'POST',
        body: JSON.stringify({ metrics: ['cpu/load', 'cpu/temp'], duration: '5m', precision: 's' }),
      });
      expect(seconds.status).toBe(200);
      expect(seconds.headers.get('content-type')).toBe('text/csv; charset=utf-8');
      expect(await seconds.text()).toBe('time,cpu/load,cpu/temp\n999999940,1,40\n999999970,2,\n');

      const iso = await fetch(`${base}/timeseries/csv`, {
        method: 'POST',
        body: JSON.stringify({ metrics: ['cpu*'], duration: '5m', precision: 'ISO8601' }),
      });
      expect(await iso.text()).toBe(
        'time,cpu/load,cpu/temp\n2001-09-09T01:45:40.000Z,1,40\n2001-09-09T01:46:10.000Z,2,\n'
      );
    });

    it('should reject a CSV export with an unknown precision', async () => {
      const { status, json } = await request('POST', '/timeseries/csv', { metrics: ['cpu'], precision: 'us' });

      expect(status).toBe(400);
      expect(json).toMatchObject({ error: { code: 'CHRONICLE_V300' } });
      expect((await request('GET', '/timeseries/csv')).status).toBe(405);
    });

    it('should list fields and latest values', async () => {
      latest.update([sample]);

      expect((await request('GET', '/timeseries/fields?duration=1h')).json).toEqual({
        fields: ['cpu/load', 'cpu/temp'],
      });
      expect((await request('GET', '/timeseries/metrics?metric=cpu/load&metric=cpu/missing')).json).toEqual({
        metrics: [{ metric: 'cpu/load', value: 1, timestamp: NOW - 60_000 }],
      });
      expect((await request('GET', '/timeseries/ping')).json).toEqual({ ping: 'pong' });
      expect((await request('GET', '/timeseries/fields?duration=later')).status).toBe(400);
    });
  });

  describe('datastore', () => {
    it('should store, read and delete a single value', async () => {
      const value = { namespace: 'ui', id: 'main', title: 'Main' };

      expect(await request('PUT', '/datastore/main?namespace=ui', { title: 'Main' })).toMatchObject({
        status: 200,
        json: { value },
      });
      expect((await request('GET', '/datastore/main?namespace=ui')).json).toEqual({ value });
      expect((await request('GET', '/datastore?namespace=ui&filter=m*')).json).toEqual({ values: [value] });
      expect((await request('DELETE', '/datastore/main?namespace=ui')).json).toEqual({ count: 1 });

      const missing = await request('GET', '/datastore/main?namespace=ui');
      expect(missing.status).toBe(404);
      expect(missing.json).toMatchObject({ error: { code: 'CHRONICLE_K601' } });

      expect(bus.published.map((message) => [message.topic, JSON.parse(decoder.decode(message.payload))])).toEqual([
        ['telemetry/datastore/ui', { changed: [value] }],
        ['telemetry/datastore/ui', { deleted: ['ui:main'] }],
      ]);
    });

    it('should store and delete several values', async () => {
      const values = [
        { namespace: 'ui', id: 'a' },
        { namespace: 'ui', id: 'b', size: 2 },
      ];

      expect((await request('POST', '/datastore', { values })).json).toEqual({ values });
      expect((await request('GET', '/datastore?namespace=ui&id=b')).json).toEqual({ values: [values[1]] });
      expect((await request('DELETE', '/datastore?namespace=ui&id=a&id=b')).json).toEqual({ count: 2 });
      expect(keyValue.size).toBe(0);
    });

    it('should reject malformed bodies and keys', async () => {
      const badJson = await request('PUT', '/datastore/main?namespace=ui', 'nope');
      expect(badJson.status).toBe(400);
      expect(badJson.json).toMatchObject({ error: { code: 'CHRONICLE_V300' } });

      expect((await request('POST', '/datastore', { values: 'x' })).status).toBe(400);

      const badEscape = await request('GET', '/datastore/%E0?namespace=ui');
      expect(badEscape.status).toBe(400);
      expect(badEscape.json).toMatchObject({ error: { code: 'CHRONICLE_V300', category: 'validation' } });

      const badKey = await request('GET', '/datastore/main?namespace=a$b');
      expect(badKey.status).toBe(400);
      expect(badKey.json).toMatchObject({ error: { code: 'CHRONICLE_V303' } });
    });

    it('should report an unreachable store as retryable', async () => {
      expect((await request('GET', '/datastore/ping')).json).toEqual({ ping: 'pong' });

      keyValue.setAvailable(false);
      const { status, headers, json } = await request('GET', '/datastore/ping');

      expect(status).toBe(503);
      expect(headers.get('retry-after')).toBe('5');
      expect(json).toMatchObject({ error: { code: 'CHRONICLE_K600', category: 'datastore', retryable: true } });
    });
  });

  describe('relay topics', () => {
    it('should add, list and remove topic filters', async () => {
      expect((await request('POST', '/relay/topics', { topic: 'telemetry/extra/#' })).json).toEqual({
        added: true,
        topics: ['telemetry/extra/#'],
      });
      expect((await request('POST', '/relay/topics', { topic: 'telemetry/extra/#' })).json).toMatchObject({
        added: false,
      });
      expect((await request('GET', '/relay/topics')).json).toEqual({ topics: ['telemetry/extra/#'] });
      expect(bus.filters).toEqual(['telemetry/extra/#']);

      expect((await request('DELETE', '/relay/topics?topic=telemetry%2Fextra%2F%23')).json).toEqual({
        removed: true,
        topics: [],
      });
    });

    it('should reject a malformed topic filter', async () => {
      expect((await request('POST', '/relay/topics', { topic: 'a/#/b' })).status).toBe(400);
      expect(relay.getTopics()).toEqual([]);
    });
  });

  it('should report health', async () => {
    expect((await request('GET', '/health')).json).toEqual({ status: 'ok', name: 'test' });
  });

  it('should answer preflight requests, unknown routes and wrong methods', async () => {
    const preflight = await request('OPTIONS', '/query');
    expect(preflight.status).toBe(204);
    expect(preflight.headers.get('access-control-allow-origin')).toBe('*');

    expect((await request('GET', '/nope')).status).toBe(404);
    expect((await request('POST', '/query')).status).toBe(405);
    expect((await request('PATCH', '/datastore/main?namespace=ui')).status).toBe(405);
  });
});
