/**
 * HTTP surface of the gateway, on Node's built-in `http` module.
 *
 * ## Routes
 *
 * | Method | Path | Description |
 * |--------|------|-------------|
 * | GET | /query | Historical query: `metric`, `start`, `end`, `duration`, `interval` |
 * | GET | /query/stream | WebSocket upgrade for live queries |
 * | GET | /timeseries/fields | Metric names seen in the last `duration` |
 * | GET | /timeseries/metrics | Latest value of each `metric` |
 * | POST | /timeseries/csv | CSV export of `{ metrics, start, end, duration, precision }` |
 * | GET | /timeseries/ping | Time-series backend availability |
 * | GET | /datastore | Values in `namespace` by `id` and/or `filter` |
 * | POST | /datastore | Store `{ values }` |
 * | DELETE | /datastore | Delete values in `namespace` by `id` and/or `filter` |
 * | GET, PUT, DELETE | /datastore/:id | Single value in `namespace` |
 * | GET | /datastore/ping | Datastore availability |
 * | GET, POST, DELETE | /relay/topics | Relay topic subscriptions |
 * | GET | /health | Liveness and component statistics |
 *
 * Errors are `{ error }` bodies: validation → 400, missing value → 404,
 * unavailable backend → 503 with `Retry-After`, anything else → 500.
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { z } from 'zod';
import {
  ChronicleError,
  DatastoreError,
  type Logger,
  ValidationError,
  createQuietLogger,
  ensureChronicleError,
  parseDuration,
  toValidationIssues,
} from '@chronicle/core';
import type { ConfigStore } from '@chronicle/datastore';
import type { EventRelay, LatestValueCache } from '@chronicle/ingestion';
import { CSV_PRECISIONS, type QueryEngine, toCsvLines } from '@chronicle/time-series';
import { queryInputFromSearch, queryInputSchema, toQueryDescriptor } from './query-params.js';
import { STREAM_PATH, type StreamServer } from './stream-server.js';

/** Seconds a client should wait before retrying a 503 */
export const RETRY_AFTER_SECONDS = 5;

export interface HttpServerConfig {
  port?: number;
  host?: string;
  engine: QueryEngine;
  store: ConfigStore;
  relay: EventRelay;
  latest: LatestValueCache;
  streams?: StreamServer;
  /** Extra details for `GET /health` */
  health?: () => Record<string, unknown>;
  minimumStepMs?: number;
  defaultDurationMs?: number;
  logger?: Logger;
  now?: () => number;
}

/**
 * Parsed route information from a URL path.
 */
interface ParsedRoute {
  pattern: string;
  params: Record<string, string>;
}

const ROUTES = [
  '/query',
  '/timeseries/fields',
  '/timeseries/metrics',
  '/timeseries/csv',
  '/timeseries/ping',
  '/datastore/ping',
  '/datastore/:id',
  '/datastore',
  '/relay/topics',
  '/health',
];

const valuesBodySchema = z.object({
  values: z.array(z.object({ namespace: z.string(), id: z.string() }).passthrough()),
});

const documentBodySchema = z.record(z.unknown());

const topicBodySchema = z.object({ topic: z.string().min(1) });

const csvBodySchema = queryInputSchema.omit({ interval: true }).extend({
  precision: z.enum(CSV_PRECISIONS).default('ms'),
});

class MethodNotAllowed extends Error {}

/**
 * @example
 * ```typescript
 * const server = createHttpServer({ port: 5000, engine, store, relay, latest, streams });
 * await server.start();
 * // ...
 * await server.stop();
 * ```
 */
export class HttpServer {
  private readonly config: Required<
    Omit<HttpServerConfig, 'engine' | 'store' | 'relay' | 'latest' | 'streams' | 'health' | 'logger'>
  >;
  private readonly engine: QueryEngine;
  private readonly store: ConfigStore;
  private readonly relay: EventRelay;
  private readonly latest: LatestValueCache;
  private readonly streams: StreamServer | undefined;
  private readonly health: () => Record<string, unknown>;
  private readonly logger: Logger;

  private server: http.Server | null = null;

  constructor(config: HttpServerConfig) {
    this.config = {
      port: config.port ?? 5000,
      host: config.host ?? '0.0.0.0',
      minimumStepMs: config.minimumStepMs ?? 10_000,
      defaultDurationMs: config.defaultDurationMs ?? 24 * 60 * 60 * 1000,
      now: config.now ?? Date.now,
    };
    this.engine = config.engine;
    this.store = config.store;
    this.relay = config.relay;
    this.latest = config.latest;
    this.streams = config.streams;
    this.health = config.health ?? (() => ({}));
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('http');
  }

  /**
   * Start listening.
   */
  async start(): Promise<void> {
    if (this.server) return;

    const server = http.createServer((req, res) => {
      void this.handleRequest(req, res);
    });
    server.on('upgrade', (req, socket, head: Buffer) => {
      const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
      if (this.streams && pathname === STREAM_PATH) {
        this.streams.handleUpgrade(req, socket, head);
      } else {
        socket.destroy();
      }
    });

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.error('Server error', error);
    });
    this.server = server;
    this.logger.info('Listening', { host: this.config.host, port: this.port });
  }

  /**
   * Stop accepting requests and wait for open ones to finish.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeIdleConnections();
    });
  }

  get isRunning(): boolean {
    return this.server?.listening ?? false;
  }

  /** Bound port, useful when started on port 0 */
  get port(): number {
    const address = this.server?.address();
    return isAddressInfo(address) ? address.port : this.config.port;
  }

  // ── Private ──

  private async handleRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, PUT, DELETE, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    res.setHeader('Cache-Control', 'no-cache');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    try {
      await this.routeRequest(req, res);
    } catch (error) {
      this.sendError(res, error);
    }
  }

  private async routeRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';
    const url = new URL(req.url ?? '/', 'http://localhost');
    const route = matchRoute(url.pathname);
    if (!route) {
      this.sendJson(res, 404, { error: { message: `Not found: ${url.pathname}` } });
      return;
    }

    const search = url.searchParams;
    const namespace = search.get('namespace') ?? '';

    switch (route.pattern) {
      case '/query': {
        this.allow(method, 'GET');
        const descriptor = toQueryDescriptor(queryInputFromSearch(search), this.queryDefaults());
        const records = await this.engine.query(descriptor);
        this.sendJson(res, 200, { records });
        break;
      }

      case '/timeseries/fields': {
        this.allow(method, 'GET');
        const duration = search.get('duration');
        const durationMs = duration ? parseDuration(duration) : this.config.defaultDurationMs;
        if (durationMs === null || durationMs <= 0) {
          throw new ValidationError([{ path: 'duration', message: 'invalid duration' }], 'CHRONICLE_V300');
        }
        this.sendJson(res, 200, { fields: await this.engine.fields(durationMs) });
        break;
      }

      case '/timeseries/metrics': {
        this.allow(method, 'GET');
        this.sendJson(res, 200, { metrics: this.latest.get(search.getAll('metric')) });
        break;
      }

      case '/timeseries/csv': {
        this.allow(method, 'POST');
        const { precision, ...input } = parseWith(csvBodySchema, await readJsonBody(req));
        const descriptor = toQueryDescriptor(input, this.queryDefaults());
        const records = await this.engine.query(descriptor);

        res.writeHead(200, { 'Content-Type': 'text/csv; charset=utf-8' });
        for (const line of toCsvLines(records, descriptor.selectors, precision)) {
          res.write(`${line}\n`);
        }
        res.end();
        break;
      }

      case '/timeseries/ping': {
        this.allow(method, 'GET');
        await this.engine.ping();
        this.sendJson(res, 200, { ping: 'pong' });
        break;
      }

      case '/datastore/ping': {
        this.allow(method, 'GET');
        await this.store.ping();
        this.sendJson(res, 200, { ping: 'pong' });
        break;
      }

      case '/datastore/:id': {
        const id = route.params['id'] ?? '';
        if (method === 'GET') {
          const value = await this.store.get(namespace, id);
          if (!value) {
            throw new DatastoreError('CHRONICLE_K601', `No value ${id} in namespace "${namespace}"`, { namespace, id });
          }
          this.sendJson(res, 200, { value });
        } else if (method === 'PUT') {
          const body = parseWith(documentBodySchema, await readJsonBody(req));
          const value = await this.store.set({ ...body, namespace, id });
          this.sendJson(res, 200, { value });
        } else if (method === 'DELETE') {
          this.sendJson(res, 200, { count: await this.store.delete(namespace, id) });
        } else {
          throw new MethodNotAllowed();
        }
        break;
      }

      case '/datastore': {
        const query = multiQueryOf(search);
        if (method === 'GET') {
          this.sendJson(res, 200, { values: await this.store.mget(namespace, query) });
        } else if (method === 'POST') {
          const body = parseWith(valuesBodySchema, await readJsonBody(req));
          this.sendJson(res, 200, { values: await this.store.mset(body.values) });
        } else if (method === 'DELETE') {
          this.sendJson(res, 200, { count: await this.store.mdelete(namespace, query) });
        } else {
          throw new MethodNotAllowed();
        }
        break;
      }

      case '/relay/topics': {
        if (method === 'GET') {
          this.sendJson(res, 200, { topics: this.relay.getTopics() });
        } else if (method === 'POST') {
          const { topic } = parseWith(topicBodySchema, await readJsonBody(req));
          const added = await this.relay.addTopic(topic);
          this.sendJson(res, 200, { added, topics: this.relay.getTopics() });
        } else if (method === 'DELETE') {
          const topic = search.get('topic') ?? '';
          const removed = await this.relay.removeTopic(topic);
          this.sendJson(res, 200, { removed, topics: this.relay.getTopics() });
        } else {
          throw new MethodNotAllowed();
        }
        break;
      }

      case '/health': {
        this.allow(method, 'GET');
        this.sendJson(res, 200, { status: 'ok', ...this.health() });
        break;
      }
    }
  }

  private queryDefaults() {
    return {
      now: this.config.now(),
      minimumStepMs: this.config.minimumStepMs,
      defaultDurationMs: this.config.defaultDurationMs,
    };
  }

  private allow(method: string, allowed: string): void {
    if (method !== allowed) throw new MethodNotAllowed();
  }

  private sendError(res: http.ServerResponse, error: unknown): void {
    if (error instanceof MethodNotAllowed) {
      this.sendJson(res, 405, { error: { message: 'Method not allowed' } });
      return;
    }

    const chronicleError = ensureChronicleError(error);
    const status = statusOf(chronicleError);
    if (status === 500) {
      this.logger.error('Request failed', chronicleError);
    } else {
      this.logger.debug('Request rejected', { status, code: chronicleError.code });
    }

    if (status === 503) {
      res.setHeader('Retry-After', String(RETRY_AFTER_SECONDS));
    }
    this.sendJson(res, status, { error: chronicleError.toJSON() });
  }

  private sendJson(res: http.ServerResponse, statusCode: number, data: unknown): void {
    res.writeHead(statusCode, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(data));
  }
}

/** HTTP status for an error */
export function statusOf(error: ChronicleError): number {
  if (error.category === 'validation') return 400;
  if (ChronicleError.isCode(error, 'CHRONICLE_K601')) return 404;
  if (error.retryable) return 503;
  return 500;
}

/**
 * Match a URL pathname to a known route pattern.
 */
function matchRoute(pathname: string): ParsedRoute | null {
  for (const pattern of ROUTES) {
    const params = matchPattern(pathname, pattern);
    if (params) return { pattern, params };
  }
  return null;
}

/**
 * Match a URL pathname against a route pattern with :param placeholders.
 */
function matchPattern(pathname: string, pattern: string): Record<string, string> | null {
  const pathParts = pathname.split('/').filter(Boolean);
  const patternParts = pattern.split('/').filter(Boolean);

  if (pathParts.length !== patternParts.length) {
    return null;
  }

  const params: Record<string, string> = {};
  for (let i = 0; i < patternParts.length; i++) {
    const patternPart = patternParts[i] ?? '';
    const pathPart = pathParts[i] ?? '';

    if (patternPart.startsWith(':')) {
      params[patternPart.slice(1)] = decodePathPart(pathPart);
    } else if (patternPart !== pathPart) {
      return null;
    }
  }
  return params;
}

/** @throws ValidationError for a malformed percent escape */
function decodePathPart(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    throw new ValidationError([{ path: 'path', message: `malformed escape in "${part}"` }], 'CHRONICLE_V300');
  }
}

function multiQueryOf(search: URLSearchParams): { ids?: string[]; filter?: string } {
  const ids = search.getAll('id');
  const filter = search.get('filter');
  return {
    ...(ids.length > 0 ? { ids } : {}),
    ...(filter !== null ? { filter } : {}),
  };
}

/**
 * Parse the JSON body from an incoming request.
 */
async function readJsonBody(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }

  const raw = Buffer.concat(chunks).toString('utf-8');
  if (raw.length === 0) return {};
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError([{ path: 'body', message: 'invalid JSON' }], 'CHRONICLE_V300');
  }
}

function parseWith<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V300');
  }
  return parsed.data;
}

function isAddressInfo(address: string | AddressInfo | null | undefined): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}

export function createHttpServer(config: HttpServerConfig): HttpServer {
  return new HttpServer(config);
}
