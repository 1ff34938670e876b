/**
 * Live query WebSocket surface
 *
 * Protocol, one JSON object per message:
 *
 * | Direction | Message |
 * |-----------|---------|
 * | client → server | `{ type: 'subscribe', id, query }` |
 * | client → server | `{ type: 'metrics', id, metrics }` |
 * | client → server | `{ type: 'unsubscribe', id }` |
 * | server → client | `{ type: 'ack', id }` |
 * | server → client | `{ type: 'data', id, initial, records }` |
 * | server → client | `{ type: 'metrics', id, metrics }` |
 * | server → client | `{ type: 'error', id?, error }` |
 * | server → client | `{ type: 'closed', id, reason, error? }` |
 *
 * Ids are chosen by the client and scoped to its socket. Subscribing with an id
 * that is already in use replaces that subscription. A `metrics` subscription
 * sends the latest value of each named metric right away and then on every
 * metrics interval.
 */

import type { IncomingMessage } from 'node:http';
import type { Duplex } from 'node:stream';
import { type Subscription, timer } from 'rxjs';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import { z } from 'zod';
import {
  type ChronicleError,
  type Logger,
  type QueryDescriptor,
  SinkError,
  ValidationError,
  createQuietLogger,
  ensureChronicleError,
  toValidationIssues,
} from '@chronicle/core';
import type { LatestValueCache } from '@chronicle/ingestion';
import type { CloseReason, LiveBatch, LiveQueryStream, LiveSink } from '@chronicle/subscriptions';
import { queryInputSchema, toQueryDescriptor } from './query-params.js';

export const STREAM_PATH = '/query/stream';

const commandSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), id: z.string().min(1), query: queryInputSchema }),
  z.object({ type: z.literal('metrics'), id: z.string().min(1), metrics: z.array(z.string().min(1)).min(1) }),
  z.object({ type: z.literal('unsubscribe'), id: z.string().min(1) }),
]);

type StreamCommand = z.infer<typeof commandSchema>;

export interface StreamServerConfig {
  stream: LiveQueryStream;
  /** Source of `metrics` pushes */
  latest: LatestValueCache;
  /** Pushes fail once a socket has more than this many bytes queued (default: 1 MiB) */
  maxSinkBufferBytes?: number;
  /** Cadence of `metrics` pushes (default: 10000) */
  metricsIntervalMs?: number;
  minimumStepMs?: number;
  defaultDurationMs?: number;
  logger?: Logger;
  now?: () => number;
}

/** Live query of one socket, keyed by the client's id */
interface LiveEntry {
  readonly kind: 'live';
  readonly clientId: string;
  handleId: string;
}

/** Periodic latest-value push of one socket */
interface MetricsEntry {
  readonly kind: 'metrics';
  readonly clientId: string;
  readonly ticker: Subscription;
}

type ClientSubscription = LiveEntry | MetricsEntry;

interface StreamClient {
  readonly socket: WebSocket;
  readonly subscriptions: Map<string, ClientSubscription>;
}

export class StreamServer {
  private readonly stream: LiveQueryStream;
  private readonly latest: LatestValueCache;
  private readonly maxSinkBufferBytes: number;
  private readonly metricsIntervalMs: number;
  private readonly minimumStepMs: number;
  private readonly defaultDurationMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly clients = new Set<StreamClient>();

  constructor(config: StreamServerConfig) {
    this.stream = config.stream;
    this.latest = config.latest;
    this.maxSinkBufferBytes = config.maxSinkBufferBytes ?? 1024 * 1024;
    this.metricsIntervalMs = config.metricsIntervalMs ?? 10_000;
    this.minimumStepMs = config.minimumStepMs ?? 10_000;
    this.defaultDurationMs = config.defaultDurationMs ?? 24 * 60 * 60 * 1000;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('stream');
    this.now = config.now ?? Date.now;

    this.wss.on('connection', (socket: WebSocket) => this.handleConnection(socket));
  }

  /** Take over an HTTP upgrade request for {@link STREAM_PATH} */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    this.wss.handleUpgrade(request, socket, head, (ws) => {
      this.wss.emit('connection', ws, request);
    });
  }

  getStats(): { connections: number; subscriptions: number } {
    let subscriptions = 0;
    for (const client of this.clients) subscriptions += client.subscriptions.size;
    return { connections: this.clients.size, subscriptions };
  }

  /** Release every subscription and close all sockets */
  async close(): Promise<void> {
    for (const client of this.clients) {
      this.releaseClient(client);
      client.socket.close(1001, 'Server shutting down');
    }
    this.clients.clear();

    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => (error ? reject(error) : resolve()));
    });
  }

  // ── Private ──

  private handleConnection(socket: WebSocket): void {
    const client: StreamClient = { socket, subscriptions: new Map() };
    this.clients.add(client);
    this.logger.debug('Client connected', { clients: this.clients.size });

    socket.on('message', (data: RawData) => this.handleMessage(client, data));

    socket.on('close', () => {
      this.releaseClient(client);
      this.clients.delete(client);
      this.logger.debug('Client disconnected', { clients: this.clients.size });
    });

    socket.on('error', (error) => {
      this.logger.warn('Socket error', { error: error.message });
    });
  }

  private handleMessage(client: StreamClient, data: RawData): void {
    let command: StreamCommand;
    try {
      command = this.parseCommand(data);
    } catch (error) {
      this.sendError(client, ensureChronicleError(error, 'CHRONICLE_V304'));
      return;
    }

    switch (command.type) {
      case 'subscribe':
        this.subscribe(client, command.id, command.query);
        break;
      case 'metrics':
        this.subscribeMetrics(client, command.id, command.metrics);
        break;
      case 'unsubscribe':
        this.unsubscribe(client, command.id);
        break;
    }
  }

  private parseCommand(data: RawData): StreamCommand {
    let json: unknown;
    try {
      json = JSON.parse(rawDataToString(data));
    } catch {
      throw new ValidationError([{ path: '', message: 'message is not valid JSON' }], 'CHRONICLE_V304');
    }

    const parsed = commandSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V304');
    }
    return parsed.data;
  }

  private subscribe(client: StreamClient, clientId: string, query: z.infer<typeof queryInputSchema>): void {
    let descriptor: QueryDescriptor;
    try {
      descriptor = toQueryDescriptor(query, {
        now: this.now(),
        minimumStepMs: this.minimumStepMs,
        defaultDurationMs: this.defaultDurationMs,
      });
    } catch (error) {
      this.sendError(client, ensureChronicleError(error), clientId);
      return;
    }

    const previous = client.subscriptions.get(clientId);
    const entry: LiveEntry = { kind: 'live', clientId, handleId: '' };
    client.subscriptions.set(clientId, entry);
    if (previous) this.release(previous);

    try {
      entry.handleId = this.stream.subscribe(descriptor, this.createSink(client, entry)).id;
    } catch (error) {
      client.subscriptions.delete(clientId);
      this.sendError(client, ensureChronicleError(error), clientId);
      return;
    }

    this.send(client.socket, { type: 'ack', id: clientId });
  }

  private subscribeMetrics(client: StreamClient, clientId: string, metrics: string[]): void {
    const previous = client.subscriptions.get(clientId);
    this.send(client.socket, { type: 'ack', id: clientId });
    const ticker = timer(0, this.metricsIntervalMs).subscribe(() => {
      this.send(client.socket, { type: 'metrics', id: clientId, metrics: this.latest.get(metrics) });
    });
    client.subscriptions.set(clientId, { kind: 'metrics', clientId, ticker });
    if (previous) this.release(previous);
  }

  private unsubscribe(client: StreamClient, clientId: string): void {
    const entry = client.subscriptions.get(clientId);
    if (!entry) {
      this.sendError(
        client,
        new ValidationError([{ path: 'id', message: `unknown subscription ${clientId}` }], 'CHRONICLE_V304'),
        clientId
      );
      return;
    }
    if (entry.kind === 'live') {
      this.stream.unsubscribe(entry.handleId);
      return;
    }
    client.subscriptions.delete(clientId);
    entry.ticker.unsubscribe();
    this.send(client.socket, { type: 'closed', id: clientId, reason: 'unsubscribed' });
  }

  /** Sink that writes to the socket while the entry is still current */
  private createSink(client: StreamClient, entry: LiveEntry): LiveSink {
    const { socket } = client;
    const isCurrent = () => client.subscriptions.get(entry.clientId) === entry;

    return {
      push: (batch: LiveBatch) => {
        if (socket.readyState !== WebSocket.OPEN) {
          throw new SinkError(batch.subscriptionId, 'CHRONICLE_S501');
        }
        if (socket.bufferedAmount > this.maxSinkBufferBytes) {
          throw new SinkError(batch.subscriptionId, 'CHRONICLE_S502');
        }

        const message = JSON.stringify({
          type: 'data',
          id: entry.clientId,
          initial: batch.initial,
          records: batch.records,
        });
        return new Promise<void>((resolve, reject) => {
          socket.send(message, (error) => {
            if (error) {
              reject(new SinkError(batch.subscriptionId, 'CHRONICLE_S500', error.message, error));
            } else {
              resolve();
            }
          });
        });
      },
      error: (error: ChronicleError) => {
        if (isCurrent()) this.sendError(client, error, entry.clientId);
      },
      close: (reason: CloseReason, error?: ChronicleError) => {
        if (!isCurrent()) return;
        client.subscriptions.delete(entry.clientId);
        this.send(socket, {
          type: 'closed',
          id: entry.clientId,
          reason,
          ...(error ? { error: error.toJSON() } : {}),
        });
      },
    };
  }

  private releaseClient(client: StreamClient): void {
    const entries = [...client.subscriptions.values()];
    client.subscriptions.clear();
    for (const entry of entries) {
      this.release(entry);
    }
  }

  /** Stop an entry that is no longer in its client's map */
  private release(entry: ClientSubscription): void {
    if (entry.kind === 'live') {
      this.stream.unsubscribe(entry.handleId);
    } else {
      entry.ticker.unsubscribe();
    }
  }

  private sendError(client: StreamClient, error: ChronicleError, id?: string): void {
    this.send(client.socket, { type: 'error', ...(id !== undefined ? { id } : {}), error: error.toJSON() });
  }

  private send(socket: WebSocket, message: Record<string, unknown>): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(message));
    }
  }
}

function rawDataToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf-8');
  return data.toString('utf-8');
}

export function createStreamServer(config: StreamServerConfig): StreamServer {
  return new StreamServer(config);
}
