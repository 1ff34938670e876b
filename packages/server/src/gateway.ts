/**
 * Gateway - wires bus, buffer, backends, live queries and both surfaces together
 */

import {
  type Logger,
  type MessageBus,
  createLogger,
  createMemoryMessageBus,
  toError,
} from '@chronicle/core';
import {
  type ConfigStore,
  type KeyValueBackend,
  createConfigStore,
  createMemoryKeyValueBackend,
  createRedisBackend,
} from '@chronicle/datastore';
import {
  type EventRelay,
  type LatestValueCache,
  type WriteBuffer,
  createEventRelay,
  createLatestValueCache,
  createWriteBuffer,
} from '@chronicle/ingestion';
import { type LiveQueryStream, createLiveQueryStream } from '@chronicle/subscriptions';
import {
  type QueryEngine,
  type TimeSeriesBackend,
  createMemoryBackend,
  createQueryEngine,
  createVictoriaBackend,
} from '@chronicle/time-series';
import { type GatewayConfig, VERSION } from './config.js';
import { type HttpServer, createHttpServer } from './http-server.js';
import { connectMqttBus } from './mqtt-bus.js';
import { type StreamServer, createStreamServer } from './stream-server.js';

export interface GatewayOptions {
  config: GatewayConfig;
  /** Replaces the bus selected by `config.bus` */
  bus?: MessageBus;
  /** Replaces the time-series backend selected by `config.backend` */
  backend?: TimeSeriesBackend;
  /** Replaces the key/value backend selected by `config.datastore` */
  keyValue?: KeyValueBackend;
  /** Default: a logger built from `logLevel`, `logFormat` and `debug` */
  logger?: Logger;
  now?: () => number;
}

/**
 * @example
 * ```typescript
 * const gateway = createGateway({ config: loadConfig() });
 * await gateway.start();
 * process.on('SIGTERM', () => void gateway.stop());
 * ```
 */
export class Gateway {
  readonly config: GatewayConfig;
  readonly bus: MessageBus;
  readonly backend: TimeSeriesBackend;
  readonly buffer: WriteBuffer;
  readonly relay: EventRelay;
  readonly engine: QueryEngine;
  readonly latest: LatestValueCache;
  readonly live: LiveQueryStream;
  readonly store: ConfigStore;
  readonly streams: StreamServer;
  readonly http: HttpServer;

  private readonly logger: Logger;
  private readonly now: () => number;
  private startedAt: number | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: GatewayOptions) {
    const { config } = options;
    this.config = config;
    this.now = options.now ?? Date.now;
    this.logger =
      options.logger ??
      createLogger({ module: config.name, level: config.logLevel, format: config.logFormat, debug: config.debug });
    const logger = this.logger;

    this.bus =
      options.bus ??
      (config.bus === 'memory' ? createMemoryMessageBus({ logger }) : connectMqttBus({ url: config.busUrl, logger }));

    this.backend =
      options.backend ??
      (config.backend === 'memory' ? createMemoryBackend() : createVictoriaBackend({ url: config.victoriaUrl, logger }));

    const keyValue =
      options.keyValue ??
      (config.datastore === 'memory' ? createMemoryKeyValueBackend() : createRedisBackend({ url: config.redisUrl, logger }));

    this.buffer = createWriteBuffer({
      backend: this.backend,
      flushIntervalMs: config.flushIntervalMs,
      flushThreshold: config.flushThreshold,
      maxPendingRecords: config.maxPendingRecords,
      logger,
      now: this.now,
    });
    this.relay = createEventRelay({ bus: this.bus, sink: this.buffer, logger, now: this.now });
    this.engine = createQueryEngine({
      backend: this.backend,
      defaultDurationMs: config.defaultDurationMs,
      logger,
      now: this.now,
    });
    this.latest = createLatestValueCache();
    this.live = createLiveQueryStream({ flushes: this.buffer.flushed$, history: this.engine, logger, now: this.now });
    this.store = createConfigStore({ backend: keyValue, bus: this.bus, topic: config.datastoreTopic, logger });

    const queryDefaults = {
      minimumStepMs: config.minimumStepMs,
      defaultDurationMs: config.defaultDurationMs,
      logger,
      now: this.now,
    };
    this.streams = createStreamServer({
      stream: this.live,
      latest: this.latest,
      maxSinkBufferBytes: config.maxSinkBufferBytes,
      metricsIntervalMs: config.metricsIntervalMs,
      ...queryDefaults,
    });
    this.http = createHttpServer({
      port: config.port,
      host: config.host,
      engine: this.engine,
      store: this.store,
      relay: this.relay,
      latest: this.latest,
      streams: this.streams,
      health: () => this.health(),
      ...queryDefaults,
    });
  }

  get isRunning(): boolean {
    return this.startedAt !== null && this.stopping === null;
  }

  /** Bound HTTP port */
  get port(): number {
    return this.http.port;
  }

  async start(): Promise<void> {
    if (this.startedAt !== null) return;
    this.startedAt = this.now();

    try {
      this.buffer.start();
      this.latest.attach(this.buffer.flushed$);
      await this.relay.start([`${this.config.historyTopic}/#`]);
      await this.http.start();
    } catch (error) {
      this.logger.error('Start failed', toError(error));
      await this.stop();
      throw error;
    }

    this.logger.info('Gateway started', {
      name: this.config.name,
      version: VERSION,
      port: this.port,
      backend: this.config.backend,
      datastore: this.config.datastore,
    });
  }

  /**
   * Shut down: surfaces, live subscriptions, relay, a final flush, then
   * backends and bus. Safe to call more than once.
   */
  stop(): Promise<void> {
    this.stopping ??= this.shutdown();
    return this.stopping;
  }

  health(): Record<string, unknown> {
    return {
      name: this.config.name,
      version: VERSION,
      uptimeMs: this.startedAt === null ? 0 : this.now() - this.startedAt,
      buffer: this.buffer.getStats(),
      relay: this.relay.getStats(),
      live: this.live.getStats(),
      streams: this.streams.getStats(),
    };
  }

  // ── Private ──

  private async shutdown(): Promise<void> {
    this.logger.info('Shutting down');

    await this.step('stream server', () => this.streams.close());
    await this.step('http server', () => this.http.stop());
    this.live.close();
    await this.step('relay', () => this.relay.stop());
    await this.step('write buffer', () => this.buffer.stop());
    this.latest.close();
    await this.step('time-series backend', () => this.backend.close());
    await this.step('datastore', () => this.store.close());
    await this.step('message bus', () => this.bus.close());

    this.logger.info('Gateway stopped');
  }

  /** Run one shutdown step; a failure is logged and the next step still runs */
  private async step(name: string, operation: () => Promise<void>): Promise<void> {
    try {
      await operation();
    } catch (error) {
      this.logger.error(`Failed to stop ${name}`, toError(error));
    }
  }
}

export function createGateway(options: GatewayOptions): Gateway {
  return new Gateway(options);
}
