/**
 * MessageBus over an MQTT broker
 */

import { type MqttClient, connect } from 'mqtt';
import {
  type BusPayload,
  InternalError,
  type Logger,
  type MessageBus,
  type MessageHandler,
  createQuietLogger,
  toError,
  topicMatches,
} from '@chronicle/core';

/**
 * The part of an MQTT client the bus uses. {@link fromMqttClient} adapts an
 * `mqtt` client; tests provide their own.
 */
export interface MqttTransport {
  subscribe(filter: string): Promise<void>;
  unsubscribe(filter: string): Promise<void>;
  publish(topic: string, payload: string | BusPayload): Promise<void>;
  onMessage(listener: (topic: string, payload: BusPayload) => void): void;
  end(): Promise<void>;
}

export interface MqttMessageBusConfig {
  transport: MqttTransport;
  logger?: Logger;
}

export interface MqttConnectConfig {
  url: string;
  /** Client id (default: generated by the mqtt library) */
  clientId?: string;
  logger?: Logger;
}

/**
 * Bus that shares one broker subscription per topic filter between all of its
 * handlers. A message is dispatched to every handler whose filter matches it,
 * so a handler registered under two overlapping filters sees it twice.
 */
export class MqttMessageBus implements MessageBus {
  private readonly transport: MqttTransport;
  private readonly logger: Logger;
  private readonly handlers = new Map<string, Set<MessageHandler>>();
  private closed = false;

  constructor(config: MqttMessageBusConfig) {
    this.transport = config.transport;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('mqtt');
    this.transport.onMessage((topic, payload) => this.dispatch(topic, payload));
  }

  /** Topic filters with at least one handler */
  get filters(): string[] {
    return [...this.handlers.keys()];
  }

  async subscribe(filter: string, handler: MessageHandler): Promise<void> {
    this.assertOpen();
    const existing = this.handlers.get(filter);
    if (existing) {
      existing.add(handler);
      return;
    }

    const set = new Set([handler]);
    this.handlers.set(filter, set);
    try {
      await this.transport.subscribe(filter);
    } catch (error) {
      this.handlers.delete(filter);
      throw busError('subscribe', filter, error);
    }
    this.logger.debug('Subscribed', { filter });
  }

  async unsubscribe(filter: string, handler: MessageHandler): Promise<void> {
    const set = this.handlers.get(filter);
    if (!set?.delete(handler) || set.size > 0) return;

    this.handlers.delete(filter);
    if (this.closed) return;
    try {
      await this.transport.unsubscribe(filter);
    } catch (error) {
      throw busError('unsubscribe', filter, error);
    }
    this.logger.debug('Unsubscribed', { filter });
  }

  async publish(topic: string, payload: string | BusPayload): Promise<void> {
    this.assertOpen();
    try {
      await this.transport.publish(topic, payload);
    } catch (error) {
      throw busError('publish', topic, error);
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handlers.clear();
    await this.transport.end();
  }

  // ── Private ──

  private dispatch(topic: string, payload: BusPayload): void {
    for (const [filter, set] of this.handlers) {
      if (!topicMatches(filter, topic)) continue;
      for (const handler of [...set]) {
        try {
          handler(topic, payload);
        } catch (error) {
          this.logger.error('Message handler failed', toError(error), { topic, filter });
        }
      }
    }
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new InternalError('CHRONICLE_X901', 'Message bus is closed');
    }
  }
}

function busError(operation: string, topic: string, error: unknown): InternalError {
  const cause = toError(error);
  return new InternalError('CHRONICLE_X902', `MQTT ${operation} failed: ${cause.message}`, { topic }, cause);
}

/** Adapt an `mqtt` client to {@link MqttTransport} */
export function fromMqttClient(client: MqttClient): MqttTransport {
  return {
    subscribe: async (filter) => {
      await client.subscribeAsync(filter);
    },
    unsubscribe: async (filter) => {
      await client.unsubscribeAsync(filter);
    },
    publish: async (topic, payload) => {
      await client.publishAsync(topic, typeof payload === 'string' ? payload : Buffer.from(payload));
    },
    onMessage: (listener) => {
      client.on('message', (topic, payload) => listener(topic, payload));
    },
    end: async () => {
      await client.endAsync();
    },
  };
}

/**
 * Connect to a broker. The client reconnects on its own and re-establishes
 * its subscriptions after a reconnect.
 *
 * @example
 * ```typescript
 * const bus = connectMqttBus({ url: 'mqtt://eventbus:1883', logger });
 * await bus.subscribe('telemetry/history/#', (topic, payload) => { ... });
 * ```
 */
export function connectMqttBus(config: MqttConnectConfig): MqttMessageBus {
  const logger = (config.logger ?? createQuietLogger('chronicle')).child('mqtt');
  const client = connect(config.url, {
    ...(config.clientId ? { clientId: config.clientId } : {}),
    reconnectPeriod: 1000,
  });

  client.on('connect', () => logger.info('Connected', { url: config.url }));
  client.on('reconnect', () => logger.debug('Reconnecting', { url: config.url }));
  client.on('offline', () => logger.warn('Broker offline', { url: config.url }));
  client.on('error', (error) => logger.error('MQTT client error', error));

  return new MqttMessageBus({ transport: fromMqttClient(client), logger: config.logger });
}

export function createMqttMessageBus(config: MqttMessageBusConfig): MqttMessageBus {
  return new MqttMessageBus(config);
}
