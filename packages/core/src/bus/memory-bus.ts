/**
 * In-process message bus. Backs tests and single-process deployments
 * that run without an MQTT broker.
 */

import { InternalError, toError } from '../errors/chronicle-error.js';
import { type Logger, createQuietLogger } from '../observability/logger.js';
import { type BusPayload, type MessageBus, type MessageHandler, topicMatches } from './message-bus.js';

/** A message seen by {@link MemoryMessageBus} */
export interface PublishedMessage {
  readonly topic: string;
  readonly payload: BusPayload;
}

export interface MemoryMessageBusConfig {
  logger?: Logger;
  /** Keep every published message in {@link MemoryMessageBus.published} (default: false) */
  recordPublished?: boolean;
}

const encoder = new TextEncoder();

/**
 * Synchronous in-memory bus with MQTT wildcard matching. A handler that
 * throws is logged and does not affect other handlers.
 */
export class MemoryMessageBus implements MessageBus {
  private readonly handlers = new Map<string, Set<MessageHandler>>();
  private readonly logger: Logger;
  private readonly recordPublished: boolean;
  private readonly log: PublishedMessage[] = [];
  private closed = false;

  constructor(config: MemoryMessageBusConfig = {}) {
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('memory-bus');
    this.recordPublished = config.recordPublished ?? false;
  }

  /** Messages published so far, when recording is enabled */
  get published(): readonly PublishedMessage[] {
    return this.log;
  }

  /** Topic filters with at least one handler */
  get filters(): string[] {
    return [...this.handlers.keys()];
  }

  async subscribe(filter: string, handler: MessageHandler): Promise<void> {
    this.assertOpen();
    let set = this.handlers.get(filter);
    if (!set) {
      set = new Set();
      this.handlers.set(filter, set);
    }
    set.add(handler);
  }

  async unsubscribe(filter: string, handler: MessageHandler): Promise<void> {
    const set = this.handlers.get(filter);
    if (!set) return;
    set.delete(handler);
    if (set.size === 0) {
      this.handlers.delete(filter);
    }
  }

  async publish(topic: string, payload: string | BusPayload): Promise<void> {
    this.assertOpen();
    this.deliver(topic, typeof payload === 'string' ? encoder.encode(payload) : payload);
  }

  /** Deliver a message synchronously, as if it had arrived from a broker */
  deliver(topic: string, payload: BusPayload): void {
    if (this.recordPublished) {
      this.log.push({ topic, payload });
    }

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

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new InternalError('CHRONICLE_X901', 'Message bus is closed');
    }
  }
}

export function createMemoryMessageBus(config?: MemoryMessageBusConfig): MemoryMessageBus {
  return new MemoryMessageBus(config);
}
