/**
 * Relays history events from bus topics into the write buffer.
 */

import {
  type BusPayload,
  ChronicleError,
  type Logger,
  type MessageBus,
  type MessageHandler,
  ValidationError,
  createQuietLogger,
  ensureChronicleError,
  isValidTopicFilter,
} from '@chronicle/core';
import { decodeHistoryMessage } from './payload-decoder.js';
import type { RecordSink } from './write-buffer.js';

export interface EventRelayConfig {
  bus: MessageBus;
  sink: RecordSink;
  logger?: Logger;
  /** Clock for events without a timestamp */
  now?: () => number;
}

export interface EventRelayStats {
  topics: number;
  messages: number;
  records: number;
  decodeErrors: number;
}

/**
 * Subscribes to topic filters and enqueues every decoded record.
 *
 * Malformed messages are logged and dropped; they never end a subscription.
 * Topics can be added and removed while running. Removing a topic leaves
 * already enqueued records alone.
 *
 * @example
 * ```typescript
 * const relay = createEventRelay({ bus, sink: buffer, logger });
 * await relay.start(['telemetry/history/#']);
 * await relay.addTopic('lab/+/history');
 * ```
 */
export class EventRelay {
  private readonly bus: MessageBus;
  private readonly sink: RecordSink;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly topics = new Set<string>();
  private readonly handler: MessageHandler = (topic, payload) => this.handleMessage(topic, payload);
  private stats = { messages: 0, records: 0, decodeErrors: 0 };

  constructor(config: EventRelayConfig) {
    this.bus = config.bus;
    this.sink = config.sink;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('relay');
    this.now = config.now ?? Date.now;
  }

  /** Subscribe to the initial topic filters */
  async start(topics: Iterable<string>): Promise<void> {
    for (const topic of topics) {
      await this.addTopic(topic);
    }
  }

  /**
   * Subscribe to a topic filter. Adding a filter twice is a no-op.
   *
   * @throws ValidationError for a malformed filter
   */
  async addTopic(topic: string): Promise<boolean> {
    if (!isValidTopicFilter(topic)) {
      throw new ValidationError([{ path: 'topic', message: `invalid topic filter "${topic}"` }]);
    }
    if (this.topics.has(topic)) return false;

    this.topics.add(topic);
    try {
      await this.bus.subscribe(topic, this.handler);
    } catch (error) {
      this.topics.delete(topic);
      throw error;
    }

    this.logger.info('Subscribed', { topic });
    return true;
  }

  /** Unsubscribe a topic filter. Returns false when it was not subscribed. */
  async removeTopic(topic: string): Promise<boolean> {
    if (!this.topics.delete(topic)) return false;

    await this.bus.unsubscribe(topic, this.handler);
    this.logger.info('Unsubscribed', { topic });
    return true;
  }

  getTopics(): string[] {
    return [...this.topics].sort();
  }

  /** Unsubscribe from every topic */
  async stop(): Promise<void> {
    for (const topic of [...this.topics]) {
      await this.removeTopic(topic);
    }
  }

  getStats(): EventRelayStats {
    return { ...this.stats, topics: this.topics.size };
  }

  private handleMessage(topic: string, payload: BusPayload): void {
    this.stats.messages++;

    try {
      const records = decodeHistoryMessage(topic, payload, this.now());
      for (const record of records) {
        this.sink.enqueue(record);
      }
      this.stats.records += records.length;
      this.logger.debug('Relayed', { topic, records: records.length });
    } catch (error) {
      const chronicleError = ensureChronicleError(error);
      if (ChronicleError.isCategory(chronicleError, 'decode')) {
        this.stats.decodeErrors++;
        this.logger.warn('Dropped malformed message', {
          topic,
          code: chronicleError.code,
          error: chronicleError.message,
        });
      } else {
        this.logger.error('Failed to relay message', chronicleError, { topic });
      }
    }
  }
}

export function createEventRelay(config: EventRelayConfig): EventRelay {
  return new EventRelay(config);
}
