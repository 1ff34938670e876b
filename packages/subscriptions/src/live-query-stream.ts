/**
 * LiveQueryStream - continuous query results driven by the write buffer
 *
 * Every completed flush is matched once per distinct query fingerprint and the
 * matching records are pushed to each subscriber past its cursor. A subscriber
 * with a range start first receives the stored history up to its creation
 * time, then live records from that time on. Records of that earlier span
 * that were still buffered at creation follow with the live records once
 * flushed. A subscription with a range end completes on the first flush
 * completed at or after it.
 */

import type { Observable, Subscription } from 'rxjs';
import {
  type ChronicleError,
  InternalError,
  type Logger,
  type QueryDescriptor,
  SinkError,
  type TelemetryRecord,
  createQuietLogger,
  ensureChronicleError,
  fingerprintOf,
  toError,
  validateQueryDescriptor,
  withRange,
} from '@chronicle/core';
import type { FlushCompleted } from '@chronicle/ingestion';
import { SubscriptionRegistry } from './subscription-registry.js';
import type {
  Backfill,
  CloseReason,
  LiveBatch,
  LiveQueryStats,
  LiveSink,
  LiveSubscription,
  SubscriptionHandle,
  SubscriptionState,
} from './types.js';

/** Historical query source, usually a `QueryEngine` */
export interface HistoryProvider {
  query(descriptor: QueryDescriptor): Promise<TelemetryRecord[]>;
}

export interface LiveQueryStreamConfig {
  /** Completed flushes, usually `WriteBuffer.flushed$` */
  flushes: Observable<FlushCompleted>;
  history: HistoryProvider;
  logger?: Logger;
  /** Clock, for tests */
  now?: () => number;
}

function generateSubscriptionId(): string {
  return `sub_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * @example
 * ```typescript
 * const stream = createLiveQueryStream({ flushes: buffer.flushed$, history: engine });
 * const handle = stream.subscribe(descriptor, {
 *   push: (batch) => socket.send(JSON.stringify(batch)),
 * });
 * stream.unsubscribe(handle.id);
 * ```
 */
export class LiveQueryStream {
  private readonly registry = new SubscriptionRegistry();
  private readonly history: HistoryProvider;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly flushSubscription: Subscription;
  private closed = false;
  private evaluations = 0;
  private recordsDelivered = 0;
  private sinkErrors = 0;

  constructor(config: LiveQueryStreamConfig) {
    this.history = config.history;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('live');
    this.now = config.now ?? Date.now;
    this.flushSubscription = config.flushes.subscribe((event) => this.onFlush(event));
  }

  /**
   * Register a live query.
   *
   * @throws ValidationError for a malformed descriptor
   * @throws InternalError after {@link close}
   */
  subscribe(descriptor: QueryDescriptor, sink: LiveSink): SubscriptionHandle {
    validateQueryDescriptor(descriptor);
    if (this.closed) {
      throw new InternalError('CHRONICLE_X901', 'Live query stream is closed');
    }

    const createdAt = this.now();
    const { start, end } = descriptor.range;
    const historyEnd = end === undefined ? createdAt : Math.min(end, createdAt);
    const subscription: LiveSubscription = {
      id: generateSubscriptionId(),
      fingerprint: fingerprintOf(descriptor),
      createdAt,
      descriptor,
      sink,
      cursor: start === undefined ? createdAt : Math.max(createdAt, start),
      backfill: start !== undefined && start < historyEnd ? { start, end: historyEnd, seen: null } : null,
      state: 'open',
      chain: Promise.resolve(),
      delivered: 0,
    };
    this.registry.add(subscription);
    this.logger.debug('Subscribed', { id: subscription.id, fingerprint: subscription.fingerprint });

    if (start !== undefined) {
      this.enqueue(subscription, () => this.deliverHistory(subscription, start, historyEnd));
      if (end !== undefined && end <= createdAt) {
        this.enqueue(subscription, () => this.closeSubscription(subscription, 'complete'));
      }
    }

    return { id: subscription.id, fingerprint: subscription.fingerprint, createdAt };
  }

  /** @returns false when the subscription is unknown or already closed */
  unsubscribe(handle: string | SubscriptionHandle): boolean {
    const subscription = this.registry.get(typeof handle === 'string' ? handle : handle.id);
    if (!subscription) return false;
    this.closeSubscription(subscription, 'unsubscribed');
    return true;
  }

  getState(id: string): SubscriptionState {
    return this.registry.get(id)?.state ?? 'closed';
  }

  /** Resolves once every queued push has settled */
  async whenIdle(): Promise<void> {
    await Promise.all(this.registry.all().map((subscription) => subscription.chain));
  }

  getStats(): LiveQueryStats {
    return {
      subscriptions: this.registry.size,
      fingerprints: this.registry.fingerprintCount,
      evaluations: this.evaluations,
      recordsDelivered: this.recordsDelivered,
      sinkErrors: this.sinkErrors,
    };
  }

  /** Close every subscription with reason `shutdown` and detach from the flush stream */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.flushSubscription.unsubscribe();
    for (const subscription of this.registry.all()) {
      this.closeSubscription(subscription, 'shutdown');
    }
  }

  // ── Private ──

  private onFlush(event: FlushCompleted): void {
    for (const entry of this.registry.entries()) {
      this.evaluations++;
      const matches = entry.matcher.select(event.records);
      const { end } = entry.descriptor.range;
      const ended = end !== undefined && event.completedAt >= end;

      for (const subscription of entry.subscriptions) {
        const fresh = matches.filter((record) => record.timestamp >= subscription.cursor);
        const late = subscription.backfill ? matches.filter(inBackfill(subscription.backfill)) : [];
        const last = fresh[fresh.length - 1];
        if (last) subscription.cursor = last.timestamp;

        if (fresh.length > 0 || late.length > 0) {
          this.enqueue(subscription, () => {
            const records = late.filter(unseen(subscription.backfill)).concat(fresh);
            if (records.length === 0) return;
            return this.push(subscription, { initial: false, records });
          });
        }
        if (ended) {
          this.enqueue(subscription, () => this.closeSubscription(subscription, 'complete'));
        }
      }
    }
  }

  private async deliverHistory(subscription: LiveSubscription, start: number, end: number): Promise<void> {
    let records: TelemetryRecord[] = [];
    if (start < end) {
      try {
        records = await this.history.query(withRange(subscription.descriptor, { start, end }));
      } catch (error) {
        const reported = ensureChronicleError(error, 'CHRONICLE_B202');
        this.logger.warn('Historical query failed', { id: subscription.id, code: reported.code });
        this.report(subscription, reported);
        if (subscription.backfill) subscription.backfill.seen = new Set();
        return;
      }
    }
    if (subscription.backfill) subscription.backfill.seen = new Set(records.map(identityOf));
    await this.push(subscription, { initial: true, records });
  }

  private async push(
    subscription: LiveSubscription,
    batch: Omit<LiveBatch, 'subscriptionId'>
  ): Promise<void> {
    if (subscription.state !== 'open') return;
    await subscription.sink.push({ subscriptionId: subscription.id, ...batch });
    subscription.delivered += batch.records.length;
    this.recordsDelivered += batch.records.length;
  }

  /** Append a step to the subscription's delivery chain; a failing step closes it */
  private enqueue(subscription: LiveSubscription, step: () => void | Promise<void>): void {
    subscription.chain = subscription.chain
      .then(async () => {
        if (subscription.state === 'open') await step();
      })
      .catch((error: unknown) => this.onSinkFailure(subscription, error));
  }

  private onSinkFailure(subscription: LiveSubscription, error: unknown): void {
    const sinkError =
      error instanceof SinkError
        ? error
        : new SinkError(subscription.id, 'CHRONICLE_S500', toError(error).message, toError(error));
    this.sinkErrors++;
    this.logger.warn('Sink failed, closing subscription', {
      id: subscription.id,
      code: sinkError.code,
      error: sinkError.message,
    });
    this.closeSubscription(subscription, 'sink-error', sinkError);
  }

  private report(subscription: LiveSubscription, error: ChronicleError): void {
    try {
      subscription.sink.error?.(error);
    } catch (failure) {
      this.logger.error('Sink error callback failed', toError(failure), { id: subscription.id });
    }
  }

  private closeSubscription(subscription: LiveSubscription, reason: CloseReason, error?: ChronicleError): void {
    if (subscription.state === 'closed') return;
    subscription.state = 'closed';
    this.registry.remove(subscription);
    this.logger.debug('Subscription closed', { id: subscription.id, reason });

    try {
      subscription.sink.close?.(reason, error);
    } catch (failure) {
      this.logger.error('Sink close callback failed', toError(failure), { id: subscription.id });
    }
  }
}

/** Records sharing source, measurement and timestamp are one stored point */
function identityOf(record: TelemetryRecord): string {
  return `${record.source}\u0000${record.measurement}\u0000${record.timestamp}`;
}

function inBackfill(backfill: Backfill): (record: TelemetryRecord) => boolean {
  return (record) => record.timestamp >= backfill.start && record.timestamp < backfill.end;
}

function unseen(backfill: Backfill | null): (record: TelemetryRecord) => boolean {
  return (record) => !backfill?.seen?.has(identityOf(record));
}

export function createLiveQueryStream(config: LiveQueryStreamConfig): LiveQueryStream {
  return new LiveQueryStream(config);
}
