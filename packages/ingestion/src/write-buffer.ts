/**
 * Append-only write buffer with batched, retried flushes to the time-series backend.
 */
import { type Observable, Subject, type Subscription, interval } from 'rxjs';
import {
  BufferOverflowError,
  type Logger,
  type TelemetryRecord,
  createQuietLogger,
  toError,
} from '@chronicle/core';
import type { TimeSeriesBackend } from '@chronicle/time-series';

export interface WriteBufferConfig {
  backend: TimeSeriesBackend;
  /** Flush cadence (default: 1000) */
  flushIntervalMs?: number;
  /** Pending size that triggers an early flush (default: 1000) */
  flushThreshold?: number;
  /** Pending size above which the oldest records are dropped (default: 100000) */
  maxPendingRecords?: number;
  logger?: Logger;
  /** Clock, for tests */
  now?: () => number;
}

/** Published after every successful flush */
export interface FlushCompleted {
  /** Count of successful flushes so far, starting at 1 */
  readonly generation: number;
  /** The flushed records, in enqueue order */
  readonly records: readonly TelemetryRecord[];
  readonly completedAt: number;
}

/** Published whenever records are dropped to respect `maxPendingRecords` */
export interface BufferOverflowEvent {
  readonly error: BufferOverflowError;
  readonly dropped: readonly TelemetryRecord[];
  readonly occurredAt: number;
}

export interface WriteBufferStats {
  enqueued: number;
  flushed: number;
  failedFlushes: number;
  dropped: number;
  pending: number;
  generation: number;
  lastFlushAt: number | null;
  running: boolean;
}

/** Anything records can be handed to */
export interface RecordSink {
  enqueue(record: TelemetryRecord): void;
}

/**
 * Accumulates records and writes them to the backend in batches.
 *
 * `enqueue` never waits and never fails because of the backend. A failed batch
 * is put back in front of the records that arrived meanwhile and retried on the
 * next cycle; reaching the threshold does not trigger another attempt before
 * then. Only a successful flush makes records visible on `flushed$`.
 *
 * @example
 * ```typescript
 * const buffer = createWriteBuffer({ backend, flushIntervalMs: 1000 });
 * buffer.flushed$.subscribe(({ generation, records }) => console.log(generation, records.length));
 * buffer.start();
 *
 * buffer.enqueue(record);
 * await buffer.stop(); // final flush
 * ```
 */
export class WriteBuffer implements RecordSink {
  private readonly config: Required<Omit<WriteBufferConfig, 'logger' | 'now' | 'backend'>>;
  private readonly backend: TimeSeriesBackend;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly flushedSubject = new Subject<FlushCompleted>();
  private readonly overflowSubject = new Subject<BufferOverflowEvent>();
  private pending: TelemetryRecord[] = [];
  private inFlight: Promise<void> | null = null;
  private timer: Subscription | null = null;
  private stopped = false;
  /** Set by a failed write; suppresses threshold flushes until the next tick */
  private backingOff = false;
  private stats: Omit<WriteBufferStats, 'pending' | 'running'> = {
    enqueued: 0,
    flushed: 0,
    failedFlushes: 0,
    dropped: 0,
    generation: 0,
    lastFlushAt: null,
  };

  constructor(config: WriteBufferConfig) {
    this.backend = config.backend;
    this.config = {
      flushIntervalMs: config.flushIntervalMs ?? 1000,
      flushThreshold: config.flushThreshold ?? 1000,
      maxPendingRecords: config.maxPendingRecords ?? 100_000,
    };
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('buffer');
    this.now = config.now ?? Date.now;
  }

  /** Successful flushes */
  get flushed$(): Observable<FlushCompleted> {
    return this.flushedSubject.asObservable();
  }

  /** Data loss reports */
  get overflow$(): Observable<BufferOverflowEvent> {
    return this.overflowSubject.asObservable();
  }

  /** Start the periodic flush loop */
  start(): void {
    if (this.timer || this.stopped) return;
    this.timer = interval(this.config.flushIntervalMs).subscribe(() => {
      this.backingOff = false;
      void this.flush();
    });
    this.logger.debug('Flush loop started', { intervalMs: this.config.flushIntervalMs });
  }

  /** Accept a record. Returns immediately. */
  enqueue(record: TelemetryRecord): void {
    if (this.stopped) {
      this.logger.warn('Record enqueued after stop will not be flushed', {
        source: record.source,
        measurement: record.measurement,
      });
    }

    this.pending.push(record);
    this.stats.enqueued++;
    this.enforceLimit();

    if (!this.stopped && !this.backingOff && this.pending.length >= this.config.flushThreshold) {
      void this.flush();
    }
  }

  /**
   * Write pending records. Callers arriving while a flush runs share it.
   * Never rejects: failures keep the records pending.
   */
  flush(): Promise<void> {
    if (this.inFlight) return this.inFlight;
    if (this.pending.length === 0) return Promise.resolve();

    this.inFlight = this.writePending().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Stop the loop, wait for a running flush, then attempt one final flush */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.timer?.unsubscribe();
    this.timer = null;

    if (this.inFlight) await this.inFlight;
    await this.flush();

    if (this.pending.length > 0) {
      this.logger.warn('Stopped with unflushed records', { pending: this.pending.length });
    }

    this.flushedSubject.complete();
    this.overflowSubject.complete();
    this.logger.debug('Stopped', { generation: this.stats.generation });
  }

  /** Records waiting for a flush, oldest first */
  getPending(): readonly TelemetryRecord[] {
    return [...this.pending];
  }

  getStats(): WriteBufferStats {
    return {
      ...this.stats,
      pending: this.pending.length,
      running: this.timer !== null,
    };
  }

  // ── Private ──────────────────────────────────────────────────────────

  private async writePending(): Promise<void> {
    const batch = this.pending;
    this.pending = [];
    const end = this.logger.time('flush');

    try {
      await this.backend.write(batch);
    } catch (error) {
      this.pending = batch.concat(this.pending);
      this.stats.failedFlushes++;
      this.backingOff = true;
      this.logger.warn('Flush failed, records kept for the next attempt', {
        records: batch.length,
        pending: this.pending.length,
        error: toError(error).message,
      });
      this.enforceLimit();
      return;
    }

    this.backingOff = false;
    const completedAt = this.now();
    this.stats.generation++;
    this.stats.flushed += batch.length;
    this.stats.lastFlushAt = completedAt;
    end({ generation: this.stats.generation, records: batch.length });

    this.flushedSubject.next({ generation: this.stats.generation, records: batch, completedAt });
  }

  private enforceLimit(): void {
    const excess = this.pending.length - this.config.maxPendingRecords;
    if (excess <= 0) return;

    const dropped = this.pending.splice(0, excess);
    this.stats.dropped += excess;

    const error = new BufferOverflowError(excess, this.config.maxPendingRecords);
    this.logger.warn(error.message, { dropped: excess, limit: this.config.maxPendingRecords });
    this.overflowSubject.next({ error, dropped, occurredAt: this.now() });
  }
}

export function createWriteBuffer(config: WriteBufferConfig): WriteBuffer {
  return new WriteBuffer(config);
}
