/**
 * Types for live query subscriptions
 */

import type { ChronicleError, QueryDescriptor, TelemetryRecord } from '@chronicle/core';
import type { RecordMatcher } from '@chronicle/core';

/**
 * Records pushed to one subscription
 */
export interface LiveBatch {
  readonly subscriptionId: string;
  /** True for the one-shot historical result, false for live records */
  readonly initial: boolean;
  /** Ascending by timestamp */
  readonly records: readonly TelemetryRecord[];
}

/** Why a subscription ended */
export type CloseReason = 'unsubscribed' | 'complete' | 'sink-error' | 'shutdown';

/**
 * Output channel of a subscription. A `push` that throws or rejects closes
 * the subscription with a `SinkError`.
 */
export interface LiveSink {
  push(batch: LiveBatch): void | Promise<void>;
  /** Non-fatal problems, such as a failed historical query */
  error?(error: ChronicleError): void;
  /** Called once when the subscription closes */
  close?(reason: CloseReason, error?: ChronicleError): void;
}

export type SubscriptionState = 'open' | 'closed';

/**
 * Returned by `subscribe`; identifies the subscription for `unsubscribe`
 */
export interface SubscriptionHandle {
  readonly id: string;
  readonly fingerprint: string;
  /** Creation time; live delivery starts here */
  readonly createdAt: number;
}

/**
 * Part of a subscription's range that precedes its creation. Records in it can
 * still arrive through flushes that complete after creation; those the
 * historical batch already returned are skipped by identity.
 */
export interface Backfill {
  readonly start: number;
  readonly end: number;
  /** Identities of the historical records; null until the history step ran */
  seen: Set<string> | null;
}

/**
 * Server-side state of one subscription. Owned by the live query stream.
 */
export interface LiveSubscription extends SubscriptionHandle {
  readonly descriptor: QueryDescriptor;
  readonly sink: LiveSink;
  /** Lowest timestamp still deliverable; advances to the last pushed timestamp */
  cursor: number;
  readonly backfill: Backfill | null;
  state: SubscriptionState;
  /** Tail of this subscription's ordered delivery chain */
  chain: Promise<void>;
  delivered: number;
}

/**
 * Subscriptions sharing one fingerprint; evaluated once per flush
 */
export interface FingerprintEntry {
  readonly fingerprint: string;
  readonly descriptor: QueryDescriptor;
  readonly matcher: RecordMatcher;
  readonly subscriptions: Set<LiveSubscription>;
}

/**
 * Aggregate statistics
 */
export interface LiveQueryStats {
  subscriptions: number;
  fingerprints: number;
  evaluations: number;
  recordsDelivered: number;
  sinkErrors: number;
}
