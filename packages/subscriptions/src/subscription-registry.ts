/**
 * SubscriptionRegistry - live subscriptions indexed by id and by fingerprint
 *
 * Subscriptions with equal descriptors share one fingerprint entry, so a flush
 * is matched once per distinct query. An entry lives exactly as long as it has
 * subscriptions.
 */

import { RecordMatcher } from '@chronicle/core';
import type { FingerprintEntry, LiveSubscription } from './types.js';

export class SubscriptionRegistry {
  /** All subscriptions indexed by subscription ID */
  private readonly subscriptions = new Map<string, LiveSubscription>();
  /** Subscriptions grouped by fingerprint */
  private readonly byFingerprint = new Map<string, FingerprintEntry>();

  add(subscription: LiveSubscription): void {
    this.subscriptions.set(subscription.id, subscription);

    let entry = this.byFingerprint.get(subscription.fingerprint);
    if (!entry) {
      entry = {
        fingerprint: subscription.fingerprint,
        descriptor: subscription.descriptor,
        matcher: new RecordMatcher(subscription.descriptor),
        subscriptions: new Set(),
      };
      this.byFingerprint.set(subscription.fingerprint, entry);
    }
    entry.subscriptions.add(subscription);
  }

  /** Remove a subscription; drops its fingerprint entry with the last one */
  remove(subscription: LiveSubscription): boolean {
    if (this.subscriptions.get(subscription.id) !== subscription) return false;
    this.subscriptions.delete(subscription.id);

    const entry = this.byFingerprint.get(subscription.fingerprint);
    if (entry) {
      entry.subscriptions.delete(subscription);
      if (entry.subscriptions.size === 0) {
        this.byFingerprint.delete(subscription.fingerprint);
      }
    }
    return true;
  }

  get(id: string): LiveSubscription | undefined {
    return this.subscriptions.get(id);
  }

  /** Snapshot of the fingerprint entries */
  entries(): FingerprintEntry[] {
    return [...this.byFingerprint.values()];
  }

  /** Snapshot of every subscription */
  all(): LiveSubscription[] {
    return [...this.subscriptions.values()];
  }

  get size(): number {
    return this.subscriptions.size;
  }

  get fingerprintCount(): number {
    return this.byFingerprint.size;
  }
}
