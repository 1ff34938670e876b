/**
 * In-memory key/value backend
 */

import { DatastoreError, InternalError } from '@chronicle/core';
import { globToRegExp } from './keys.js';
import type { KeyValueBackend } from './types.js';

/**
 * Map-backed store with Redis glob semantics for `keys`. Used by tests and by
 * gateways started with `--datastore memory`.
 */
export class MemoryKeyValueBackend implements KeyValueBackend {
  private readonly entries = new Map<string, string>();
  private available = true;
  private closed = false;

  /** Number of stored keys */
  get size(): number {
    return this.entries.size;
  }

  setAvailable(available: boolean): void {
    this.available = available;
  }

  async get(key: string): Promise<string | null> {
    this.assertReady();
    return this.entries.get(key) ?? null;
  }

  async mget(keys: readonly string[]): Promise<Array<string | null>> {
    this.assertReady();
    return keys.map((key) => this.entries.get(key) ?? null);
  }

  async set(key: string, value: string): Promise<void> {
    this.assertReady();
    this.entries.set(key, value);
  }

  async mset(entries: ReadonlyMap<string, string>): Promise<void> {
    this.assertReady();
    for (const [key, value] of entries) {
      this.entries.set(key, value);
    }
  }

  async delete(keys: readonly string[]): Promise<number> {
    this.assertReady();
    let count = 0;
    for (const key of new Set(keys)) {
      if (this.entries.delete(key)) count++;
    }
    return count;
  }

  async keys(pattern: string): Promise<string[]> {
    this.assertReady();
    const matcher = globToRegExp(pattern);
    return [...this.entries.keys()].filter((key) => matcher.test(key));
  }

  async ping(): Promise<void> {
    this.assertReady();
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private assertReady(): void {
    if (this.closed) {
      throw new InternalError('CHRONICLE_X901', 'Key/value backend is closed');
    }
    if (!this.available) {
      throw new DatastoreError('CHRONICLE_K600');
    }
  }
}

export function createMemoryKeyValueBackend(): MemoryKeyValueBackend {
  return new MemoryKeyValueBackend();
}
