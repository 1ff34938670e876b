/**
 * Redis key/value backend (ioredis)
 */

import { Redis } from 'ioredis';
import { ChronicleError, DatastoreError, type Logger, createQuietLogger, toError } from '@chronicle/core';
import type { KeyValueBackend } from './types.js';

/**
 * The subset of the ioredis client the backend calls
 */
export interface RedisCommands {
  get(key: string): Promise<string | null>;
  mget(keys: string[]): Promise<Array<string | null>>;
  set(key: string, value: string): Promise<unknown>;
  mset(values: Map<string, string>): Promise<unknown>;
  del(keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;
  ping(): Promise<string>;
  quit(): Promise<unknown>;
}

export interface RedisBackendConfig {
  client: RedisCommands;
  logger?: Logger;
}

export class RedisKeyValueBackend implements KeyValueBackend {
  private readonly client: RedisCommands;
  private readonly logger: Logger;

  constructor(config: RedisBackendConfig) {
    this.client = config.client;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('redis');
  }

  async get(key: string): Promise<string | null> {
    return this.call('get', () => this.client.get(key));
  }

  async mget(keys: readonly string[]): Promise<Array<string | null>> {
    if (keys.length === 0) return [];
    return this.call('mget', () => this.client.mget([...keys]));
  }

  async set(key: string, value: string): Promise<void> {
    await this.call('set', () => this.client.set(key, value));
  }

  async mset(entries: ReadonlyMap<string, string>): Promise<void> {
    if (entries.size === 0) return;
    await this.call('mset', () => this.client.mset(new Map(entries)));
  }

  async delete(keys: readonly string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.call('del', () => this.client.del([...keys]));
  }

  async keys(pattern: string): Promise<string[]> {
    return this.call('keys', () => this.client.keys(pattern));
  }

  async ping(): Promise<void> {
    await this.call('ping', () => this.client.ping());
  }

  async close(): Promise<void> {
    await this.call('quit', () => this.client.quit());
  }

  private async call<T>(command: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (ChronicleError.isChronicleError(error)) throw error;
      const cause = toError(error);
      this.logger.warn('Redis command failed', { command, error: cause.message });
      throw new DatastoreError('CHRONICLE_K600', `Redis ${command} failed: ${cause.message}`, { command }, cause);
    }
  }
}

/**
 * Connect lazily to `url`; the first command opens the connection.
 */
export function createRedisBackend(config: { url: string; logger?: Logger }): RedisKeyValueBackend {
  const logger = config.logger ?? createQuietLogger('chronicle');
  const client = new Redis(config.url, { lazyConnect: true, maxRetriesPerRequest: 1 });
  client.on('error', (error: Error) => {
    logger.child('redis').warn('Connection error', { error: error.message });
  });
  return new RedisKeyValueBackend({ client, logger });
}
