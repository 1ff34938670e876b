/**
 * ConfigStore - namespaced documents over a key/value backend
 *
 * Values are stored as JSON under `namespace:id`. Every write and delete is
 * broadcast on the message bus, grouped by top-level namespace, so other
 * services can follow configuration changes.
 */

import { type Observable, Subject } from 'rxjs';
import { z } from 'zod';
import {
  ChronicleError,
  DatastoreError,
  type Logger,
  type MessageBus,
  ValidationError,
  createQuietLogger,
  toError,
  toValidationIssues,
} from '@chronicle/core';
import { KEY_PATTERN, storageKey, topLevelNamespace } from './keys.js';
import type { DatastoreChange, DatastoreValue, KeyValueBackend, MultiQuery } from './types.js';

export const DEFAULT_DATASTORE_TOPIC = 'telemetry/datastore';

const keyPart = z.string().regex(KEY_PATTERN, 'contains characters that are not allowed');

const valueSchema = z.object({ namespace: keyPart, id: keyPart }).passthrough();

const keySchema = z.object({ namespace: keyPart, id: keyPart.optional() });

const storedValueSchema = z.object({ namespace: z.string(), id: z.string() }).passthrough();

export interface ConfigStoreConfig {
  backend: KeyValueBackend;
  /** Bus for change broadcasts; changes are only emitted locally without one */
  bus?: MessageBus;
  /** Topic prefix for change broadcasts (default: telemetry/datastore) */
  topic?: string;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const store = createConfigStore({ backend: createMemoryKeyValueBackend(), bus });
 * await store.set({ namespace: 'dashboards', id: 'main', widgets: [] });
 * const values = await store.mget('dashboards', { filter: 'm*' });
 * ```
 */
export class ConfigStore {
  private readonly backend: KeyValueBackend;
  private readonly bus: MessageBus | undefined;
  private readonly topic: string;
  private readonly logger: Logger;
  private readonly changesSubject = new Subject<DatastoreChange>();

  constructor(config: ConfigStoreConfig) {
    this.backend = config.backend;
    this.bus = config.bus;
    this.topic = config.topic ?? DEFAULT_DATASTORE_TOPIC;
    this.logger = (config.logger ?? createQuietLogger('chronicle')).child('datastore');
  }

  /** Change broadcasts, one per top-level namespace per operation */
  get changes$(): Observable<DatastoreChange> {
    return this.changesSubject.asObservable();
  }

  async get(namespace: string, id: string): Promise<DatastoreValue | null> {
    const key = this.key(namespace, id);
    const raw = await this.call(() => this.backend.get(key));
    return raw === null ? null : this.decode(key, raw);
  }

  /** Values by ids and/or glob filter; all values in the namespace when neither is given */
  async mget(namespace: string, query: MultiQuery = {}): Promise<DatastoreValue[]> {
    const filter = query.ids === undefined && query.filter === undefined ? '*' : query.filter;
    const keys = await this.resolveKeys(namespace, query.ids, filter);
    if (keys.length === 0) return [];

    const raws = await this.call(() => this.backend.mget(keys));
    const values: DatastoreValue[] = [];
    raws.forEach((raw, index) => {
      if (raw !== null) values.push(this.decode(keys[index] ?? '', raw));
    });
    return values;
  }

  async set(value: DatastoreValue): Promise<DatastoreValue> {
    const parsed = valueSchema.safeParse(value);
    if (!parsed.success) {
      throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V303');
    }
    const checked = parsed.data;

    await this.call(() => this.backend.set(storageKey(checked.namespace, checked.id), JSON.stringify(checked)));
    await this.publishChanged([checked]);
    return checked;
  }

  async mset(values: readonly DatastoreValue[]): Promise<DatastoreValue[]> {
    const checked = this.validate(values);
    if (checked.length === 0) return [];

    const entries = new Map(checked.map((value) => [storageKey(value.namespace, value.id), JSON.stringify(value)]));
    await this.call(() => this.backend.mset(entries));
    await this.publishChanged(checked);
    return checked;
  }

  /** @returns the number of deleted values */
  async delete(namespace: string, id: string): Promise<number> {
    const key = this.key(namespace, id);
    const count = await this.call(() => this.backend.delete([key]));
    await this.publishDeleted([key]);
    return count;
  }

  /** Delete by ids and/or glob filter; nothing is deleted when neither is given */
  async mdelete(namespace: string, query: MultiQuery = {}): Promise<number> {
    const keys = await this.resolveKeys(namespace, query.ids, query.filter);
    if (keys.length === 0) return 0;

    const count = await this.call(() => this.backend.delete(keys));
    await this.publishDeleted(keys);
    return count;
  }

  /** @throws DatastoreError when the backend is unreachable */
  async ping(): Promise<void> {
    await this.call(() => this.backend.ping());
  }

  async close(): Promise<void> {
    this.changesSubject.complete();
    await this.backend.close();
  }

  // ── Private ──

  private key(namespace: string, id: string): string {
    this.validateKey({ namespace, id });
    return storageKey(namespace, id);
  }

  private validateKey(parts: { namespace: string; id?: string }): void {
    const parsed = keySchema.safeParse(parts);
    if (!parsed.success) {
      throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V303');
    }
  }

  private validate(values: readonly DatastoreValue[]): DatastoreValue[] {
    const parsed = z.array(valueSchema).safeParse(values);
    if (!parsed.success) {
      throw new ValidationError(toValidationIssues(parsed.error), 'CHRONICLE_V303');
    }
    return parsed.data;
  }

  private async resolveKeys(
    namespace: string,
    ids: readonly string[] | undefined,
    filter: string | undefined
  ): Promise<string[]> {
    this.validateKey({ namespace });
    const keys = (ids ?? []).map((id) => this.key(namespace, id));
    if (filter !== undefined) {
      keys.push(...(await this.call(() => this.backend.keys(storageKey(namespace, filter)))));
    }
    return [...new Set(keys)];
  }

  private decode(key: string, raw: string): DatastoreValue {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new DatastoreError('CHRONICLE_K600', `Stored value for ${key} is not valid JSON`, { key }, toError(error));
    }

    const parsed = storedValueSchema.safeParse(json);
    if (!parsed.success) {
      throw new DatastoreError('CHRONICLE_K600', `Stored value for ${key} has no namespace or id`, { key });
    }
    return parsed.data;
  }

  private async publishChanged(values: readonly DatastoreValue[]): Promise<void> {
    const groups = groupByNamespace(values, (value) => storageKey(value.namespace, value.id));
    for (const [namespace, changed] of groups) {
      await this.publish({ topic: `${this.topic}/${namespace}`, changed });
    }
  }

  private async publishDeleted(keys: readonly string[]): Promise<void> {
    const groups = groupByNamespace(keys, (key) => key);
    for (const [namespace, deleted] of groups) {
      await this.publish({ topic: `${this.topic}/${namespace}`, deleted });
    }
  }

  private async publish(change: DatastoreChange): Promise<void> {
    this.changesSubject.next(change);
    if (!this.bus) return;

    const { topic, ...payload } = change;
    try {
      await this.bus.publish(topic, JSON.stringify(payload));
    } catch (error) {
      this.logger.warn('Change broadcast failed', { topic, error: toError(error).message });
    }
  }

  private async call<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (ChronicleError.isChronicleError(error)) throw error;
      const cause = toError(error);
      throw new DatastoreError('CHRONICLE_K600', cause.message, undefined, cause);
    }
  }
}

/** Sort by storage key and group by its top-level namespace */
function groupByNamespace<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const sorted = [...items].sort((a, b) => (keyOf(a) < keyOf(b) ? -1 : keyOf(a) > keyOf(b) ? 1 : 0));
  const groups = new Map<string, T[]>();
  for (const item of sorted) {
    const namespace = topLevelNamespace(keyOf(item));
    const group = groups.get(namespace);
    if (group) {
      group.push(item);
    } else {
      groups.set(namespace, [item]);
    }
  }
  return groups;
}

export function createConfigStore(config: ConfigStoreConfig): ConfigStore {
  return new ConfigStore(config);
}
