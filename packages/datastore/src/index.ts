/**
 * @chronicle/datastore - namespaced key/value configuration store
 *
 * @example
 * ```typescript
 * import { createConfigStore, createRedisBackend } from '@chronicle/datastore';
 *
 * const store = createConfigStore({ backend: createRedisBackend({ url: 'redis://redis' }), bus });
 * store.changes$.subscribe((change) => console.log(change.topic));
 * ```
 */

export type { DatastoreChange, DatastoreValue, KeyValueBackend, MultiQuery } from './types.js';

export { KEY_PATTERN, globToRegExp, storageKey, topLevelNamespace } from './keys.js';

export { MemoryKeyValueBackend, createMemoryKeyValueBackend } from './memory-backend.js';

export {
  RedisKeyValueBackend,
  createRedisBackend,
  type RedisBackendConfig,
  type RedisCommands,
} from './redis-backend.js';

export {
  ConfigStore,
  DEFAULT_DATASTORE_TOPIC,
  createConfigStore,
  type ConfigStoreConfig,
} from './config-store.js';
