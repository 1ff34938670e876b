/**
 * Types for the key/value configuration store
 */

/**
 * A stored document. Any properties besides `namespace` and `id` are kept as-is.
 */
export interface DatastoreValue {
  namespace: string;
  id: string;
  [property: string]: unknown;
}

/** Selects values in a namespace by explicit ids, a glob filter, or both */
export interface MultiQuery {
  ids?: readonly string[];
  /** Redis-style glob (`*`, `?`, `[abc]`) applied to ids */
  filter?: string;
}

/**
 * A change broadcast on the bus, grouped by top-level namespace
 */
export type DatastoreChange =
  | { readonly topic: string; readonly changed: readonly DatastoreValue[] }
  | { readonly topic: string; readonly deleted: readonly string[] };

/**
 * Raw string storage behind the config store.
 *
 * Failures reject with a `DatastoreError`.
 */
export interface KeyValueBackend {
  get(key: string): Promise<string | null>;
  /** One entry per key, null where missing */
  mget(keys: readonly string[]): Promise<Array<string | null>>;
  set(key: string, value: string): Promise<void>;
  mset(entries: ReadonlyMap<string, string>): Promise<void>;
  /** @returns the number of keys that existed */
  delete(keys: readonly string[]): Promise<number>;
  /** Keys matching a glob pattern */
  keys(pattern: string): Promise<string[]>;
  ping(): Promise<void>;
  close(): Promise<void>;
}
