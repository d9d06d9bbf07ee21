/**
 * A Keyv-compatible store interface.
 *
 * Matches the essential shape of a Keyv instance without requiring the exact
 * Keyv type, so any Keyv version (and any Keyv storage adapter) can be passed in.
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import KeyvRedis from '@keyv/redis';
 *
 * const inMemory = new Keyv();
 * const withRedis = new Keyv({ store: new KeyvRedis('redis://localhost:6379') });
 * ```
 */
export interface KeyvLike {
  get<T = unknown>(key: string): Promise<T | undefined>;
  set<T = unknown>(key: string, value: T, ttl?: number): Promise<boolean>;
  delete(key: string): Promise<boolean>;
  clear(): Promise<void>;

  /**
   * Options containing the underlying store.
   * Used to create namespaced instances over the same backend.
   */
  opts?: {
    store?: unknown;
  };
}
