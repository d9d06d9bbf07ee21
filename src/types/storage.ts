/**
 * Generic key-value storage interface.
 * Compatible with Keyv API for easy integration.
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 *
 * const keyv = new Keyv({ namespace: 'directory-sessions' });
 * const store: KeyValueStore<SessionRecord> = {
 *   get: (key) => keyv.get<SessionRecord>(key),
 *   set: (key, value, ttl) => keyv.set(key, value, ttl),
 *   delete: (key) => keyv.delete(key),
 *   clear: () => keyv.clear(),
 * };
 * ```
 */
export interface KeyValueStore<T = unknown> {
  /**
   * Get a value by key.
   * @returns The value, or undefined if not found
   */
  get(key: string): Promise<T | undefined>;

  /**
   * Set a value, replacing whatever was stored under the key.
   * @param ttl - Optional TTL in milliseconds
   */
  set(key: string, value: T, ttl?: number): Promise<boolean>;

  /**
   * Delete a value by key.
   * @returns true if the key existed and was deleted
   */
  delete(key: string): Promise<boolean>;

  /**
   * Clear all values in this store/namespace.
   */
  clear(): Promise<void>;
}
