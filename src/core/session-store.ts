import { Keyv } from 'keyv';
import type { KeyValueStore } from '../types/storage.js';
import type { KeyvLike } from '../types/store.js';
import type { SessionRecord, SessionStore } from '../types/session.js';
import { createConsoleLogger, type Logger } from '../utils/logger.js';
import { Session } from './session.js';

/**
 * Options for the session store.
 */
export interface SessionStoreOptions {
  /**
   * TTL in milliseconds applied to every write.
   * Unset by default: sessions stay until overwritten.
   */
  ttl?: number;
  /** Logger for the store and the sessions it loads */
  logger?: Logger;
}

/**
 * Create a session store over a key-value backend.
 *
 * Every write replaces the whole record stored under the identity, so two
 * concurrent upserts resolve to one of the two records (last writer wins),
 * never a mix of both.
 *
 * @param store - The underlying key-value store
 * @param options - TTL and logger
 * @returns SessionStore implementation
 */
export function createSessionStore(
  store: KeyValueStore<SessionRecord>,
  options?: SessionStoreOptions
): SessionStore {
  const logger = options?.logger ?? createConsoleLogger();

  return {
    async upsert(session: Session): Promise<void> {
      await store.set(session.identity, session.toRecord(), options?.ttl);
    },

    async get(identity: string): Promise<Session | undefined> {
      const record = await store.get(identity);
      if (!record) {
        return undefined;
      }
      if (record.identity !== identity) {
        logger.warn('Stored session belongs to another identity', {
          identity,
          storedIdentity: record.identity,
        });
        return undefined;
      }
      return Session.fromRecord(record, logger);
    },
  };
}

/**
 * Create a KeyValueStore wrapper around a Keyv instance.
 */
export function createKeyvStore<T>(keyv: KeyvLike): KeyValueStore<T> {
  return {
    get: (key: string) => keyv.get<T>(key),
    set: (key: string, value: T, ttl?: number) => keyv.set(key, value, ttl),
    delete: (key: string) => keyv.delete(key),
    clear: () => keyv.clear(),
  };
}

/**
 * Create a Keyv instance in its own namespace over the backend of `store`.
 * Falls back to `store` itself when it exposes no underlying backend.
 */
export function createNamespacedKeyv(store: KeyvLike, namespace: string, ttl?: number): KeyvLike {
  const underlyingStore = store.opts?.store;
  if (underlyingStore === undefined) {
    return store;
  }
  return new Keyv({ store: underlyingStore as Keyv['opts']['store'], namespace, ttl });
}
