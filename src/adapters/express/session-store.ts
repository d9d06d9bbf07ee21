import { Store, type SessionData } from 'express-session';
import type { KeyValueStore } from '../../types/storage.js';

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * express-session store over a Keyv-compatible backend.
 *
 * Holds only the cookie-bound browser session (which identity is signed in);
 * the directory session itself lives in the SessionStore.
 *
 * @example
 * ```typescript
 * import session from 'express-session';
 * import { Keyv } from 'keyv';
 *
 * app.use(session({
 *   store: new KeyvSessionStore(createKeyvStore(new Keyv({ namespace: 'express-sessions' }))),
 *   secret: process.env.SESSION_SECRET!,
 *   resave: false,
 *   saveUninitialized: false,
 * }));
 * ```
 */
export class KeyvSessionStore extends Store {
  private readonly store: KeyValueStore<SessionData>;

  constructor(store: KeyValueStore<SessionData>) {
    super();
    this.store = store;
  }

  override get(
    sid: string,
    callback: (err?: Error | null, session?: SessionData | null) => void
  ): void {
    void this.store.get(sid).then(
      (session) => callback(null, session ?? null),
      (error: unknown) => callback(toError(error))
    );
  }

  /**
   * Store a session; the TTL follows the cookie's remaining lifetime.
   */
  override set(sid: string, session: SessionData, callback?: (err?: Error) => void): void {
    const ttl = session.cookie.maxAge ?? undefined;
    void this.store.set(sid, session, ttl).then(
      () => callback?.(),
      (error: unknown) => callback?.(toError(error))
    );
  }

  override destroy(sid: string, callback?: (err?: Error) => void): void {
    void this.store.delete(sid).then(
      () => callback?.(),
      (error: unknown) => callback?.(toError(error))
    );
  }

  /**
   * Re-set the session to extend its TTL.
   */
  override touch(sid: string, session: SessionData, callback?: (err?: Error) => void): void {
    this.set(sid, session, callback);
  }
}
