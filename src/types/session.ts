import type { Session } from '../core/session.js';

/**
 * Persisted shape of a directory session.
 * One record per identity; groups are stored as an array rather than a
 * delimiter-joined string.
 */
export interface SessionRecord {
  /** User principal name, the primary key */
  identity: string;
  accessToken: string;
  refreshToken: string;
  /** Access token expiry in seconds since epoch */
  expiresAt: number;
  tokenType: string;
  resource: string;
  scope: string;
  /** Directory group ids */
  groups: string[];
}

/**
 * Durable session storage keyed by identity.
 */
export interface SessionStore {
  /**
   * Insert or fully replace the session stored under `session.identity`.
   */
  upsert(session: Session): Promise<void>;

  /**
   * Look up a session.
   * @returns The session, or undefined when none is stored for the identity
   */
  get(identity: string): Promise<Session | undefined>;
}
