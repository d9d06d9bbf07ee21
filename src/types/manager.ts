import type { Session } from '../core/session.js';
import type { Logger } from '../utils/logger.js';
import type { IDirectoryClient, NamedGroup } from './directory.js';
import type { ITokenClient } from './idp.js';
import type { SessionStore } from './session.js';

/**
 * Configuration for the session manager.
 */
export interface SessionManagerConfig {
  /** Client for the identity provider's token endpoint */
  tokenClient: ITokenClient;
  /** Client for the directory's group queries */
  directoryClient: IDirectoryClient;
  /** Where sessions are persisted */
  sessionStore: SessionStore;
  /**
   * Group id that grants baseline access.
   * When unset, every authenticated session is authorized.
   */
  authGroup?: string;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Session manager instance.
 */
export interface SessionManager {
  /**
   * Turn an authorization code into a stored session with resolved groups.
   * Nothing is persisted unless both the token exchange and the group lookup succeed.
   * @throws AuthError
   */
  completeLogin(code: string): Promise<Session>;

  /**
   * Load the session stored for an identity, refreshing it when expired.
   * @returns The usable session, or undefined when no session is stored
   * @throws AuthError when an expired session cannot be refreshed
   */
  resolve(identity: string): Promise<Session | undefined>;

  /**
   * Whether the session holds the baseline group.
   */
  isAuthorized(session: Session): boolean;

  /**
   * The session's groups paired with their display names.
   * Groups missing from the directory listing are named `unknown`.
   * @throws AuthError
   */
  getNamedGroups(session: Session): Promise<NamedGroup[]>;
}
