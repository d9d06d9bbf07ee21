import type { NamedGroup } from '../types/directory.js';
import type { SessionManager, SessionManagerConfig } from '../types/manager.js';
import { createConsoleLogger, describeError } from '../utils/logger.js';
import { AuthError } from './errors.js';
import { Session } from './session.js';

/**
 * Create a session manager.
 *
 * The manager is the only writer to the session store. It answers two
 * questions: "who just signed in?" (`completeLogin`) and "is this identity's
 * session still usable?" (`resolve`).
 *
 * @param config - Clients, store and baseline group
 * @returns SessionManager instance
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import {
 *   createSessionManager,
 *   createSessionStore,
 *   createKeyvStore,
 *   TokenClient,
 *   DirectoryClient,
 * } from 'directory-session-auth';
 *
 * const manager = createSessionManager({
 *   tokenClient: new TokenClient({ ... }),
 *   directoryClient: new DirectoryClient({ graphUrl: 'https://graph.windows.net' }),
 *   sessionStore: createSessionStore(createKeyvStore(new Keyv())),
 *   authGroup: process.env.AD_AUTH_GROUP,
 * });
 *
 * const session = await manager.completeLogin(code);
 * // later, on every request:
 * const current = await manager.resolve(session.identity);
 * ```
 */
export function createSessionManager(config: SessionManagerConfig): SessionManager {
  const { tokenClient, directoryClient, sessionStore, authGroup } = config;
  const logger = config.logger ?? createConsoleLogger();

  // One in-flight refresh per identity; concurrent resolvers share it.
  const refreshing = new Map<string, Promise<Session>>();

  const refresh = async (stale: Session): Promise<Session> => {
    logger.info('Refreshing expired session', {
      identity: stale.identity,
      expiresAt: stale.expiresAt,
    });

    try {
      if (stale.refreshToken.length === 0) {
        throw new AuthError('MissingField', 'Stored session has no refresh token');
      }
      const tokens = await tokenClient.refresh(stale.refreshToken);
      // Groups are resolved with the new access token, never the expired one.
      const groups = await directoryClient.getUserGroups(tokens.accessToken);
      const session = stale.withRefresh(tokens, groups);
      await sessionStore.upsert(session);

      logger.info('Session refreshed', {
        identity: session.identity,
        expiresAt: session.expiresAt,
      });
      return session;
    } catch (error) {
      logger.error('Session refresh failed', {
        identity: stale.identity,
        error: describeError(error),
      });
      throw error;
    }
  };

  // A resolver may have read the stale row just before another one stored
  // the refreshed session; its refresh token has been rotated since.
  const refreshLatest = async (stale: Session): Promise<Session> => {
    const latest = (await sessionStore.get(stale.identity)) ?? stale;
    if (!latest.isExpired()) {
      return latest;
    }
    return refresh(latest);
  };

  const refreshOnce = (stale: Session): Promise<Session> => {
    const pending = refreshing.get(stale.identity);
    if (pending) {
      return pending;
    }

    const promise = refreshLatest(stale).finally(() => {
      refreshing.delete(stale.identity);
    });
    refreshing.set(stale.identity, promise);
    return promise;
  };

  return {
    async completeLogin(code: string): Promise<Session> {
      const exchange = await tokenClient.exchangeCode(code);
      const groups = await directoryClient.getUserGroups(exchange.accessToken);

      const session = new Session(
        {
          identity: exchange.identity,
          accessToken: exchange.accessToken,
          refreshToken: exchange.refreshToken,
          expiresAt: exchange.expiresAt,
          tokenType: exchange.tokenType,
          resource: exchange.resource,
          scope: exchange.scope,
          groups,
        },
        logger
      );
      await sessionStore.upsert(session);

      logger.info('User session created', {
        identity: session.identity,
        groups: session.groups.size,
      });
      return session;
    },

    async resolve(identity: string): Promise<Session | undefined> {
      const stored = await sessionStore.get(identity);
      if (!stored) {
        logger.debug('Session not found', { identity });
        return undefined;
      }

      if (!stored.isExpired()) {
        return stored;
      }

      return refreshOnce(stored);
    },

    isAuthorized(session: Session): boolean {
      if (!authGroup) {
        return true;
      }
      return session.hasGroup(authGroup);
    },

    async getNamedGroups(session: Session): Promise<NamedGroup[]> {
      const names = await directoryClient.getAllGroups(session.accessToken);
      return [...session.groups].map((id) => ({ id, name: names.get(id) ?? 'unknown' }));
    },
  };
}
