/**
 * directory-session-auth
 *
 * Sessions for users who sign in through an OAuth2 identity provider and are
 * authorized by directory group membership.
 *
 * ## Package Exports
 *
 * - `directory-session-auth` - Session manager, clients, store, configuration
 * - `directory-session-auth/express` - setupSessionAuthExpress, middleware and guards
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import { loadConfigFromEnv } from 'directory-session-auth';
 * import { setupSessionAuthExpress } from 'directory-session-auth/express';
 *
 * const config = loadConfigFromEnv();
 * const { app, requireAuthorized, requireGroup } = setupSessionAuthExpress({
 *   config,
 *   store: new Keyv(),
 *   secret: process.env.SESSION_SECRET!,
 * });
 *
 * app.get('/', requireAuthorized, (req, res) => {
 *   res.json({ identity: req.directorySession?.identity });
 * });
 * app.get('/admin', requireGroup(process.env.ADMIN_GROUP_ID!), adminHandler);
 *
 * app.listen(3000);
 * ```
 *
 * @packageDocumentation
 */

// Session manager
export { createSessionManager } from './core/session-manager.js';

// Session entity
export { Session, nowInSeconds } from './core/session.js';
export type { SessionData } from './core/session.js';

// Session store utilities
export { createSessionStore, createKeyvStore, createNamespacedKeyv } from './core/session-store.js';
export type { SessionStoreOptions } from './core/session-store.js';

// Identity provider clients
export { TokenClient } from './oidc/token-client.js';
export type { TokenClientConfig } from './oidc/token-client.js';
export { createSignInUrl } from './oidc/sign-in.js';
export type { SignInUrlConfig } from './oidc/sign-in.js';

// Directory client
export { DirectoryClient } from './directory/client.js';
export type { DirectoryClientConfig } from './directory/client.js';

// Errors
export { AuthError, isAuthError, authErrorStatus } from './core/errors.js';
export type { AuthErrorKind, AuthErrorOptions } from './core/errors.js';

// All types
export type {
  ITokenClient,
  CodeExchangeResult,
  RefreshedTokens,
  IdentityClaims,
  IDirectoryClient,
  NamedGroup,
  SessionRecord,
  SessionStore,
  SessionManager,
  SessionManagerConfig,
  KeyValueStore,
  KeyvLike,
} from './types/index.js';

// Logger utilities
export { createConsoleLogger, noopLogger, describeError } from './utils/logger.js';
export type { Logger, LogLevel, ConsoleLoggerOptions } from './utils/logger.js';

// HTTP utilities
export type { FetchLike } from './utils/http.js';

// Configuration
export {
  resolveConfig,
  loadConfigFromEnv,
  CONFIG_ENV_VARS,
  EXPIRY_SKEW_SECONDS,
  GRAPH_API_VERSION,
  DEFAULT_AUTHORIZE_URL,
  DEFAULT_TOKEN_URL,
  DEFAULT_GRAPH_URL,
  DEFAULT_TENANT,
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_EXPRESS_SESSION_MAX_AGE_MS,
  DEFAULT_ROUTES,
  STORAGE_NAMESPACES,
} from './core/config.js';
export type { SessionAuthOptions, SessionAuthConfig } from './core/config.js';
