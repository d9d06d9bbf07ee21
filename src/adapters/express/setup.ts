import express, { type Application, type Request, type RequestHandler, type Response } from 'express';
import session, { type SessionData } from 'express-session';
import type { IDirectoryClient } from '../../types/directory.js';
import type { ITokenClient } from '../../types/idp.js';
import type { SessionManager } from '../../types/manager.js';
import type { SessionRecord } from '../../types/session.js';
import type { KeyvLike } from '../../types/store.js';
import {
  DEFAULT_EXPRESS_SESSION_MAX_AGE_MS,
  STORAGE_NAMESPACES,
  type SessionAuthConfig,
} from '../../core/config.js';
import { createSessionManager } from '../../core/session-manager.js';
import {
  createKeyvStore,
  createNamespacedKeyv,
  createSessionStore,
} from '../../core/session-store.js';
import { DirectoryClient } from '../../directory/client.js';
import { TokenClient } from '../../oidc/token-client.js';
import { createSignInUrl } from '../../oidc/sign-in.js';
import { createConsoleLogger, type Logger } from '../../utils/logger.js';
import { createExpressAdapter } from './adapter.js';
import {
  createSessionMiddleware,
  requireAuthorized,
  requireGroup,
  requireSession,
  type GuardOptions,
} from './middleware.js';
import { KeyvSessionStore } from './session-store.js';

/**
 * Options for setting up an Express app with directory sessions.
 */
export interface SessionAuthExpressOptions {
  /** Resolved configuration (see resolveConfig / loadConfigFromEnv) */
  config: SessionAuthConfig;

  /**
   * Keyv instance for storage.
   * Directory sessions and express sessions get their own namespaces over its backend.
   *
   * @example
   * ```typescript
   * // In-memory (development only)
   * const store = new Keyv();
   *
   * // Redis (production)
   * const store = new Keyv({ store: new KeyvRedis('redis://localhost:6379') });
   * ```
   */
  store: KeyvLike;

  /** Secret for signing the session cookie */
  secret: string;

  /**
   * Whether running in production mode.
   * Affects cookie security settings.
   * Default: process.env.NODE_ENV === 'production'
   */
  isProduction?: boolean;

  /**
   * Session cookie max age in milliseconds.
   * Default: 30 days
   */
  sessionMaxAge?: number;

  /** Token client override (default: TokenClient built from config) */
  tokenClient?: ITokenClient;

  /** Directory client override (default: DirectoryClient built from config) */
  directoryClient?: IDirectoryClient;

  /** Logger instance */
  logger?: Logger;
}

/**
 * Result of setting up the Express app.
 */
export interface SessionAuthExpressResult {
  /** Express app with sessions and sign-in routes mounted; add your routes and call listen() */
  app: Application;
  /** The session manager behind the routes */
  manager: SessionManager;
  /** Guard: any signed-in session */
  requireSession: RequestHandler;
  /** Guard: signed in and holding the configured baseline group */
  requireAuthorized: RequestHandler;
  /** Guard factory: signed in and holding `group` */
  requireGroup: (group: string) => RequestHandler;
}

/**
 * Set up an Express app with directory-backed sessions.
 *
 * This function creates and configures:
 * - Express app with trust proxy
 * - express-session backed by the Keyv store
 * - Health check endpoint at /health
 * - Sign-in redirect and provider callback routes
 * - The session middleware that populates `req.directorySession`
 *
 * @param options - Setup options
 * @returns Configured app, manager and guards
 *
 * @example
 * ```typescript
 * import { Keyv } from 'keyv';
 * import { loadConfigFromEnv } from 'directory-session-auth';
 * import { setupSessionAuthExpress } from 'directory-session-auth/express';
 *
 * const { app, requireAuthorized, requireGroup } = setupSessionAuthExpress({
 *   config: loadConfigFromEnv(),
 *   store: new Keyv(),
 *   secret: process.env.SESSION_SECRET!,
 * });
 *
 * app.get('/', requireAuthorized, (req, res) => {
 *   res.send(`Hello ${req.directorySession?.identity}`);
 * });
 *
 * app.listen(3000);
 * ```
 */
export function setupSessionAuthExpress(options: SessionAuthExpressOptions): SessionAuthExpressResult {
  const {
    config,
    store,
    secret,
    isProduction = process.env['NODE_ENV'] === 'production',
    sessionMaxAge = DEFAULT_EXPRESS_SESSION_MAX_AGE_MS,
  } = options;
  const logger = options.logger ?? createConsoleLogger();

  const tokenClient =
    options.tokenClient ??
    new TokenClient({
      tokenUrl: config.tokenUrl,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      redirectUri: config.redirectUri,
      resource: config.graphUrl,
      timeoutMs: config.timeoutMs,
    });

  const directoryClient =
    options.directoryClient ??
    new DirectoryClient({
      graphUrl: config.graphUrl,
      tenant: config.tenant,
      timeoutMs: config.timeoutMs,
    });

  const sessionStore = createSessionStore(
    createKeyvStore<SessionRecord>(
      createNamespacedKeyv(store, STORAGE_NAMESPACES.DIRECTORY_SESSIONS)
    ),
    { logger }
  );

  const manager = createSessionManager({
    tokenClient,
    directoryClient,
    sessionStore,
    authGroup: config.authGroup,
    logger,
  });

  const signInUrl = (state: string): string =>
    createSignInUrl({
      authorizeUrl: config.authorizeUrl,
      clientId: config.clientId,
      redirectUri: config.redirectUri,
      resource: config.graphUrl,
      state,
    });

  const expressSessionKeyv = createNamespacedKeyv(
    store,
    STORAGE_NAMESPACES.EXPRESS_SESSIONS,
    sessionMaxAge
  );

  const app = express();
  app.set('trust proxy', 1);

  // 1. Health check (before other middleware for fast response)
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // 2. Browser session (which identity is signed in)
  app.use(
    session({
      secret,
      resave: false,
      saveUninitialized: false,
      store: new KeyvSessionStore(createKeyvStore<SessionData>(expressSessionKeyv)),
      cookie: {
        secure: isProduction,
        httpOnly: true,
        sameSite: 'lax',
        maxAge: sessionMaxAge,
      },
    })
  );

  // 3. Sign-in and callback routes
  const adapter = createExpressAdapter(manager, {
    signInUrl,
    callbackPath: config.callbackPath,
    signInPath: config.signInPath,
    loginRedirect: config.loginRedirect,
    logger,
  });
  app.use(adapter.routes);

  // 4. Directory session for every later route
  app.use(createSessionMiddleware(manager, { logger }));

  const guardOptions: GuardOptions = {
    forbiddenRedirect: config.forbiddenRedirect,
  };

  return {
    app,
    manager,
    requireSession: requireSession(guardOptions),
    requireAuthorized: requireAuthorized(manager, guardOptions),
    requireGroup: (group: string) => requireGroup(group, guardOptions),
  };
}
