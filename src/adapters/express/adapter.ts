import { Router, type Request, type Response } from 'express';
import { randomState } from 'openid-client';
import type { SessionManager } from '../../types/manager.js';
import { DEFAULT_ROUTES } from '../../core/config.js';
import { authErrorStatus, isAuthError } from '../../core/errors.js';
import { createConsoleLogger, describeError, type Logger } from '../../utils/logger.js';

/**
 * Options for the Express adapter.
 */
export interface ExpressAdapterOptions {
  /**
   * Builds the provider sign-in URL for a freshly generated `state`.
   * The callback only accepts a code returned with that same state.
   */
  signInUrl: (state: string) => string;
  /**
   * Path for the provider callback route.
   * Default: '/connect/get_token'
   */
  callbackPath?: string;
  /**
   * Path for the sign-in redirect route.
   * Default: '/connect/sign_in'
   */
  signInPath?: string;
  /**
   * Where the browser goes after a successful login.
   * Default: '/'
   */
  loginRedirect?: string;
  /** Logger instance */
  logger?: Logger;
}

/**
 * Result of creating an Express adapter.
 */
export interface ExpressAdapterResult {
  /**
   * Router with the sign-in redirect and the provider callback.
   * Mount it after the express-session middleware.
   */
  routes: Router;
}

// Extend express-session types with the pending sign-in state
declare module 'express-session' {
  interface SessionData {
    signInState?: string;
  }
}

function regenerateSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.regenerate((err: unknown) => (err ? reject(err) : resolve()));
  });
}

function saveSession(req: Request): Promise<void> {
  return new Promise((resolve, reject) => {
    req.session.save((err: unknown) => (err ? reject(err) : resolve()));
  });
}

/**
 * Create the Express routes that drive the sign-in flow.
 *
 * The sign-in route stores a random `state` in the express session before
 * redirecting to the provider. The callback route rejects a code that comes
 * back without that state, exchanges it through the manager, regenerates the
 * express session and stores the signed-in identity in it.
 *
 * @param manager - The session manager
 * @param options - Adapter options
 * @returns Express adapter result
 *
 * @example
 * ```typescript
 * const { routes } = createExpressAdapter(manager, {
 *   signInUrl: (state) => createSignInUrl({ ...settings, state }),
 *   loginRedirect: '/dashboard',
 * });
 *
 * app.use(session({ ... }));
 * app.use(routes);
 * ```
 */
export function createExpressAdapter(
  manager: SessionManager,
  options: ExpressAdapterOptions
): ExpressAdapterResult {
  const callbackPath = options.callbackPath ?? DEFAULT_ROUTES.callback;
  const signInPath = options.signInPath ?? DEFAULT_ROUTES.signIn;
  const loginRedirect = options.loginRedirect ?? DEFAULT_ROUTES.loginRedirect;
  const logger = options.logger ?? createConsoleLogger();
  const { signInUrl } = options;

  const handleCallback = async (req: Request, res: Response): Promise<void> => {
    const providerError = req.query['error'];
    if (typeof providerError === 'string') {
      const description = req.query['error_description'];
      logger.warn('Identity provider returned an error', { error: providerError });
      res.status(401).json({
        error: 'ProviderRejected',
        message: typeof description === 'string' ? description : providerError,
      });
      return;
    }

    const code = req.query['code'];
    if (typeof code !== 'string' || code.length === 0) {
      logger.error('No code received on OAuth callback');
      res.status(400).json({ error: 'invalid_request', message: 'Missing code parameter' });
      return;
    }

    // A state is good for one callback only
    const expectedState = req.session.signInState;
    delete req.session.signInState;
    const state = req.query['state'];
    if (!expectedState || typeof state !== 'string' || state !== expectedState) {
      logger.warn('OAuth callback state mismatch', { hasState: typeof state === 'string' });
      res.status(400).json({ error: 'invalid_request', message: 'Invalid state parameter' });
      return;
    }

    try {
      const session = await manager.completeLogin(code);

      await regenerateSession(req);
      req.session.identity = session.identity;
      await saveSession(req);

      logger.info('User signed in', { identity: session.identity });
      res.redirect(loginRedirect);
    } catch (error) {
      logger.error('OAuth callback error', { error: describeError(error) });
      if (isAuthError(error)) {
        res.status(authErrorStatus(error.kind)).json({
          error: error.kind,
          message: `Authentication failed: ${error.message}`,
        });
        return;
      }
      res.status(500).json({ error: 'internal_server_error', message: 'Authentication failed' });
    }
  };

  const routes = Router();

  routes.get(signInPath, (req: Request, res: Response) => {
    const state = randomState();
    req.session.signInState = state;
    req.session.save((err: unknown) => {
      if (err) {
        logger.error('Failed to save sign-in state', { error: describeError(err) });
        res.status(500).json({ error: 'internal_server_error', message: 'Sign-in failed' });
        return;
      }
      res.redirect(signInUrl(state));
    });
  });

  routes.get(callbackPath, (req: Request, res: Response) => {
    void handleCallback(req, res);
  });

  return { routes };
}
