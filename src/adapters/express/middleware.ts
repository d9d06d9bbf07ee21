import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { Session } from '../../core/session.js';
import type { SessionManager } from '../../types/manager.js';
import { authErrorStatus, isAuthError } from '../../core/errors.js';
import { createConsoleLogger, describeError, type Logger } from '../../utils/logger.js';

// Extend Express Request type with the resolved directory session
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      directorySession?: Session;
    }
  }
}

// Extend express-session types with the signed-in identity
declare module 'express-session' {
  interface SessionData {
    identity?: string;
  }
}

/**
 * Options for the session middleware.
 */
export interface SessionMiddlewareOptions {
  /** Logger instance */
  logger?: Logger;
}

/**
 * Create a middleware that binds the request to its directory session.
 *
 * Reads the identity stored in the express session, resolves it through the
 * manager (refreshing an expired session) and attaches the result to
 * `req.directorySession`. Requests without a stored identity, or whose
 * identity has no stored session, continue unauthenticated. A session that
 * cannot be refreshed is answered with the error. When the provider rejected
 * it (401) the stored identity is also removed.
 *
 * @param manager - The session manager
 * @param options - Middleware options
 * @returns Express middleware function
 *
 * @example
 * ```typescript
 * app.use(session({ ... }));
 * app.use(createSessionMiddleware(manager));
 * app.get('/reports', requireGroup(REPORTS_GROUP_ID), handler);
 * ```
 */
export function createSessionMiddleware(
  manager: SessionManager,
  options?: SessionMiddlewareOptions
): (req: Request, res: Response, next: NextFunction) => Promise<void> {
  const logger = options?.logger ?? createConsoleLogger();

  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const identity = req.session?.identity;
    if (!identity) {
      next();
      return;
    }

    let session: Session | undefined;
    try {
      session = await manager.resolve(identity);
    } catch (error) {
      if (isAuthError(error)) {
        const status = authErrorStatus(error.kind);
        logger.warn('Session could not be resolved', { identity, error: describeError(error) });
        // Provider rejections sign the user out; outages (502) keep the identity.
        if (status === 401) {
          delete req.session.identity;
        }
        res.status(status).json({ error: error.kind, message: error.message });
        return;
      }
      logger.error('Session middleware error', { identity, error: describeError(error) });
      res.status(500).json({ error: 'internal_server_error', message: 'Session lookup failed' });
      return;
    }

    if (session) {
      req.directorySession = session;
    }
    next();
  };
}

/**
 * Options shared by the guard middlewares.
 */
export interface GuardOptions {
  /**
   * Let every request through without checks.
   * For local development and tests only.
   */
  loginDisabled?: boolean;
  /** Redirect unauthenticated requests here instead of answering 401 */
  signInRedirect?: string;
  /** Redirect requests lacking the group here instead of answering 403 */
  forbiddenRedirect?: string;
}

function createGuard(
  isAllowed: ((session: Session) => boolean) | undefined,
  options?: GuardOptions
): RequestHandler {
  return (req, res, next) => {
    if (options?.loginDisabled) {
      next();
      return;
    }

    const session = req.directorySession;
    if (!session) {
      if (options?.signInRedirect) {
        res.redirect(options.signInRedirect);
        return;
      }
      res.status(401).json({ error: 'unauthorized', message: 'Sign-in required' });
      return;
    }

    if (isAllowed && !isAllowed(session)) {
      if (options?.forbiddenRedirect) {
        res.redirect(options.forbiddenRedirect);
        return;
      }
      res.status(403).json({
        error: 'forbidden',
        message: 'You do not have the necessary group to access this resource',
      });
      return;
    }

    next();
  };
}

/**
 * Only let requests with a directory session through.
 */
export function requireSession(options?: GuardOptions): RequestHandler {
  return createGuard(undefined, options);
}

/**
 * Only let requests whose session holds `group` through.
 *
 * @example
 * ```typescript
 * app.get('/admin', requireGroup(ADMIN_GROUP_ID), adminHandler);
 * ```
 */
export function requireGroup(group: string, options?: GuardOptions): RequestHandler {
  return createGuard((session) => session.hasGroup(group), options);
}

/**
 * Only let requests whose session holds the manager's baseline group through.
 * Without a configured baseline group this is the same as {@link requireSession}.
 */
export function requireAuthorized(manager: SessionManager, options?: GuardOptions): RequestHandler {
  return createGuard((session) => manager.isAuthorized(session), options);
}
