// Integrated setup - sessions, sign-in routes and guards in one Express app
export { setupSessionAuthExpress } from './setup.js';
export type { SessionAuthExpressOptions, SessionAuthExpressResult } from './setup.js';

// Lower-level APIs for composing your own app
export { createExpressAdapter } from './adapter.js';
export type { ExpressAdapterOptions, ExpressAdapterResult } from './adapter.js';

export {
  createSessionMiddleware,
  requireSession,
  requireGroup,
  requireAuthorized,
} from './middleware.js';
export type { SessionMiddlewareOptions, GuardOptions } from './middleware.js';

export { KeyvSessionStore } from './session-store.js';
