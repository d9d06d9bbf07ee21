// Identity provider types
export type { ITokenClient, CodeExchangeResult, RefreshedTokens, IdentityClaims } from './idp.js';

// Directory types
export type { IDirectoryClient, NamedGroup } from './directory.js';

// Session types
export type { SessionRecord, SessionStore } from './session.js';

// Manager types
export type { SessionManager, SessionManagerConfig } from './manager.js';

// Storage types
export type { KeyValueStore } from './storage.js';
export type { KeyvLike } from './store.js';
