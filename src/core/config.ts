/**
 * Seconds subtracted from a token's expiry before it is considered unusable,
 * so a token never expires in the middle of a request.
 */
export const EXPIRY_SKEW_SECONDS = 10;

/** Directory (graph) API version */
export const GRAPH_API_VERSION = '1.6';

/** Identity provider authorize endpoint */
export const DEFAULT_AUTHORIZE_URL = 'https://login.microsoftonline.com/common/oauth2/authorize';

/** Identity provider token endpoint */
export const DEFAULT_TOKEN_URL = 'https://login.microsoftonline.com/common/oauth2/token';

/** Directory base URL; also the token `resource` */
export const DEFAULT_GRAPH_URL = 'https://graph.windows.net';

/** Tenant segment used when listing all groups */
export const DEFAULT_TENANT = 'myorganization';

/** Timeout for token and directory requests: 10 seconds */
export const DEFAULT_HTTP_TIMEOUT_MS = 10_000;

/** Express session cookie lifetime: 30 days (in milliseconds) */
export const DEFAULT_EXPRESS_SESSION_MAX_AGE_MS = 30 * 24 * 60 * 60 * 1000;

/**
 * Default routes
 */
export const DEFAULT_ROUTES = {
  callback: '/connect/get_token',
  signIn: '/connect/sign_in',
  loginRedirect: '/',
};

/**
 * Storage namespace constants.
 * Used to namespace data in the Keyv store to prevent collisions.
 */
export const STORAGE_NAMESPACES = {
  /** Directory sessions keyed by identity */
  DIRECTORY_SESSIONS: 'directory-sessions',
  /** Express session data */
  EXPRESS_SESSIONS: 'express-sessions',
} as const;

/**
 * Settings accepted by {@link resolveConfig}. Only the app registration
 * fields are required; everything else falls back to the defaults above.
 */
export interface SessionAuthOptions {
  /** Application (client) id registered with the identity provider */
  clientId: string;
  /** Application secret */
  clientSecret: string;
  /** Redirect URI registered for the OAuth callback */
  redirectUri: string;
  authorizeUrl?: string;
  tokenUrl?: string;
  /** Directory base URL, also sent as the token `resource` */
  graphUrl?: string;
  /** Tenant domain used for the organization-wide group listing */
  tenant?: string;
  callbackPath?: string;
  signInPath?: string;
  /** Where the callback sends the browser after a successful login */
  loginRedirect?: string;
  /** Where group guards send the browser instead of answering 403 */
  forbiddenRedirect?: string;
  /** Group id that grants baseline access */
  authGroup?: string;
  /** Timeout for token and directory requests in milliseconds */
  timeoutMs?: number;
}

/**
 * Fully resolved configuration.
 */
export interface SessionAuthConfig
  extends Required<Omit<SessionAuthOptions, 'forbiddenRedirect' | 'authGroup'>> {
  forbiddenRedirect?: string;
  authGroup?: string;
}

/**
 * Environment variables read by {@link loadConfigFromEnv}.
 */
export const CONFIG_ENV_VARS = {
  clientId: 'AD_APP_ID',
  clientSecret: 'AD_APP_KEY',
  redirectUri: 'AD_REDIRECT_URI',
  authorizeUrl: 'AD_AUTH_URL',
  tokenUrl: 'AD_TOKEN_URL',
  graphUrl: 'AD_GRAPH_URL',
  tenant: 'AD_TENANT',
  callbackPath: 'AD_CALLBACK_PATH',
  signInPath: 'AD_SIGN_IN_PATH',
  loginRedirect: 'AD_LOGIN_REDIRECT',
  forbiddenRedirect: 'AD_GROUP_FORBIDDEN_REDIRECT',
  authGroup: 'AD_AUTH_GROUP',
  timeoutMs: 'AD_HTTP_TIMEOUT_MS',
} as const satisfies Record<keyof SessionAuthOptions, string>;

function requireNonEmpty(value: string | undefined, field: keyof SessionAuthOptions): string {
  if (!value || value.trim().length === 0) {
    throw new Error(`Missing required configuration: ${field} (${CONFIG_ENV_VARS[field]})`);
  }
  return value;
}

function requireUrl(value: string, field: keyof SessionAuthOptions): string {
  try {
    new URL(value);
  } catch (error) {
    throw new Error(`Invalid URL for ${field}: ${value}`, { cause: error });
  }
  return value;
}

function requirePath(value: string, field: keyof SessionAuthOptions): string {
  if (!value.startsWith('/')) {
    throw new Error(`${field} must start with '/': ${value}`);
  }
  return value;
}

/**
 * Apply defaults and validate configuration.
 *
 * @throws Error when a required field is missing or a URL/path is malformed
 */
export function resolveConfig(options: SessionAuthOptions): SessionAuthConfig {
  const timeoutMs = options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new Error(`timeoutMs must be a positive integer: ${timeoutMs}`);
  }

  return {
    clientId: requireNonEmpty(options.clientId, 'clientId'),
    clientSecret: requireNonEmpty(options.clientSecret, 'clientSecret'),
    redirectUri: requireUrl(requireNonEmpty(options.redirectUri, 'redirectUri'), 'redirectUri'),
    authorizeUrl: requireUrl(options.authorizeUrl ?? DEFAULT_AUTHORIZE_URL, 'authorizeUrl'),
    tokenUrl: requireUrl(options.tokenUrl ?? DEFAULT_TOKEN_URL, 'tokenUrl'),
    graphUrl: requireUrl(options.graphUrl ?? DEFAULT_GRAPH_URL, 'graphUrl'),
    tenant: options.tenant ?? DEFAULT_TENANT,
    callbackPath: requirePath(options.callbackPath ?? DEFAULT_ROUTES.callback, 'callbackPath'),
    signInPath: requirePath(options.signInPath ?? DEFAULT_ROUTES.signIn, 'signInPath'),
    loginRedirect: options.loginRedirect ?? DEFAULT_ROUTES.loginRedirect,
    forbiddenRedirect: options.forbiddenRedirect,
    authGroup: options.authGroup,
    timeoutMs,
  };
}

/**
 * Build the configuration from environment variables (see {@link CONFIG_ENV_VARS}).
 * Empty variables count as unset.
 *
 * @example
 * ```typescript
 * const config = loadConfigFromEnv();
 * const tokenClient = new TokenClient({ ...config, resource: config.graphUrl });
 * ```
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SessionAuthConfig {
  const read = (field: keyof SessionAuthOptions): string | undefined => {
    const value = env[CONFIG_ENV_VARS[field]];
    return value === undefined || value === '' ? undefined : value;
  };

  const rawTimeout = read('timeoutMs');
  const timeoutMs = rawTimeout === undefined ? undefined : Number(rawTimeout);

  return resolveConfig({
    clientId: requireNonEmpty(read('clientId'), 'clientId'),
    clientSecret: requireNonEmpty(read('clientSecret'), 'clientSecret'),
    redirectUri: requireNonEmpty(read('redirectUri'), 'redirectUri'),
    authorizeUrl: read('authorizeUrl'),
    tokenUrl: read('tokenUrl'),
    graphUrl: read('graphUrl'),
    tenant: read('tenant'),
    callbackPath: read('callbackPath'),
    signInPath: read('signInPath'),
    loginRedirect: read('loginRedirect'),
    forbiddenRedirect: read('forbiddenRedirect'),
    authGroup: read('authGroup'),
    timeoutMs,
  });
}
