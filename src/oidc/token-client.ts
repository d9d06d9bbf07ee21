import { decodeJwt, type JWTPayload } from 'jose';
import { AuthError } from '../core/errors.js';
import { DEFAULT_HTTP_TIMEOUT_MS } from '../core/config.js';
import { isRecord, requestJson, type FetchLike } from '../utils/http.js';
import type {
  CodeExchangeResult,
  IdentityClaims,
  ITokenClient,
  RefreshedTokens,
} from '../types/idp.js';

/**
 * Configuration for the token client.
 */
export interface TokenClientConfig {
  /** Token endpoint, e.g. `https://login.microsoftonline.com/common/oauth2/token` */
  tokenUrl: string;

  /** OAuth client ID from your app registration */
  clientId: string;

  /** OAuth client secret from your app registration */
  clientSecret: string;

  /** Redirect URI the authorization code was issued for */
  redirectUri: string;

  /**
   * Resource the tokens are requested for.
   * For directory group lookups this is the graph base URL.
   */
  resource: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

type GrantParameters =
  | { grant_type: 'authorization_code'; code: string }
  | { grant_type: 'refresh_token'; refresh_token: string };

/**
 * Client for the identity provider's token endpoint.
 *
 * Stateless: every call is a single form-encoded POST, so one instance can be
 * shared by concurrent requests.
 *
 * @example
 * ```typescript
 * import { TokenClient } from 'directory-session-auth';
 *
 * const tokenClient = new TokenClient({
 *   tokenUrl: 'https://login.microsoftonline.com/common/oauth2/token',
 *   clientId: process.env.AD_APP_ID!,
 *   clientSecret: process.env.AD_APP_KEY!,
 *   redirectUri: 'https://your-app.com/connect/get_token',
 *   resource: 'https://graph.windows.net',
 * });
 *
 * const { identity, accessToken } = await tokenClient.exchangeCode(code);
 * ```
 */
export class TokenClient implements ITokenClient {
  private config: TokenClientConfig;

  constructor(config: TokenClientConfig) {
    this.config = config;
  }

  /**
   * Exchange an authorization code for tokens.
   * The identity is the `upn` claim of the returned identity token.
   */
  async exchangeCode(code: string): Promise<CodeExchangeResult> {
    const body = await this.requestToken({ grant_type: 'authorization_code', code });

    const idToken = requireField(body, 'id_token');
    const tokens = readTokens(body);
    const tokenType = requireField(body, 'token_type');
    const resource = requireField(body, 'resource');
    const scope = requireField(body, 'scope');

    const claims = this.parseIdToken(idToken);

    return {
      identity: claims.upn,
      ...tokens,
      tokenType,
      resource,
      scope,
    };
  }

  /**
   * Exchange a refresh token for a new access/refresh token pair.
   * The identity token is not decoded again: identity does not change across a refresh.
   */
  async refresh(refreshToken: string): Promise<RefreshedTokens> {
    const body = await this.requestToken({ grant_type: 'refresh_token', refresh_token: refreshToken });
    return readTokens(body);
  }

  /**
   * Decode the identity token's claims.
   * Structural decoding only; the signature is not verified.
   */
  parseIdToken(idToken: string): IdentityClaims {
    let payload: JWTPayload;
    try {
      payload = decodeJwt(idToken);
    } catch (error) {
      throw new AuthError('MalformedIdentityToken', 'Identity token could not be decoded', {
        cause: error,
      });
    }

    const upn = payload['upn'];
    if (typeof upn !== 'string' || upn.length === 0) {
      throw new AuthError('MissingField', 'Identity token has no upn claim');
    }

    const name = payload['name'];
    return {
      ...payload,
      upn,
      name: typeof name === 'string' ? name : undefined,
    };
  }

  /**
   * POST a grant to the token endpoint and return the JSON body.
   */
  private async requestToken(grant: GrantParameters): Promise<Record<string, unknown>> {
    const { tokenUrl, clientId, clientSecret, redirectUri, resource } = this.config;

    const params = new URLSearchParams({ grant_type: grant.grant_type, redirect_uri: redirectUri });
    params.set('client_id', clientId);
    params.set('client_secret', clientSecret);
    if (grant.grant_type === 'authorization_code') {
      params.set('code', grant.code);
    } else {
      params.set('refresh_token', grant.refresh_token);
    }
    params.set('resource', resource);

    const response = await requestJson(
      tokenUrl,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: params.toString(),
      },
      {
        timeoutMs: this.config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
        fetch: this.config.fetch,
        service: 'Token endpoint',
      }
    );

    if (!response.ok) {
      throw new AuthError('ProviderRejected', describeRejection(response.status, response.body), {
        status: response.status,
      });
    }

    if (!isRecord(response.body)) {
      throw new AuthError('ProviderRejected', 'Token endpoint returned a body that is not a JSON object', {
        status: response.status,
      });
    }

    return response.body;
  }
}

/**
 * Read a required, non-empty string field from a token response.
 */
function requireField(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value !== 'string' || value.length === 0) {
    throw new AuthError('MissingField', `Token response is missing ${field}`);
  }
  return value;
}

/**
 * Read the fields shared by both grants.
 * `expires_on` is an absolute timestamp in seconds and may arrive as a number or a numeric string.
 */
function readTokens(body: Record<string, unknown>): RefreshedTokens {
  const accessToken = requireField(body, 'access_token');
  const refreshToken = requireField(body, 'refresh_token');

  const expiresOn = body['expires_on'];
  let expiresAt: number;
  if (typeof expiresOn === 'number' && Number.isInteger(expiresOn)) {
    expiresAt = expiresOn;
  } else if (typeof expiresOn === 'string' && /^\d+$/.test(expiresOn)) {
    expiresAt = Number.parseInt(expiresOn, 10);
  } else {
    throw new AuthError('MissingField', 'Token response is missing an integer expires_on');
  }

  return { accessToken, refreshToken, expiresAt };
}

function describeRejection(status: number, body: unknown): string {
  const base = `Token endpoint responded with ${status}`;
  if (!isRecord(body)) {
    return base;
  }
  const detail = body['error_description'] ?? body['error'];
  return typeof detail === 'string' ? `${base}: ${detail}` : base;
}
