import type { JWTPayload } from 'jose';

/**
 * Tokens issued by a refresh-token grant.
 */
export interface RefreshedTokens {
  accessToken: string;
  refreshToken: string;
  /** Access token expiry in seconds since epoch (the provider's `expires_on`) */
  expiresAt: number;
}

/**
 * Result of exchanging an authorization code.
 */
export interface CodeExchangeResult extends RefreshedTokens {
  /** Principal name (`upn` claim) decoded from the identity token */
  identity: string;
  tokenType: string;
  resource: string;
  scope: string;
}

/**
 * Claims decoded from the identity token.
 * Only `upn` is interpreted; everything else is passed through.
 */
export interface IdentityClaims extends JWTPayload {
  /** User principal name */
  upn: string;
  /** Display name, when the provider includes it */
  name?: string;
}

/**
 * Client for the identity provider's token endpoint.
 *
 * Built-in implementation: TokenClient (from 'directory-session-auth')
 */
export interface ITokenClient {
  /**
   * Exchange an authorization code for tokens and the caller's identity.
   * @throws AuthError
   */
  exchangeCode(code: string): Promise<CodeExchangeResult>;

  /**
   * Exchange a refresh token for a new token pair.
   * @throws AuthError
   */
  refresh(refreshToken: string): Promise<RefreshedTokens>;
}
