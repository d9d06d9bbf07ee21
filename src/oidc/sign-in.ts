import * as client from 'openid-client';

/**
 * Settings for building the provider's sign-in URL.
 */
export interface SignInUrlConfig {
  /** Provider authorize endpoint (https) */
  authorizeUrl: string;
  clientId: string;
  /** Redirect URI registered for the OAuth callback */
  redirectUri: string;
  /** Resource the issued tokens should be valid for (the graph base URL) */
  resource: string;
  /** Opaque value echoed back on the callback */
  state?: string;
  /** Extra query parameters, e.g. `prompt` or `domain_hint` */
  additionalParams?: Record<string, string>;
}

/**
 * Build the URL that starts the authorization-code flow.
 *
 * @example
 * ```typescript
 * res.redirect(createSignInUrl({
 *   authorizeUrl: config.authorizeUrl,
 *   clientId: config.clientId,
 *   redirectUri: config.redirectUri,
 *   resource: config.graphUrl,
 * }));
 * ```
 */
export function createSignInUrl(config: SignInUrlConfig): string {
  const authorizeUrl = new URL(config.authorizeUrl);
  const configuration = new client.Configuration(
    {
      issuer: authorizeUrl.origin,
      authorization_endpoint: authorizeUrl.href,
    },
    config.clientId
  );

  const parameters: Record<string, string> = {
    ...config.additionalParams,
    response_type: 'code',
    redirect_uri: config.redirectUri,
    resource: config.resource,
  };
  if (config.state) {
    parameters['state'] = config.state;
  }

  return client.buildAuthorizationUrl(configuration, parameters).toString();
}
