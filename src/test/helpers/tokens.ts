import {
  TEST_ACCESS_TOKEN,
  TEST_EXPIRES_AT,
  TEST_GRAPH_URL,
  TEST_IDENTITY,
  TEST_REFRESH_TOKEN,
  TEST_SCOPE,
  TEST_TOKEN_TYPE,
} from '../constants.js';

/**
 * Creates an unsigned identity token (header.payload.signature) for testing.
 */
export function createIdToken(payload: Record<string, unknown> = { upn: TEST_IDENTITY }): string {
  const header = Buffer.from(JSON.stringify({ typ: 'JWT', alg: 'RS256' })).toString('base64url');
  const body = Buffer.from(JSON.stringify(payload)).toString('base64url');
  return `${header}.${body}.signature`;
}

/**
 * Creates a token endpoint response body for an authorization code grant.
 */
export function createCodeGrantBody(overrides?: Record<string, unknown>): Record<string, unknown> {
  return {
    id_token: createIdToken(),
    access_token: TEST_ACCESS_TOKEN,
    refresh_token: TEST_REFRESH_TOKEN,
    expires_on: String(TEST_EXPIRES_AT),
    token_type: TEST_TOKEN_TYPE,
    resource: TEST_GRAPH_URL,
    scope: TEST_SCOPE,
    ...overrides,
  };
}
