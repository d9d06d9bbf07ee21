import { AuthError } from '../core/errors.js';
import { DEFAULT_HTTP_TIMEOUT_MS, DEFAULT_TENANT, GRAPH_API_VERSION } from '../core/config.js';
import { isRecord, requestJson, type FetchLike, type JsonResponse } from '../utils/http.js';
import type { IDirectoryClient } from '../types/directory.js';

/**
 * Configuration for the directory client.
 */
export interface DirectoryClientConfig {
  /** Directory base URL, e.g. `https://graph.windows.net` */
  graphUrl: string;

  /**
   * Tenant segment for the organization-wide group listing.
   * @default 'myorganization'
   */
  tenant?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /** fetch implementation (default: global fetch) */
  fetch?: FetchLike;
}

/**
 * Client for the directory's group queries, authenticated with the user's
 * own access token. Stateless and safe to share.
 *
 * @example
 * ```typescript
 * const directory = new DirectoryClient({ graphUrl: 'https://graph.windows.net' });
 * const groups = await directory.getUserGroups(session.accessToken);
 * ```
 */
export class DirectoryClient implements IDirectoryClient {
  private config: DirectoryClientConfig;

  constructor(config: DirectoryClientConfig) {
    this.config = config;
  }

  /**
   * Group ids the bearer belongs to, security and distribution groups alike.
   */
  async getUserGroups(accessToken: string): Promise<Set<string>> {
    const response = await this.request('me/getMemberGroups', accessToken, {
      method: 'POST',
      body: JSON.stringify({ securityEnabledOnly: false }),
    });

    const value = readValue(response);
    const groups = new Set<string>();
    for (const id of value) {
      if (typeof id !== 'string') {
        throw new AuthError('DirectoryUnavailable', 'Directory returned a non-string group id');
      }
      groups.add(id);
    }
    return groups;
  }

  /**
   * Every group in the organization, keyed by id.
   */
  async getAllGroups(accessToken: string): Promise<Map<string, string>> {
    const tenant = encodeURIComponent(this.config.tenant ?? DEFAULT_TENANT);
    const response = await this.request(`${tenant}/groups`, accessToken, { method: 'GET' });

    const groups = new Map<string, string>();
    for (const entry of readValue(response)) {
      const id = isRecord(entry) ? entry['objectId'] : undefined;
      const name = isRecord(entry) ? entry['displayName'] : undefined;
      if (typeof id !== 'string' || typeof name !== 'string') {
        throw new AuthError('DirectoryUnavailable', 'Directory returned a malformed group entry');
      }
      groups.set(id, name);
    }
    return groups;
  }

  private async request(
    path: string,
    accessToken: string,
    init: Pick<RequestInit, 'method' | 'body'>
  ): Promise<JsonResponse> {
    const url = new URL(`${this.config.graphUrl.replace(/\/+$/, '')}/${path}`);
    url.searchParams.set('api-version', GRAPH_API_VERSION);

    const headers: Record<string, string> = {
      Authorization: `Bearer ${accessToken}`,
      Accept: 'application/json',
    };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await requestJson(
      url.toString(),
      { ...init, headers },
      {
        timeoutMs: this.config.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
        fetch: this.config.fetch,
        service: 'Directory',
      }
    );

    if (!response.ok) {
      throw new AuthError('DirectoryUnavailable', `Directory responded with ${response.status}`, {
        status: response.status,
      });
    }
    return response;
  }
}

/**
 * The `value` array every directory collection response wraps its items in.
 */
function readValue(response: JsonResponse): unknown[] {
  const value: unknown = isRecord(response.body) ? response.body['value'] : undefined;
  if (!Array.isArray(value)) {
    throw new AuthError('DirectoryUnavailable', 'Directory returned an unexpected response body', {
      status: response.status,
    });
  }
  return value;
}
