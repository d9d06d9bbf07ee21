import { describe, it, expect } from 'vitest';
import { DirectoryClient } from './client.js';
import type { FetchLike } from '../utils/http.js';
import { createMockFetch, fetchCall, jsonResponse } from '../test/helpers/index.js';
import {
  TEST_ACCESS_TOKEN,
  TEST_GRAPH_URL,
  TEST_GROUP_ID,
  TEST_OTHER_GROUP_ID,
} from '../test/constants.js';

function createClient(fetch: FetchLike, tenant?: string): DirectoryClient {
  return new DirectoryClient({ graphUrl: `${TEST_GRAPH_URL}/`, tenant, fetch });
}

describe('DirectoryClient', () => {
  describe('getUserGroups', () => {
    it('should POST to getMemberGroups with the bearer token', async () => {
      const fetch = createMockFetch(jsonResponse({ value: [TEST_GROUP_ID, TEST_OTHER_GROUP_ID] }));

      const groups = await createClient(fetch).getUserGroups(TEST_ACCESS_TOKEN);

      expect(groups).toEqual(new Set([TEST_GROUP_ID, TEST_OTHER_GROUP_ID]));
      const { url, init } = fetchCall(fetch);
      expect(url).toBe(`${TEST_GRAPH_URL}/me/getMemberGroups?api-version=1.6`);
      expect(init.method).toBe('POST');
      expect(init.body).toBe('{"securityEnabledOnly":false}');
      expect(init.headers).toEqual({
        Authorization: `Bearer ${TEST_ACCESS_TOKEN}`,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      });
    });

    it('should return an empty set for a user in no groups', async () => {
      const fetch = createMockFetch(jsonResponse({ value: [] }));

      await expect(createClient(fetch).getUserGroups(TEST_ACCESS_TOKEN)).resolves.toEqual(new Set());
    });

    it('should map an error status to DirectoryUnavailable', async () => {
      const fetch = createMockFetch(jsonResponse({ 'odata.error': { code: 'Authentication_ExpiredToken' } }, 401));

      await expect(createClient(fetch).getUserGroups(TEST_ACCESS_TOKEN)).rejects.toMatchObject({
        kind: 'DirectoryUnavailable',
        status: 401,
        message: 'Directory responded with 401',
      });
    });

    it('should reject a body without a value array', async () => {
      const fetch = createMockFetch(jsonResponse({ groups: [TEST_GROUP_ID] }));

      await expect(createClient(fetch).getUserGroups(TEST_ACCESS_TOKEN)).rejects.toMatchObject({
        kind: 'DirectoryUnavailable',
        message: 'Directory returned an unexpected response body',
      });
    });

    it('should reject a non-string group id', async () => {
      const fetch = createMockFetch(jsonResponse({ value: [TEST_GROUP_ID, 7] }));

      await expect(createClient(fetch).getUserGroups(TEST_ACCESS_TOKEN)).rejects.toMatchObject({
        kind: 'DirectoryUnavailable',
        message: 'Directory returned a non-string group id',
      });
    });

    it('should map a network failure to ProviderUnavailable', async () => {
      const fetch = createMockFetch();
      fetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(createClient(fetch).getUserGroups(TEST_ACCESS_TOKEN)).rejects.toMatchObject({
        kind: 'ProviderUnavailable',
        message: 'Directory could not be reached',
      });
    });
  });

  describe('getAllGroups', () => {
    it('should GET the tenant groups and key names by id', async () => {
      const fetch = createMockFetch(
        jsonResponse({
          value: [
            { objectId: TEST_GROUP_ID, displayName: 'Readers', mail: null },
            { objectId: TEST_OTHER_GROUP_ID, displayName: 'Writers' },
          ],
        })
      );

      const groups = await createClient(fetch).getAllGroups(TEST_ACCESS_TOKEN);

      expect(groups).toEqual(
        new Map([
          [TEST_GROUP_ID, 'Readers'],
          [TEST_OTHER_GROUP_ID, 'Writers'],
        ])
      );
      const { url, init } = fetchCall(fetch);
      expect(url).toBe(`${TEST_GRAPH_URL}/myorganization/groups?api-version=1.6`);
      expect(init.method).toBe('GET');
      expect(init.body).toBeUndefined();
      expect(init.headers).toEqual({
        Authorization: `Bearer ${TEST_ACCESS_TOKEN}`,
        Accept: 'application/json',
      });
    });

    it('should use the configured tenant', async () => {
      const fetch = createMockFetch(jsonResponse({ value: [] }));

      await createClient(fetch, 'example.com').getAllGroups(TEST_ACCESS_TOKEN);

      expect(fetchCall(fetch).url).toBe(`${TEST_GRAPH_URL}/example.com/groups?api-version=1.6`);
    });

    it('should reject a group entry without a display name', async () => {
      const fetch = createMockFetch(jsonResponse({ value: [{ objectId: TEST_GROUP_ID }] }));

      await expect(createClient(fetch).getAllGroups(TEST_ACCESS_TOKEN)).rejects.toMatchObject({
        kind: 'DirectoryUnavailable',
        message: 'Directory returned a malformed group entry',
      });
    });
  });
});
