import { describe, it, expect, vi, afterEach } from 'vitest';
import { Session, nowInSeconds } from './session.js';
import { createSessionData, createTestSession } from '../test/helpers/index.js';
import {
  TEST_EXPIRES_AT,
  TEST_GROUP_ID,
  TEST_IDENTITY,
  TEST_OTHER_GROUP_ID,
  TEST_SCOPE,
  TEST_TOKEN_TYPE,
} from '../test/constants.js';
import type { Logger } from '../utils/logger.js';

function createSpyLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe('Session', () => {
  describe('constructor', () => {
    it('should copy every field and collect groups into a set', () => {
      const session = createTestSession({ groups: [TEST_GROUP_ID, TEST_GROUP_ID, TEST_OTHER_GROUP_ID] });

      expect(session.identity).toBe(TEST_IDENTITY);
      expect(session.expiresAt).toBe(TEST_EXPIRES_AT);
      expect(session.tokenType).toBe(TEST_TOKEN_TYPE);
      expect(session.groups).toEqual(new Set([TEST_GROUP_ID, TEST_OTHER_GROUP_ID]));
    });

    it('should reject an empty identity', () => {
      expect(() => createTestSession({ identity: '' })).toThrow('Session identity must not be empty');
    });
  });

  describe('isExpired', () => {
    const session = createTestSession({ expiresAt: 1000 });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should not be expired more than 10 seconds before expiry', () => {
      expect(session.isExpired(989)).toBe(false);
    });

    it('should be expired exactly 10 seconds before expiry', () => {
      expect(session.isExpired(990)).toBe(true);
    });

    it('should be expired after expiry', () => {
      expect(session.isExpired(1001)).toBe(true);
    });

    it('should default to the current time', () => {
      vi.spyOn(Date, 'now').mockReturnValue(989_500);
      expect(nowInSeconds()).toBe(989.5);
      expect(session.isExpired()).toBe(false);

      vi.spyOn(Date, 'now').mockReturnValue(990_000);
      expect(session.isExpired()).toBe(true);
    });
  });

  describe('expiresIn', () => {
    it('should count down to expiry and go negative after it', () => {
      const session = createTestSession({ expiresAt: 1000 });
      expect(session.expiresIn(400)).toBe(600);
      expect(session.expiresIn(1200)).toBe(-200);
    });
  });

  describe('hasGroup', () => {
    it('should return true for a member group without logging', () => {
      const logger = createSpyLogger();
      const session = createTestSession({ groups: [TEST_GROUP_ID] }, logger);

      expect(session.hasGroup(TEST_GROUP_ID)).toBe(true);
      expect(logger.warn).not.toHaveBeenCalled();
    });

    it('should return false and log a denial for a non-member group', () => {
      const logger = createSpyLogger();
      const session = createTestSession({ groups: [TEST_GROUP_ID] }, logger);

      expect(session.hasGroup(TEST_OTHER_GROUP_ID)).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith('Session not in group', {
        identity: TEST_IDENTITY,
        group: TEST_OTHER_GROUP_ID,
      });
    });

    it('should return false for every group when the session has none', () => {
      const session = createTestSession({ groups: [] });
      expect(session.hasGroup(TEST_GROUP_ID)).toBe(false);
    });
  });

  describe('withRefresh', () => {
    it('should return a new session with the new tokens and groups', () => {
      const original = createTestSession({ groups: [TEST_GROUP_ID] });
      const refreshed = original.withRefresh(
        { accessToken: 'access-2', refreshToken: 'refresh-2', expiresAt: TEST_EXPIRES_AT + 60 },
        [TEST_OTHER_GROUP_ID]
      );

      expect(refreshed).not.toBe(original);
      expect(refreshed.accessToken).toBe('access-2');
      expect(refreshed.refreshToken).toBe('refresh-2');
      expect(refreshed.expiresAt).toBe(TEST_EXPIRES_AT + 60);
      expect(refreshed.groups).toEqual(new Set([TEST_OTHER_GROUP_ID]));
      expect(refreshed.identity).toBe(TEST_IDENTITY);
      expect(refreshed.scope).toBe(TEST_SCOPE);
    });

    it('should leave the original session untouched', () => {
      const original = createTestSession({ groups: [TEST_GROUP_ID] });
      original.withRefresh({ accessToken: 'access-2', refreshToken: 'refresh-2', expiresAt: 1 }, []);

      expect(original.toRecord()).toEqual(createSessionData({ groups: [TEST_GROUP_ID] }));
    });
  });

  describe('toRecord / fromRecord', () => {
    it('should store groups as an array and rebuild an equal session', () => {
      const session = createTestSession({ groups: [TEST_GROUP_ID, TEST_OTHER_GROUP_ID] });
      const record = session.toRecord();

      expect(record.groups).toEqual([TEST_GROUP_ID, TEST_OTHER_GROUP_ID]);
      expect(Session.fromRecord(record).toRecord()).toEqual(record);
    });
  });
});
