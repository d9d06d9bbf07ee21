import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { SessionData } from 'express-session';
import { KeyvSessionStore } from './session-store.js';
import type { KeyValueStore } from '../../types/storage.js';
import { TEST_IDENTITY } from '../../test/constants.js';

describe('KeyvSessionStore', () => {
  let mockStore: KeyValueStore<SessionData>;
  let storedData: Map<string, SessionData>;
  let sessionStore: KeyvSessionStore;

  const createMockSession = (overrides?: Partial<SessionData>): SessionData => ({
    cookie: {
      originalMaxAge: 86400000,
      maxAge: 86400000,
    },
    identity: TEST_IDENTITY,
    ...overrides,
  });

  const getSession = (sid: string) =>
    new Promise<SessionData | null | undefined>((resolve, reject) => {
      sessionStore.get(sid, (err, result) => {
        if (err) reject(err);
        else resolve(result);
      });
    });

  const setSession = (sid: string, session: SessionData) =>
    new Promise<void>((resolve, reject) => {
      sessionStore.set(sid, session, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });

  beforeEach(() => {
    storedData = new Map();
    mockStore = {
      get: vi.fn((key: string) => Promise.resolve(storedData.get(key))),
      set: vi.fn((key: string, value: SessionData, _ttl?: number) => {
        storedData.set(key, value);
        return Promise.resolve(true);
      }),
      delete: vi.fn((key: string) => {
        const existed = storedData.has(key);
        storedData.delete(key);
        return Promise.resolve(existed);
      }),
      clear: vi.fn(() => {
        storedData.clear();
        return Promise.resolve();
      }),
    };
    sessionStore = new KeyvSessionStore(mockStore);
  });

  describe('get', () => {
    it('should retrieve a session', async () => {
      const session = createMockSession();
      storedData.set('session-1', session);

      await expect(getSession('session-1')).resolves.toEqual(session);
      expect(mockStore.get).toHaveBeenCalledWith('session-1');
    });

    it('should return null for non-existent session', async () => {
      await expect(getSession('non-existent')).resolves.toBeNull();
    });

    it('should pass error to callback on failure', async () => {
      vi.mocked(mockStore.get).mockRejectedValueOnce(new Error('Store error'));

      await expect(getSession('session-1')).rejects.toThrow('Store error');
    });

    it('should wrap a non-Error rejection', async () => {
      vi.mocked(mockStore.get).mockRejectedValueOnce('connection reset');

      await expect(getSession('session-1')).rejects.toThrow('connection reset');
    });
  });

  describe('set', () => {
    it('should store a session with the cookie max age as TTL', async () => {
      const session = createMockSession();

      await setSession('session-1', session);

      expect(mockStore.set).toHaveBeenCalledWith('session-1', session, 86400000);
      expect(storedData.get('session-1')).toEqual(session);
    });

    it('should store without TTL when the cookie has no max age', async () => {
      const session = createMockSession({ cookie: { originalMaxAge: null, maxAge: undefined } });

      await setSession('session-1', session);

      expect(mockStore.set).toHaveBeenCalledWith('session-1', session, undefined);
    });

    it('should pass error to callback on failure', async () => {
      vi.mocked(mockStore.set).mockRejectedValueOnce(new Error('Store error'));

      await expect(setSession('session-1', createMockSession())).rejects.toThrow('Store error');
    });
  });

  describe('destroy', () => {
    it('should delete a session', async () => {
      storedData.set('session-1', createMockSession());

      await new Promise<void>((resolve, reject) => {
        sessionStore.destroy('session-1', (err) => {
          if (err) reject(err);
          else resolve();
        });
      });

      expect(storedData.has('session-1')).toBe(false);
    });
  });

  describe('touch', () => {
    it('should re-store the session to extend its TTL', async () => {
      const session = createMockSession();

      await new Promise<void>((resolve, reject) => {
        sessionStore.touch('session-1', session, (err) => {
          if (err) reject(err);
          else resolve();
        });
      });

      expect(mockStore.set).toHaveBeenCalledWith('session-1', session, 86400000);
    });
  });
});
