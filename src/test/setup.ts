/**
 * Test setup file - configures global test environment.
 */

import { vi, beforeAll, afterAll, afterEach } from 'vitest';

/**
 * Suppress console output during tests to reduce noise.
 * Tests can still assert on logged values via spies.
 */
const originalConsole = {
  log: console.log,
  info: console.info,
  warn: console.warn,
  error: console.error,
  debug: console.debug,
};

beforeAll(() => {
  // Only suppress in CI or when SUPPRESS_LOGS is set
  if (process.env['CI'] || process.env['SUPPRESS_LOGS']) {
    console.log = vi.fn();
    console.info = vi.fn();
    console.warn = vi.fn();
    console.error = vi.fn();
    console.debug = vi.fn();
  }
});

afterAll(() => {
  console.log = originalConsole.log;
  console.info = originalConsole.info;
  console.warn = originalConsole.warn;
  console.error = originalConsole.error;
  console.debug = originalConsole.debug;
});

afterEach(() => {
  // Clear all mocks after each test for isolation
  vi.clearAllMocks();
});
