/**
 * Vitest Setup File
 *
 * Runs before every test file. Tests never reach a real RPC endpoint; chain access
 * goes through the in-process FakeChain in each package's __tests__/helpers.ts.
 */

import { vi, beforeEach, afterEach } from 'vitest';

process.env.NODE_ENV = 'test';

// Clear all mocks before each test
beforeEach(() => {
  vi.clearAllMocks();
});

// Cleanup after each test
afterEach(() => {
  vi.restoreAllMocks();
});
