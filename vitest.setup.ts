// Global test setup
import { afterEach, beforeEach, vi } from 'vitest';

// No test may reach the network: every suite installs its own fetch mock
beforeEach(() => {
  vi.stubGlobal(
    'fetch',
    vi.fn(async () => {
      throw new Error('fetch was called without a mock');
    })
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.clearAllMocks();
});
