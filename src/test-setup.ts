import { afterEach, vi } from 'vitest';

// Clear recorded mock calls and env stubs between tests.
afterEach(() => {
  vi.clearAllMocks();
  vi.unstubAllEnvs();
});
