/**
 * Global test setup for Vitest.
 */

import { beforeEach, vi } from 'vitest';

process.env.NODE_ENV = 'test';
process.env.STORE_DRIVER = 'memory';

// Services log every transition; keep test output readable.
beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
});
