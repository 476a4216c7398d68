/**
 * Global Test Setup
 *
 * Restores timers, globals and mocks after every building-sync test.
 */

import { afterEach, vi } from 'vitest';

afterEach(() => {
  vi.useRealTimers();
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});
