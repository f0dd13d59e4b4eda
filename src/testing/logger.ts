import { vi } from 'vitest';
import type { Logger } from '../logger';

/**
 * Logger whose methods are spies, so tests stay quiet and can assert on output.
 */
export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}
