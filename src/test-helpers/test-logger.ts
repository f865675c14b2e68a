import { vi, type Mock } from 'vitest';
import type { ComponentLogger } from '../WithLogging';

export type TestLogger = { [K in keyof ComponentLogger]: Mock };

export function createTestLogger(): TestLogger {
  return {
    verbose: vi.fn(),
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
