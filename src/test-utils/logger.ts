import { vi } from "vitest";
import type { Logger } from "pino";

/**
 * Creates a logger whose methods are all `vi.fn()` mocks.
 */
export function createMockLogger(): Logger {
  const mockLogger = {
    info: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    level: "info",
    child: vi.fn(),
  };
  mockLogger.child.mockReturnValue(mockLogger);
  return mockLogger as unknown as Logger;
}
