import { vi } from "vitest";
import type { AppLogger } from "@argwire/types";

/** A logger whose child and context loggers are itself, so calls land in one place. */
export function createMockLogger(): AppLogger {
  const logger: AppLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => logger),
    withContext: vi.fn(() => logger),
  };
  return logger;
}
