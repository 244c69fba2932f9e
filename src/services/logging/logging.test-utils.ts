/**
 * Mock utilities for logging tests.
 */

import { vi, type Mock } from "vitest";
import type { Logger, LogContext, LogLevel } from "./types";

/**
 * Mock logger with vitest spy methods.
 */
export interface MockLogger extends Logger {
  silly: Mock<(message: string, context?: LogContext) => void>;
  debug: Mock<(message: string, context?: LogContext) => void>;
  info: Mock<(message: string, context?: LogContext) => void>;
  warn: Mock<(message: string, context?: LogContext) => void>;
  error: Mock<(message: string, context?: LogContext, error?: Error) => void>;
}

/**
 * Create a mock logger with vitest spy methods.
 *
 * @example
 * ```typescript
 * const logger = createMockLogger();
 * const engine = new DefaultFetchEngine({ ...deps, logger });
 * await engine.fetch(url, "a.zip", dir, false);
 * expect(logger.info).toHaveBeenCalledWith("Using cached file", { path });
 * ```
 */
export function createMockLogger(): MockLogger {
  return {
    silly: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/**
 * Create a silent no-op logger for tests that don't assert on logging.
 */
export function createSilentLogger(): Logger {
  return {
    silly: () => {},
    debug: () => {},
    info: () => {},
    warn: () => {},
    error: () => {},
  };
}

/**
 * A message captured by a recording logger.
 */
export interface LoggedMessage {
  readonly level: LogLevel;
  readonly message: string;
  readonly context?: LogContext | undefined;
}

/**
 * Logger that records messages so tests can assert on what was logged
 * rather than on call counts.
 */
export interface RecordingLogger extends Logger {
  messages(level?: LogLevel): readonly LoggedMessage[];
}

export function createRecordingLogger(): RecordingLogger {
  const recorded: LoggedMessage[] = [];
  const record =
    (level: LogLevel) =>
    (message: string, context?: LogContext): void => {
      recorded.push({ level, message, context });
    };

  return {
    silly: record("silly"),
    debug: record("debug"),
    info: record("info"),
    warn: record("warn"),
    error: record("error"),
    messages: (level) => (level ? recorded.filter((m) => m.level === level) : [...recorded]),
  };
}
