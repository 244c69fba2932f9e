/**
 * ElectronLogService - Logging implementation using electron-log's Node.js build.
 *
 * Features:
 * - Session-based log files under `<toolsRoot>/logs`: `<datetime>-<uuid>.log`
 * - Console output at the configured level
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { InstallerConfig } from "../config/types";
import type { PathProvider } from "../platform/path-provider";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types";

type ElectronLogScope = ReturnType<typeof log.scope>;

const LOG_FORMAT = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => (value === null ? `${key}=null` : `${key}=${String(value)}`))
    .join(" ");
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, "-").slice(0, 19);
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (error) {
      this.scope.error(withContext(message, context), error);
    } else {
      this.scope.error(withContext(message, context));
    }
  }
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: ReadonlySet<LoggerName> | null,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === null || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Logging service using electron-log.
 *
 * Configuration comes from {@link InstallerConfig}:
 * - `logLevel` applies to both the session file and the console
 * - `loggerFilter` restricts output to the listed scopes
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(config, pathProvider);
 * const logger = loggingService.createLogger('fetch');
 * logger.info('Downloading', { url });
 * // Output: [2025-12-16 10:30:00.123] [info] [fetch] Downloading url=https://...
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: ReadonlySet<LoggerName> | null;

  constructor(
    config: Pick<InstallerConfig, "logLevel" | "loggerFilter">,
    pathProvider: Pick<PathProvider, "logsDir">
  ) {
    this.logLevel = config.logLevel;
    this.allowedLoggers = config.loggerFilter ? new Set(config.loggerFilter) : null;

    const filename = generateSessionFilename();
    log.transports.file.resolvePathFn = (): string => join(pathProvider.logsDir, filename);
    log.transports.file.level = this.logLevel;
    log.transports.console.level = this.logLevel;

    log.transports.file.format = LOG_FORMAT;
    log.transports.console.format = LOG_FORMAT;
  }

  /**
   * Create a logger with the specified name (scope).
   * Loggers are cached per name.
   */
  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const logger = new FilteredLogger(
      new ElectronLogLogger(log.scope(`[${name}]`)),
      this.allowedLoggers,
      name
    );
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
