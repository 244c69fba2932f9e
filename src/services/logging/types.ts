/**
 * Logging contracts shared by all installer services.
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem of the installer.
 */
export const LOGGER_NAMES = [
  "process", // ExecaProcessRunner - installer subprocesses
  "network", // DefaultNetworkLayer - HTTP
  "fs", // DefaultFileSystemLayer - filesystem operations
  "git", // SimpleGitClient - SDK checkouts
  "fetch", // DefaultFetchEngine - download cache and unpacking
  "toolchain", // ToolchainService - GCC/LLVM artifacts
  "esp-idf", // EspIdfService, GitSdkInstaller
  "export", // EnvExportWriter - environment export file
  "cli", // Command line entry point
] as const;

export type LoggerName = (typeof LOGGER_NAMES)[number];

/**
 * Context of a log entry, rendered as `key=value` pairs. Values are primitives
 * only; null stands for an absent value.
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger handed to every service through its constructor.
 *
 * @example
 * ```typescript
 * this.logger.info("Installing toolchain", { tool: "xtensa-esp32-elf", release });
 * ```
 */
export interface Logger {
  /** Per-chunk and per-line output, e.g. subprocess stdout */
  silly(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** Downloads, checkouts, installer runs */
  info(message: string, context?: LogContext): void;
  /** Something went wrong but the installation continues */
  warn(message: string, context?: LogContext): void;
  /** @param error - included with its stack in the log file */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service interface.
 * Creates named loggers.
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(config, pathProvider);
 * const logger = loggingService.createLogger('git');
 * const gitClient = new SimpleGitClient(logger);
 * ```
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   *
   * @param name - Logger name/scope (e.g., 'git', 'fetch', 'esp-idf')
   * @returns Logger instance for the named scope
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Dispose of the logging service.
   */
  dispose(): void;
}
