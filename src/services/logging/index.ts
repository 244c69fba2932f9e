export type { Logger, LoggerName, LoggingService, LogContext } from "./types";
export { LogLevel, LOGGER_NAMES } from "./types";
export { ElectronLogService } from "./electron-log-service";
