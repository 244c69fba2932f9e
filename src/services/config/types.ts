/**
 * Installer configuration types.
 */

import type { LoggerName, LogLevel } from "../logging/types";

/**
 * Default ESP-IDF source repository.
 */
export const DEFAULT_ESP_IDF_REPOSITORY = "https://github.com/espressif/esp-idf";

/**
 * Name of the tools root directory under the user's home.
 */
export const DEFAULT_TOOLS_DIR_NAME = ".espressif";

/**
 * Rustup toolchain directory the Xtensa Rust toolchain is installed as, below the rustup home.
 */
export const RUST_TOOLCHAIN_PATH = ["toolchains", "esp"] as const;

/**
 * Resolved installer configuration.
 * Built once at startup and passed to the services that need it; nothing
 * else reads the process environment.
 */
export interface InstallerConfig {
  /** Root of every installed tool, cache and SDK checkout */
  readonly toolsRoot: string;
  /** Git URL the ESP-IDF checkout is cloned from */
  readonly espIdfRepository: string;
  /** Destination of the Xtensa Rust toolchain, `<rustup home>/toolchains/esp` */
  readonly rustToolchainDir: string;
  readonly logLevel: LogLevel;
  /** Only these loggers produce output; null means all */
  readonly loggerFilter: readonly LoggerName[] | null;
}
