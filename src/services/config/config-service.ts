/**
 * Configuration loading from environment variables.
 *
 * Recognised variables:
 * - `IDF_TOOLS_PATH` - tools root (default `<home>/.espressif`)
 * - `ESP_IDF_REPOSITORY` - ESP-IDF git URL
 * - `RUSTUP_HOME` - rustup home holding the Rust toolchain (default `<home>/.rustup`)
 * - `ESP_INSTALLER_LOGLEVEL` - silly | debug | info | warn | error (default info)
 * - `ESP_INSTALLER_LOGGER` - comma-separated logger names to show
 *
 * Empty values count as unset.
 */

import { isAbsolute, join, normalize } from "node:path";
import { z } from "zod";
import { ConfigError } from "../errors";
import { LOGGER_NAMES, LogLevel } from "../logging/types";
import type { PlatformInfo } from "../platform/platform-info";
import {
  DEFAULT_ESP_IDF_REPOSITORY,
  DEFAULT_TOOLS_DIR_NAME,
  RUST_TOOLCHAIN_PATH,
  type InstallerConfig,
} from "./types";

const LOG_LEVELS = [
  LogLevel.silly,
  LogLevel.debug,
  LogLevel.info,
  LogLevel.warn,
  LogLevel.error,
] as const;

const EnvSchema = z.object({
  IDF_TOOLS_PATH: z
    .string()
    .refine((p) => isAbsolute(p), { message: "must be an absolute path" })
    .optional(),
  ESP_IDF_REPOSITORY: z.string().url().optional(),
  RUSTUP_HOME: z
    .string()
    .refine((p) => isAbsolute(p), { message: "must be an absolute path" })
    .optional(),
  ESP_INSTALLER_LOGLEVEL: z
    .string()
    .transform((level) => level.trim().toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
  ESP_INSTALLER_LOGGER: z
    .string()
    .transform((names) =>
      names
        .split(",")
        .map((name) => name.trim())
        .filter((name) => name.length > 0)
    )
    .pipe(z.array(z.enum(LOGGER_NAMES)))
    .optional(),
});

type EnvKey = keyof z.input<typeof EnvSchema>;
const ENV_KEYS: readonly EnvKey[] = [
  "IDF_TOOLS_PATH",
  "ESP_IDF_REPOSITORY",
  "RUSTUP_HOME",
  "ESP_INSTALLER_LOGLEVEL",
  "ESP_INSTALLER_LOGGER",
];

/**
 * Resolve the installer configuration from an environment.
 *
 * @param env - Environment variables, usually `process.env`
 * @param platformInfo - Provides the home directory for the default tools root
 * @throws ConfigError naming every invalid variable
 *
 * @example
 * const config = loadInstallerConfig(process.env, detectPlatformInfo());
 * const paths = new DefaultPathProvider(config);
 */
export function loadInstallerConfig(
  env: NodeJS.ProcessEnv,
  platformInfo: Pick<PlatformInfo, "homeDir">
): InstallerConfig {
  const present: Partial<Record<EnvKey, string>> = {};
  for (const key of ENV_KEYS) {
    const value = env[key]?.trim();
    if (value) {
      present[key] = value;
    }
  }

  const result = EnvSchema.safeParse(present);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid environment configuration: ${details}`, "INVALID_CONFIG");
  }

  const parsed = result.data;
  const loggerFilter = parsed.ESP_INSTALLER_LOGGER ?? [];
  return {
    toolsRoot: normalize(parsed.IDF_TOOLS_PATH ?? join(platformInfo.homeDir, DEFAULT_TOOLS_DIR_NAME)),
    espIdfRepository: parsed.ESP_IDF_REPOSITORY ?? DEFAULT_ESP_IDF_REPOSITORY,
    rustToolchainDir: join(
      normalize(parsed.RUSTUP_HOME ?? join(platformInfo.homeDir, ".rustup")),
      ...RUST_TOOLCHAIN_PATH
    ),
    logLevel: parsed.ESP_INSTALLER_LOGLEVEL ?? LogLevel.info,
    loggerFilter: loggerFilter.length > 0 ? loggerFilter : null,
  };
}
