/**
 * Platform information provider.
 * Abstracts process.platform, process.arch, and os.homedir() for testability.
 */

import { homedir } from "node:os";
import { ConfigError } from "../errors";

/**
 * Supported CPU architectures.
 */
export type SupportedArch = "x64" | "arm64";

export interface PlatformInfo {
  /** Operating system platform: 'linux', 'darwin', 'win32' */
  readonly platform: NodeJS.Platform;

  /** CPU architecture: 'x64' or 'arm64' */
  readonly arch: SupportedArch;

  /** User's home directory */
  readonly homeDir: string;
}

/**
 * Read platform information from the running process.
 *
 * @throws ConfigError if the CPU architecture has no published toolchains
 */
export function detectPlatformInfo(): PlatformInfo {
  const arch = process.arch;
  if (arch !== "x64" && arch !== "arm64") {
    throw new ConfigError(`Unsupported CPU architecture: ${arch}`, "UNSUPPORTED_ARCH");
  }
  return {
    platform: process.platform,
    arch,
    homeDir: homedir(),
  };
}
