/**
 * Host capabilities.
 *
 * A single runtime value describing what the host platform needs from the
 * ESP-IDF tool installer, so that platform differences are evaluated in one
 * place instead of being scattered through the installers.
 */

import { defaultCmakeGenerator, type CmakeGenerator } from "../esp-idf/generator";
import type { PlatformInfo } from "./platform-info";

/**
 * Host triple in `arch-vendor-os-abi` form, e.g. `x86_64-unknown-linux-gnu`.
 */
export type PlatformId = string;

export interface HostCapabilities {
  readonly triple: PlatformId;
  /** idf_tools.py must install the `idf-exe` launcher */
  readonly needsInstallerHelper: boolean;
  /** idf_tools.py must install `ccache` */
  readonly needsCompilerCache: boolean;
  /** idf_tools.py must install `dfu-util` */
  readonly needsFlashingUtility: boolean;
  /** Espressif publishes ULP toolchains for this host */
  readonly supportsUlpToolchain: boolean;
  readonly defaultGenerator: CmakeGenerator;
  readonly pythonExecutable: string;
}

/**
 * Map Node's platform/arch pair to the host triple used in artifact names.
 */
export function hostTriple(platformInfo: Pick<PlatformInfo, "platform" | "arch">): PlatformId {
  const cpu = platformInfo.arch === "arm64" ? "aarch64" : "x86_64";
  switch (platformInfo.platform) {
    case "win32":
      return `${cpu}-pc-windows-msvc`;
    case "darwin":
      return `${cpu}-apple-darwin`;
    case "linux":
      return `${cpu}-unknown-linux-gnu`;
    default:
      return `${cpu}-unknown-${platformInfo.platform}`;
  }
}

export function hostCapabilities(platformInfo: PlatformInfo): HostCapabilities {
  const windows = platformInfo.platform === "win32";
  // No ULP builds for linux/aarch64 from Espressif yet
  const linuxArm = platformInfo.platform === "linux" && platformInfo.arch === "arm64";

  return {
    triple: hostTriple(platformInfo),
    needsInstallerHelper: windows,
    needsCompilerCache: windows,
    needsFlashingUtility: windows,
    supportsUlpToolchain: !linuxArm,
    defaultGenerator: defaultCmakeGenerator(platformInfo),
    pythonExecutable: windows ? "python" : "python3",
  };
}
