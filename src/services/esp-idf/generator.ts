/**
 * CMake generators ESP-IDF projects can be built with.
 */

import type { PlatformInfo } from "../platform/platform-info";

const CMAKE_GENERATORS = [
  "Ninja",
  "NinjaMultiConfig",
  "UnixMakefiles",
  "BorlandMakefiles",
  "MSYSMakefiles",
  "MinGWMakefiles",
  "NMakeMakefiles",
  "NMakeMakefilesJOM",
  "WatcomWMake",
] as const;

export type CmakeGenerator = (typeof CMAKE_GENERATORS)[number];

/**
 * Generator used when none is configured.
 * Espressif publishes no Ninja builds for linux/aarch64.
 */
export function defaultCmakeGenerator(
  platformInfo: Pick<PlatformInfo, "platform" | "arch">
): CmakeGenerator {
  return platformInfo.platform === "linux" && platformInfo.arch === "arm64"
    ? "UnixMakefiles"
    : "Ninja";
}
