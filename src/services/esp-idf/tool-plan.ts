/**
 * Selection of the tools idf_tools.py installs next to an ESP-IDF checkout.
 */

import type { Chip } from "../toolchain/chip";
import { gccToolchainName, ulpToolchainName } from "../toolchain/toolchain-names";
import type { HostCapabilities, PlatformId } from "../platform/host-capabilities";
import { InstallError } from "../errors";
import type { CmakeGenerator } from "./generator";
import { compareVersions, type EspIdfVersion } from "./version";

/**
 * One step of a tool installation.
 *
 * - `idf-tools`: tool names handed to `idf_tools.py install`
 * - `download`: an archive fetched and unpacked into `<toolsRoot>/tools/<name>/<version>`
 */
export type ToolRequest =
  | { readonly kind: "idf-tools"; readonly names: readonly string[] }
  | {
      readonly kind: "download";
      readonly name: string;
      readonly version: string;
      readonly url: string;
      readonly fileName: string;
    };

export interface ToolPlanInput {
  readonly targets: readonly Chip[];
  readonly version: EspIdfVersion | null;
  readonly host: Pick<
    HostCapabilities,
    | "triple"
    | "needsInstallerHelper"
    | "needsCompilerCache"
    | "needsFlashingUtility"
    | "supportsUlpToolchain"
  >;
  readonly generator: CmakeGenerator;
}

/** ESP-IDF releases before this one need a newer CMake than they ship. */
const IDF_TOOLS_CMAKE_SINCE: EspIdfVersion = { major: 4, minor: 4, patch: 0 };

export const BUNDLED_CMAKE_VERSION = "3.20.3";
const CMAKE_RELEASES_URL = `https://github.com/Kitware/CMake/releases/download/v${BUNDLED_CMAKE_VERSION}`;

function bundledCmakeFileName(triple: PlatformId): string | null {
  const prefix = `cmake-${BUNDLED_CMAKE_VERSION}`;
  if (triple.includes("-windows-")) {
    return `${prefix}-windows-x86_64.zip`;
  }
  if (triple.endsWith("-apple-darwin")) {
    return `${prefix}-macos-universal.tar.gz`;
  }
  switch (triple) {
    case "x86_64-unknown-linux-gnu":
      return `${prefix}-linux-x86_64.tar.gz`;
    case "aarch64-unknown-linux-gnu":
      return `${prefix}-linux-aarch64.tar.gz`;
    default:
      return null;
  }
}

/**
 * Download request for the CMake release used with ESP-IDF before 4.4.
 *
 * @throws InstallError with code UNSUPPORTED_HOST when Kitware publishes no build for the host
 */
export function bundledCmakeRequest(triple: PlatformId): ToolRequest {
  const fileName = bundledCmakeFileName(triple);
  if (fileName === null) {
    throw new InstallError(
      `No CMake ${BUNDLED_CMAKE_VERSION} release for host ${triple}`,
      "UNSUPPORTED_HOST"
    );
  }
  return {
    kind: "download",
    name: "cmake",
    version: BUNDLED_CMAKE_VERSION,
    url: `${CMAKE_RELEASES_URL}/${fileName}`,
    fileName,
  };
}

/**
 * Plan the tool installation for a checkout.
 *
 * The bundled CMake download, when needed, comes first; every other tool is
 * installed by one `idf_tools.py` call. Names are de-duplicated in order.
 */
export function planTools(input: ToolPlanInput): ToolRequest[] {
  const { targets, version, host, generator } = input;
  const requests: ToolRequest[] = [];
  const names: string[] = [];

  for (const chip of targets) {
    names.push(gccToolchainName(chip));
    const ulp = ulpToolchainName(chip, version);
    if (ulp !== null && host.supportsUlpToolchain) {
      names.push(ulp);
    }
  }

  if (version !== null && compareVersions(version, IDF_TOOLS_CMAKE_SINCE) >= 0) {
    names.push("cmake");
  } else {
    requests.push(bundledCmakeRequest(host.triple));
  }

  names.push("openocd-esp32");
  if (host.needsInstallerHelper) names.push("idf-exe");
  if (host.needsCompilerCache) names.push("ccache");
  if (host.needsFlashingUtility) names.push("dfu-util");
  if (generator === "Ninja") names.push("ninja");

  requests.push({ kind: "idf-tools", names: [...new Set(names)] });
  return requests;
}
