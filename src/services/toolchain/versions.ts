/**
 * Toolchain release constants and version parsing.
 */

import { VersionParseError } from "../errors";

/**
 * crosstool-NG release providing the GCC toolchains.
 */
export const GCC_RELEASE = "esp-2021r2-patch3";

/**
 * GCC version embedded in the crosstool-NG artifact names.
 */
export const GCC_VERSION = "8_4_0";

export const GCC_RELEASES_URL = "https://github.com/espressif/crosstool-NG/releases/download";

export const LLVM_RELEASES_URL = "https://github.com/espressif/llvm-project/releases/download";

export const RUST_RELEASES_URL = "https://github.com/esp-rs/rust-build/releases/download";

/**
 * LLVM release tags by major version. An empty tag marks a major that is
 * accepted on the command line but not published yet.
 */
export const LLVM_RELEASES = {
  "13": "esp-13.0.0-20211203",
  "14": "esp-14.0.0-20220415",
  "15": "",
} as const satisfies Record<string, string>;

export type LlvmMajor = keyof typeof LLVM_RELEASES;

export const DEFAULT_LLVM_MAJOR: LlvmMajor = "14";

function isLlvmMajor(value: string): value is LlvmMajor {
  return Object.keys(LLVM_RELEASES).includes(value);
}

/**
 * Map an LLVM major version to its Espressif release tag.
 *
 * @throws VersionParseError UNKNOWN_LLVM_VERSION for unsupported majors
 *
 * @example
 * parseLlvmVersion("14"); // "esp-14.0.0-20220415"
 */
export function parseLlvmVersion(major: string): string {
  const trimmed = major.trim();
  if (!isLlvmMajor(trimmed)) {
    throw new VersionParseError(
      `Unknown LLVM version: ${major}`,
      "UNKNOWN_LLVM_VERSION",
      major
    );
  }
  return LLVM_RELEASES[trimmed];
}

/**
 * The numeric part of an LLVM release tag with dots replaced by underscores,
 * as used in artifact names: `esp-14.0.0-20220415` → `14_0_0`.
 */
export function llvmVersionWithUnderscores(release: string): string {
  const numeric = release.split("-")[1] ?? "";
  return numeric.replace(/\./g, "_");
}

/**
 * Validate an Xtensa Rust toolchain version such as `1.62.1.0`. A leading `v`
 * (the release tag prefix) is dropped.
 *
 * @throws VersionParseError INVALID_RUST_VERSION unless the version has four numeric parts
 */
export function parseRustVersion(version: string): string {
  const trimmed = version.trim().replace(/^v/, "");
  if (!/^\d+\.\d+\.\d+\.\d+$/.test(trimmed)) {
    throw new VersionParseError(
      `Invalid Rust toolchain version: ${version}`,
      "INVALID_RUST_VERSION",
      version
    );
  }
  return trimmed;
}
