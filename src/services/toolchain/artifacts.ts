/**
 * Release artifacts of the GCC, LLVM and Xtensa Rust toolchains.
 */

import { VersionParseError } from "../errors";
import type { PlatformId } from "../platform/host-capabilities";
import type { Chip } from "./chip";
import { resolvePlatform } from "./platform-resolver";
import { gccToolchainName } from "./toolchain-names";
import {
  GCC_RELEASE,
  GCC_RELEASES_URL,
  GCC_VERSION,
  LLVM_RELEASES_URL,
  RUST_RELEASES_URL,
  llvmVersionWithUnderscores,
} from "./versions";

/**
 * Name of the LLVM toolchain directory (and of its top-level archive entry).
 */
export const LLVM_TOOLCHAIN_NAME = "xtensa-esp32-elf-clang";

/**
 * A downloadable toolchain archive.
 */
export interface ToolchainArtifact {
  /** Directory name under `<toolsRoot>/tools/` */
  readonly toolName: string;
  /** Release tag; the archive is unpacked to `<toolsRoot>/tools/<toolName>/<release>` */
  readonly release: string;
  readonly url: string;
  readonly fileName: string;
  /** Path segments, relative to the unpack directory, to add to the environment */
  readonly exportDir: readonly string[];
}

/**
 * GCC toolchain archive of one chip for a host.
 *
 * @example
 * gccArtifact("esp32", "x86_64-unknown-linux-gnu").fileName;
 * // "xtensa-esp32-elf-gcc8_4_0-esp-2021r2-patch3-linux-amd64.tar.gz"
 */
export function gccArtifact(chip: Chip, triple: PlatformId): ToolchainArtifact {
  const toolName = gccToolchainName(chip);
  const { gcc } = resolvePlatform(triple);
  const fileName = `${toolName}-gcc${GCC_VERSION}-${GCC_RELEASE}-${gcc.arch}.${gcc.extension}`;
  return {
    toolName,
    release: GCC_RELEASE,
    url: `${GCC_RELEASES_URL}/${GCC_RELEASE}/${fileName}`,
    fileName,
    exportDir: [toolName, "bin"],
  };
}

/**
 * LLVM (Xtensa clang) archive for a release tag and host.
 *
 * @throws VersionParseError UNKNOWN_LLVM_VERSION for an unpublished (empty) release
 */
export function llvmArtifact(release: string, triple: PlatformId): ToolchainArtifact {
  if (release === "") {
    throw new VersionParseError(
      "The requested LLVM version has no published release",
      "UNKNOWN_LLVM_VERSION",
      release
    );
  }
  const { llvm } = resolvePlatform(triple);
  const fileName = `xtensa-esp32-elf-llvm${llvmVersionWithUnderscores(release)}-${release}-${llvm.arch}.${llvm.extension}`;
  return {
    toolName: LLVM_TOOLCHAIN_NAME,
    release,
    url: `${LLVM_RELEASES_URL}/${release}/${fileName}`,
    fileName,
    exportDir: [LLVM_TOOLCHAIN_NAME, "lib"],
  };
}

/**
 * A Rust toolchain archive. Unpacked, it holds a single `rootDir` with the
 * installer script at its top.
 */
export interface RustArchive {
  readonly url: string;
  readonly fileName: string;
  readonly rootDir: string;
}

/**
 * Compiler archive of an Xtensa Rust release for a host.
 *
 * @example
 * rustToolchainArchive("1.62.1.0", "x86_64-unknown-linux-gnu").fileName;
 * // "rust-1.62.1.0-x86_64-unknown-linux-gnu.tar.xz"
 */
export function rustToolchainArchive(version: string, triple: PlatformId): RustArchive {
  const rootDir = `rust-${version}-${triple}`;
  const fileName = `${rootDir}.${resolvePlatform(triple).rust.extension}`;
  return { url: `${RUST_RELEASES_URL}/v${version}/${fileName}`, fileName, rootDir };
}

/**
 * Standard library sources of an Xtensa Rust release; the same archive for every host.
 */
export function rustSrcArchive(version: string): RustArchive {
  const rootDir = `rust-src-${version}`;
  const fileName = `${rootDir}.tar.xz`;
  return { url: `${RUST_RELEASES_URL}/v${version}/${fileName}`, fileName, rootDir };
}
