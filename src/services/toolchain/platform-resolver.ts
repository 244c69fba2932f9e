/**
 * Platform Resolver - maps a host triple to the naming conventions of
 * Espressif's release artifacts.
 *
 * Lookups are permissive: an unknown triple maps to a passthrough value
 * (the triple itself, or the non-Windows default) so that new hosts keep
 * working with whatever names the releases use for them. Target parsing is
 * strict by contrast; the two policies are intentionally different.
 */

import type { PlatformId } from "../platform/host-capabilities";

export type ArtifactExtension = "zip" | "tar.gz" | "tar.xz";

const WINDOWS_TRIPLES: ReadonlySet<PlatformId> = new Set([
  "x86_64-pc-windows-msvc",
  "x86_64-pc-windows-gnu",
]);

/**
 * Architecture labels of LLVM release artifacts.
 */
const LLVM_ARCH: ReadonlyMap<PlatformId, string> = new Map<PlatformId, string>([
  ["aarch64-apple-darwin", "macos"],
  ["x86_64-apple-darwin", "macos"],
  ["x86_64-unknown-linux-gnu", "linux-amd64"],
  ["x86_64-pc-windows-msvc", "win64"],
  ["x86_64-pc-windows-gnu", "win64"],
]);

/**
 * Architecture labels of GCC (crosstool-NG) release artifacts.
 */
const GCC_ARCH: ReadonlyMap<PlatformId, string> = new Map<PlatformId, string>([
  ...LLVM_ARCH,
  ["aarch64-unknown-linux-gnu", "linux-arm64"],
]);

/**
 * Naming conventions for one host.
 */
export interface ResolvedPlatform {
  readonly gcc: { readonly extension: ArtifactExtension; readonly arch: string };
  readonly llvm: { readonly extension: ArtifactExtension; readonly arch: string };
  /** Rust toolchain archives are named after the triple itself */
  readonly rust: { readonly extension: ArtifactExtension };
  /**
   * Install script at the top of an unpacked Rust toolchain archive; empty on
   * Windows, where the archive is unpacked into place as-is.
   */
  readonly installerScript: string;
}

export function isWindowsTriple(id: PlatformId): boolean {
  return WINDOWS_TRIPLES.has(id);
}

export function gccArtifactExtension(id: PlatformId): ArtifactExtension {
  return isWindowsTriple(id) ? "zip" : "tar.gz";
}

export function gccArch(id: PlatformId): string {
  return GCC_ARCH.get(id) ?? id;
}

export function llvmArtifactExtension(id: PlatformId): ArtifactExtension {
  return isWindowsTriple(id) ? "zip" : "tar.xz";
}

export function llvmArch(id: PlatformId): string {
  return LLVM_ARCH.get(id) ?? id;
}

export function rustArtifactExtension(id: PlatformId): ArtifactExtension {
  return isWindowsTriple(id) ? "zip" : "tar.xz";
}

export function installerScript(id: PlatformId): string {
  return isWindowsTriple(id) ? "" : "./install.sh";
}

/**
 * Resolve every naming convention for a host at once.
 *
 * @example
 * resolvePlatform("x86_64-unknown-linux-gnu").gcc;
 * // { extension: "tar.gz", arch: "linux-amd64" }
 */
export function resolvePlatform(id: PlatformId): ResolvedPlatform {
  return {
    gcc: { extension: gccArtifactExtension(id), arch: gccArch(id) },
    llvm: { extension: llvmArtifactExtension(id), arch: llvmArch(id) },
    rust: { extension: rustArtifactExtension(id) },
    installerScript: installerScript(id),
  };
}
