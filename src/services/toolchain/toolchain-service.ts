/**
 * Installation of the standalone GCC, LLVM and Xtensa Rust toolchains.
 *
 * Archives are fetched raw into the download cache (`<toolsRoot>/dist`) and
 * unpacked from there, so a repeated install only unpacks again. GCC and LLVM
 * land in `<toolsRoot>/tools/<toolName>/<release>`; the result tells the
 * caller what to put on the environment.
 */

import { join } from "node:path";
import { InstallError } from "../errors";
import type { InstallerConfig } from "../config/types";
import type { FetchEngine } from "../download/fetch-engine";
import type { PathProvider } from "../platform/path-provider";
import type { HostCapabilities } from "../platform/host-capabilities";
import type { ProcessRunner } from "../platform/process";
import type { EnvAssignment } from "../env-export/env-file";
import type { Logger } from "../logging";
import type { Chip } from "./chip";
import {
  gccArtifact,
  llvmArtifact,
  rustSrcArchive,
  rustToolchainArchive,
  type RustArchive,
  type ToolchainArtifact,
} from "./artifacts";
import { resolvePlatform } from "./platform-resolver";
import { parseLlvmVersion, parseRustVersion } from "./versions";

export interface ToolchainInstallResult {
  readonly assignments: readonly EnvAssignment[];
}

export interface ToolchainServiceDeps {
  readonly fetchEngine: FetchEngine;
  readonly processRunner: ProcessRunner;
  readonly pathProvider: Pick<PathProvider, "toolPath" | "distDir">;
  readonly host: Pick<HostCapabilities, "triple">;
  readonly config: Pick<InstallerConfig, "rustToolchainDir">;
  readonly logger: Logger;
}

export class ToolchainService {
  constructor(private readonly deps: ToolchainServiceDeps) {}

  /**
   * Install the GCC toolchain of every chip. Chips sharing a toolchain are
   * installed once.
   *
   * @returns the `bin` directories, exported through `PATH`
   */
  async installGcc(chips: readonly Chip[]): Promise<ToolchainInstallResult> {
    const artifacts = new Map<string, ToolchainArtifact>();
    for (const chip of chips) {
      const artifact = gccArtifact(chip, this.deps.host.triple);
      artifacts.set(artifact.toolName, artifact);
    }

    const binDirs: string[] = [];
    for (const artifact of artifacts.values()) {
      binDirs.push(await this.install(artifact));
    }
    return {
      assignments:
        binDirs.length > 0 ? [{ name: "PATH", values: binDirs, prependToExisting: true }] : [],
    };
  }

  /**
   * Install the Xtensa LLVM toolchain of an LLVM major version.
   *
   * @returns the `lib` directory, exported as `LIBCLANG_PATH`
   * @throws VersionParseError UNKNOWN_LLVM_VERSION for unknown or unreleased majors
   */
  async installLlvm(major: string): Promise<ToolchainInstallResult> {
    const artifact = llvmArtifact(parseLlvmVersion(major), this.deps.host.triple);
    const libDir = await this.install(artifact);
    return { assignments: [{ name: "LIBCLANG_PATH", values: [libDir] }] };
  }

  /**
   * Install an Xtensa Rust release as the `esp` rustup toolchain.
   *
   * Where the host has an installer script, the compiler and the standard
   * library sources are unpacked into the cache and installed by their own
   * scripts. On Windows the compiler archive is unpacked into place.
   *
   * @returns the toolchain directory
   * @throws VersionParseError INVALID_RUST_VERSION for a malformed version
   * @throws InstallError INSTALLER_FAILED when an installer script fails
   */
  async installRust(version: string): Promise<string> {
    const { fetchEngine, host, config, logger } = this.deps;
    const release = parseRustVersion(version);
    const destination = config.rustToolchainDir;
    const { installerScript } = resolvePlatform(host.triple);
    logger.info("Installing Rust toolchain", { version: release, path: destination });

    const toolchain = rustToolchainArchive(release, host.triple);
    if (installerScript === "") {
      await fetchEngine.unpack(await this.fetchCached(toolchain), destination);
      return destination;
    }
    for (const archive of [toolchain, rustSrcArchive(release)]) {
      await this.runInstaller(archive, installerScript, destination);
    }
    return destination;
  }

  private async install(artifact: ToolchainArtifact): Promise<string> {
    const { fetchEngine, pathProvider, logger } = this.deps;
    const outputDir = join(pathProvider.toolPath(artifact.toolName), artifact.release);
    logger.info("Installing toolchain", {
      tool: artifact.toolName,
      release: artifact.release,
      path: outputDir,
    });

    await fetchEngine.unpack(await this.fetchCached(artifact), outputDir);
    return join(outputDir, ...artifact.exportDir);
  }

  private fetchCached(archive: Pick<RustArchive, "url" | "fileName">): Promise<string> {
    const { fetchEngine, pathProvider } = this.deps;
    return fetchEngine.fetch(archive.url, archive.fileName, pathProvider.distDir, false);
  }

  private async runInstaller(
    archive: RustArchive,
    script: string,
    destination: string
  ): Promise<void> {
    const { fetchEngine, processRunner, pathProvider, logger } = this.deps;
    await fetchEngine.unpack(await this.fetchCached(archive), pathProvider.distDir);

    const cwd = join(pathProvider.distDir, archive.rootDir);
    logger.debug("Running installer", { script, cwd });
    const result = await processRunner.run(
      script,
      [`--destdir=${destination}`, "--prefix=", "--without=rust-docs"],
      { cwd, inheritOutput: true }
    );
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new InstallError(
        `${script} of ${archive.rootDir} failed with exit code ${String(result.exitCode)}` +
          (detail ? `: ${detail}` : ""),
        "INSTALLER_FAILED"
      );
    }
  }
}
