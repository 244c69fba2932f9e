/**
 * ESP-IDF SDK installer.
 *
 * Checks out the SDK into its content-addressed directory and drives the
 * SDK's own `tools/idf_tools.py` to install the tools a selector asks for.
 */

import { join } from "node:path";
import { InstallError } from "../errors";
import { getErrorMessage } from "../../shared/error-utils";
import type { IGitClient } from "../git/git-client";
import type { FileSystemLayer } from "../platform/filesystem";
import type { ProcessRunner } from "../platform/process";
import type { HostCapabilities } from "../platform/host-capabilities";
import type { FetchEngine } from "../download/fetch-engine";
import type { Logger } from "../logging";
import { formatRef, type RemoteRef } from "./git-ref";
import { deriveInstallPath } from "./install-path";
import type { ToolRequest } from "./tool-plan";
import {
  formatEspIdfVersion,
  parseVersionCmake,
  VERSION_CMAKE_PATH,
  type EspIdfVersion,
} from "./version";

export interface SdkSource {
  readonly repositoryUrl: string;
  readonly ref: RemoteRef;
}

/**
 * Chooses the tools for a checkout once its version is known.
 */
export type ToolSelector = (
  checkoutDir: string,
  version: EspIdfVersion | null
) => readonly ToolRequest[];

export interface SdkInstallRequest {
  readonly source: SdkSource;
  /** Tools root; the checkout and every tool end up below it */
  readonly installDir: string;
  readonly selectTools: ToolSelector;
}

export interface SdkInstallResult {
  readonly checkoutDir: string;
  readonly version: EspIdfVersion | null;
}

export interface SdkInstaller {
  /**
   * @throws GitError when the checkout fails
   * @throws InstallError with code INSTALLER_FAILED when idf_tools.py fails
   * @throws FetchError / ArchiveError when a downloaded tool cannot be installed
   */
  install(request: SdkInstallRequest): Promise<SdkInstallResult>;
}

export interface GitSdkInstallerDeps {
  readonly gitClient: IGitClient;
  readonly processRunner: ProcessRunner;
  readonly fileSystem: FileSystemLayer;
  readonly fetchEngine: FetchEngine;
  readonly host: Pick<HostCapabilities, "pythonExecutable">;
  readonly logger: Logger;
}

export class GitSdkInstaller implements SdkInstaller {
  constructor(private readonly deps: GitSdkInstallerDeps) {}

  async install(request: SdkInstallRequest): Promise<SdkInstallResult> {
    const { source, installDir, selectTools } = request;
    const checkoutDir = deriveInstallPath(installDir, source.repositoryUrl, source.ref);

    await this.ensureCheckout(source, checkoutDir);
    const version = await this.readVersion(checkoutDir);
    this.deps.logger.info("Using ESP-IDF", {
      version: formatEspIdfVersion(version),
      path: checkoutDir,
    });

    for (const toolRequest of selectTools(checkoutDir, version)) {
      if (toolRequest.kind === "idf-tools") {
        await this.runIdfTools(checkoutDir, installDir, ["install", ...toolRequest.names]);
      } else {
        const { fetchEngine } = this.deps;
        const outputDir = join(installDir, "tools", toolRequest.name, toolRequest.version);
        const archive = await fetchEngine.fetch(
          toolRequest.url,
          toolRequest.fileName,
          join(installDir, "dist"),
          false
        );
        await fetchEngine.unpack(archive, outputDir);
      }
    }
    await this.runIdfTools(checkoutDir, installDir, ["install-python-env"]);

    return { checkoutDir, version };
  }

  private async ensureCheckout(source: SdkSource, checkoutDir: string): Promise<void> {
    const { fileSystem, gitClient, logger } = this.deps;
    const checkedOut =
      (await fileSystem.pathExists(checkoutDir)) && (await gitClient.isRepositoryRoot(checkoutDir));
    if (checkedOut) {
      logger.info("ESP-IDF already checked out", { path: checkoutDir });
      return;
    }
    logger.info("Checking out ESP-IDF", {
      url: source.repositoryUrl,
      ref: formatRef(source.ref),
      path: checkoutDir,
    });
    await gitClient.clone(source.repositoryUrl, checkoutDir, source.ref);
  }

  private async readVersion(checkoutDir: string): Promise<EspIdfVersion | null> {
    const versionFile = join(checkoutDir, ...VERSION_CMAKE_PATH);
    let content: string;
    try {
      content = await this.deps.fileSystem.readFile(versionFile);
    } catch (error) {
      this.deps.logger.warn("Could not read ESP-IDF version", {
        path: versionFile,
        error: getErrorMessage(error),
      });
      return null;
    }
    const version = parseVersionCmake(content);
    if (version === null) {
      this.deps.logger.warn("Malformed ESP-IDF version file", { path: versionFile });
    }
    return version;
  }

  private async runIdfTools(
    checkoutDir: string,
    installDir: string,
    command: readonly string[]
  ): Promise<void> {
    const script = join(checkoutDir, "tools", "idf_tools.py");
    const args = [script, "--idf-path", checkoutDir, "--non-interactive", ...command];
    this.deps.logger.debug("Running idf_tools.py", { args: command.join(" ") });

    const result = await this.deps.processRunner.run(this.deps.host.pythonExecutable, args, {
      env: { IDF_TOOLS_PATH: installDir },
      inheritOutput: true,
    });
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim();
      throw new InstallError(
        `idf_tools.py ${command.join(" ")} failed with exit code ${String(result.exitCode)}` +
          (detail ? `: ${detail}` : ""),
        "INSTALLER_FAILED"
      );
    }
  }
}
