/**
 * ESP-IDF installation: checkout, tool selection and optional pruning.
 */

import { join } from "node:path";
import { InstallError } from "../errors";
import { getErrorMessage } from "../../shared/error-utils";
import type { InstallerConfig } from "../config/types";
import type { FileSystemLayer } from "../platform/filesystem";
import type { HostCapabilities } from "../platform/host-capabilities";
import type { PathProvider } from "../platform/path-provider";
import type { Chip } from "../toolchain/chip";
import type { Logger } from "../logging";
import { formatRef, parseEspIdfGitRef } from "./git-ref";
import type { SdkInstaller } from "./installer";
import { planTools } from "./tool-plan";
import { formatEspIdfVersion } from "./version";

/**
 * Checkout subtrees that building firmware does not need.
 */
export const MINIFY_PATHS: readonly (readonly string[])[] = [
  ["docs"],
  ["examples"],
  ["tools", "esp_app_trace"],
  ["tools", "test_idf_size"],
];

export interface EspIdfInstallOptions {
  readonly targets: readonly Chip[];
  /** Version as given by the user, see parseEspIdfGitRef */
  readonly version: string;
  readonly minify: boolean;
}

export interface EspIdfServiceDeps {
  readonly installer: SdkInstaller;
  readonly fileSystem: FileSystemLayer;
  readonly config: Pick<InstallerConfig, "espIdfRepository">;
  readonly pathProvider: Pick<PathProvider, "toolsRoot">;
  readonly host: HostCapabilities;
  readonly logger: Logger;
}

export class EspIdfService {
  constructor(private readonly deps: EspIdfServiceDeps) {}

  /**
   * Install ESP-IDF and the tools for the given targets.
   *
   * @returns the checkout directory
   * @throws VersionParseError for an empty version
   * @throws InstallError with code MINIFY_FAILED when pruning fails
   */
  async install(options: EspIdfInstallOptions): Promise<string> {
    const { installer, config, pathProvider, host, logger } = this.deps;
    const ref = parseEspIdfGitRef(options.version);
    const generator = host.defaultGenerator;
    logger.debug("Installing ESP-IDF", {
      ref: formatRef(ref),
      targets: options.targets.join(","),
      generator,
      toolsRoot: pathProvider.toolsRoot,
    });

    const { checkoutDir } = await installer.install({
      source: { repositoryUrl: config.espIdfRepository, ref },
      installDir: pathProvider.toolsRoot,
      selectTools: (checkout, version) => {
        const requests = planTools({ targets: options.targets, version, host, generator });
        logger.info("Selected tools", {
          version: formatEspIdfVersion(version),
          checkoutDir: checkout,
          requests: requests.length,
        });
        return requests;
      },
    });

    if (options.minify) {
      await this.minify(checkoutDir);
    }
    return checkoutDir;
  }

  /**
   * Remove docs, examples and test tooling from a checkout.
   * The first failure aborts.
   */
  async minify(checkoutDir: string): Promise<void> {
    this.deps.logger.info("Minifying ESP-IDF", { path: checkoutDir });
    for (const segments of MINIFY_PATHS) {
      const target = join(checkoutDir, ...segments);
      try {
        await this.deps.fileSystem.rm(target, { recursive: true });
      } catch (error) {
        throw new InstallError(
          `Failed to remove ${target}: ${getErrorMessage(error)}`,
          "MINIFY_FAILED"
        );
      }
    }
  }
}
