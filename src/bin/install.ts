/**
 * ESP toolchain installer command line.
 *
 * Installs the Xtensa LLVM toolchain, optionally an Xtensa Rust toolchain, and
 * either the GCC toolchains of the requested targets or a full ESP-IDF
 * checkout with its tools, then optionally writes an environment export file.
 *
 * Usage:
 *   install [--targets all] [--llvm-version 14] [--toolchain-version <version>]
 *           [--esp-idf-version <version>] [--minify] [--clear-cache]
 *           [--export-file <path>]
 */

import { parseArgs } from "node:util";
import { ConfigError, isServiceError } from "../services/errors";
import { getErrorMessage } from "../shared/error-utils";
import { loadInstallerConfig } from "../services/config";
import { ElectronLogService, type LogContext, type Logger } from "../services/logging";
import { detectPlatformInfo } from "../services/platform/platform-info";
import { hostCapabilities } from "../services/platform/host-capabilities";
import { DefaultPathProvider } from "../services/platform/path-provider";
import { DefaultFileSystemLayer } from "../services/platform/filesystem";
import { DefaultNetworkLayer } from "../services/platform/network";
import { ExecaProcessRunner } from "../services/platform/process";
import { SimpleGitClient } from "../services/git/simple-git-client";
import { DefaultArchiveExtractor, DefaultFetchEngine, type FetchEngine } from "../services/download";
import { EnvExportWriter, type EnvAssignment } from "../services/env-export";
import { ToolchainService } from "../services/toolchain/toolchain-service";
import { DEFAULT_LLVM_MAJOR } from "../services/toolchain/versions";
import { parseTargets, type Chip } from "../services/toolchain/chip";
import { EspIdfService } from "../services/esp-idf/esp-idf-service";
import { GitSdkInstaller } from "../services/esp-idf/installer";

// Exit codes
const EXIT_INSTALL_FAILED = 1;
const EXIT_USAGE = 2;

export interface InstallOptions {
  readonly targets: readonly Chip[];
  readonly llvmVersion: string;
  /** Xtensa Rust release to install as the `esp` toolchain; skipped when null */
  readonly rustVersion: string | null;
  /** ESP-IDF version to install; GCC toolchains are installed standalone when null */
  readonly espIdfVersion: string | null;
  readonly minify: boolean;
  readonly clearCache: boolean;
  readonly exportFile: string | null;
}

/**
 * Parse the command line (without the node and script entries).
 *
 * @throws ConfigError INVALID_ARGUMENTS for unknown options or missing values
 * @throws TargetParseError for an invalid target list
 */
export function parseInstallArgs(argv: readonly string[]): InstallOptions {
  const values = readArgs(argv);
  return {
    targets: parseTargets(values.targets ?? "all"),
    llvmVersion: values["llvm-version"] ?? DEFAULT_LLVM_MAJOR,
    rustVersion: values["toolchain-version"] ?? null,
    espIdfVersion: values["esp-idf-version"] ?? null,
    minify: values.minify ?? false,
    clearCache: values["clear-cache"] ?? false,
    exportFile: values["export-file"] ?? null,
  };
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      strict: true,
      allowPositionals: false,
      options: {
        targets: { type: "string", short: "t" },
        "llvm-version": { type: "string" },
        "toolchain-version": { type: "string" },
        "esp-idf-version": { type: "string", short: "e" },
        minify: { type: "boolean" },
        "clear-cache": { type: "boolean" },
        "export-file": { type: "string", short: "f" },
      },
    }).values;
  } catch (error) {
    throw new ConfigError(getErrorMessage(error), "INVALID_ARGUMENTS");
  }
}

/**
 * Services the install command drives.
 */
export interface InstallCommandDeps {
  readonly toolchain: Pick<ToolchainService, "installGcc" | "installLlvm" | "installRust">;
  readonly espIdf: Pick<EspIdfService, "install">;
  readonly fetchEngine: Pick<FetchEngine, "clearCache">;
  readonly exportWriter: Pick<EnvExportWriter, "write">;
  readonly toolsRoot: string;
  readonly logger: Logger;
}

/**
 * Run an installation.
 *
 * @returns the environment assignments, also written to the export file when one is given
 */
export async function runInstall(
  options: InstallOptions,
  deps: InstallCommandDeps
): Promise<readonly EnvAssignment[]> {
  const { toolchain, espIdf, fetchEngine, exportWriter, toolsRoot, logger } = deps;
  logger.debug("Arguments", {
    targets: options.targets.join(","),
    llvmVersion: options.llvmVersion,
    rustVersion: options.rustVersion,
    espIdfVersion: options.espIdfVersion,
    minify: options.minify,
    clearCache: options.clearCache,
    exportFile: options.exportFile,
    toolsRoot,
  });

  const assignments: EnvAssignment[] = [];
  const llvm = await toolchain.installLlvm(options.llvmVersion);
  assignments.push(...llvm.assignments);
  if (options.rustVersion !== null) {
    await toolchain.installRust(options.rustVersion);
  }

  if (options.espIdfVersion !== null) {
    const checkoutDir = await espIdf.install({
      targets: options.targets,
      version: options.espIdfVersion,
      minify: options.minify,
    });
    assignments.push(
      { name: "IDF_TOOLS_PATH", values: [toolsRoot] },
      { name: "IDF_PATH", values: [checkoutDir] }
    );
  } else {
    const gcc = await toolchain.installGcc(options.targets);
    assignments.push(...gcc.assignments);
  }

  if (options.exportFile !== null) {
    await exportWriter.write(options.exportFile, assignments);
  }
  if (options.clearCache) {
    await fetchEngine.clearCache();
  }
  logger.info("Installation complete", { targets: options.targets.join(",") });
  return assignments;
}

async function main(): Promise<number> {
  let options: InstallOptions;
  try {
    options = parseInstallArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${getErrorMessage(error)}`);
    return EXIT_USAGE;
  }

  const platformInfo = detectPlatformInfo();
  const config = loadInstallerConfig(process.env, platformInfo);
  const pathProvider = new DefaultPathProvider(config);
  const loggingService = new ElectronLogService(config, pathProvider);
  const host = hostCapabilities(platformInfo);

  const fileSystem = new DefaultFileSystemLayer(loggingService.createLogger("fs"));
  const fetchEngine = new DefaultFetchEngine({
    httpClient: new DefaultNetworkLayer(loggingService.createLogger("network")),
    fileSystem,
    extractor: new DefaultArchiveExtractor(loggingService.createLogger("fetch")),
    pathProvider,
    logger: loggingService.createLogger("fetch"),
  });
  const processRunner = new ExecaProcessRunner(loggingService.createLogger("process"));
  const espIdfLogger = loggingService.createLogger("esp-idf");
  const logger = loggingService.createLogger("cli");

  try {
    await runInstall(options, {
      toolchain: new ToolchainService({
        fetchEngine,
        processRunner,
        pathProvider,
        host,
        config,
        logger: loggingService.createLogger("toolchain"),
      }),
      espIdf: new EspIdfService({
        installer: new GitSdkInstaller({
          gitClient: new SimpleGitClient(loggingService.createLogger("git")),
          processRunner,
          fileSystem,
          fetchEngine,
          host,
          logger: espIdfLogger,
        }),
        fileSystem,
        config,
        pathProvider,
        host,
        logger: espIdfLogger,
      }),
      fetchEngine,
      exportWriter: new EnvExportWriter(fileSystem, loggingService.createLogger("export")),
      toolsRoot: config.toolsRoot,
      logger,
    });
    return 0;
  } catch (error) {
    const context: LogContext = isServiceError(error)
      ? { type: error.type, code: error.code ?? null }
      : {};
    logger.error(`Installation failed: ${getErrorMessage(error)}`, context);
    return EXIT_INSTALL_FAILED;
  } finally {
    loggingService.dispose();
  }
}

// Skip when running in test environment (Vitest sets VITEST env var)
if (!process.env.VITEST) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error("Fatal error:", getErrorMessage(error));
      process.exitCode = EXIT_INSTALL_FAILED;
    }
  );
}
