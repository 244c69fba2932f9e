import { describe, it, expect, beforeEach } from "vitest";
import { join } from "node:path";
import { ToolchainService } from "./toolchain-service";
import { DefaultPathProvider } from "../platform/path-provider";
import type { PlatformId } from "../platform/host-capabilities";
import {
  createMockFetchEngine,
  type MockFetchEngine,
} from "../download/fetch-engine.test-utils";
import {
  createMockProcessRunner,
  type MockProcessRunner,
} from "../platform/process.test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";
import { InstallError, VersionParseError } from "../errors";

const TOOLS = join("/tools", "tools");
const DIST = join("/tools", "dist");
const RUST_DIR = join("/home", "test", ".rustup", "toolchains", "esp");
const GCC_URL = "https://github.com/espressif/crosstool-NG/releases/download/esp-2021r2-patch3";
const LLVM_URL = "https://github.com/espressif/llvm-project/releases/download";
const RUST_URL = "https://github.com/esp-rs/rust-build/releases/download/v1.62.1.0";

describe("ToolchainService", () => {
  let fetchEngine: MockFetchEngine;
  let processRunner: MockProcessRunner;

  beforeEach(() => {
    fetchEngine = createMockFetchEngine();
    processRunner = createMockProcessRunner();
  });

  function createService(triple: PlatformId = "x86_64-unknown-linux-gnu"): ToolchainService {
    return new ToolchainService({
      fetchEngine,
      processRunner,
      pathProvider: new DefaultPathProvider({ toolsRoot: join("/tools") }),
      host: { triple },
      config: { rustToolchainDir: RUST_DIR },
      logger: createSilentLogger(),
    });
  }

  describe("installGcc", () => {
    it("caches each chip's archive and unpacks it below its release directory", async () => {
      const result = await createService().installGcc(["esp32", "esp32c3"]);

      const xtensa = "xtensa-esp32-elf-gcc8_4_0-esp-2021r2-patch3-linux-amd64.tar.gz";
      const riscv = "riscv32-esp-elf-gcc8_4_0-esp-2021r2-patch3-linux-amd64.tar.gz";
      expect(fetchEngine.fetch.mock.calls).toEqual([
        [`${GCC_URL}/${xtensa}`, xtensa, DIST, false],
        [`${GCC_URL}/${riscv}`, riscv, DIST, false],
      ]);
      expect(fetchEngine.unpack.mock.calls).toEqual([
        [join(DIST, xtensa), join(TOOLS, "xtensa-esp32-elf", "esp-2021r2-patch3")],
        [join(DIST, riscv), join(TOOLS, "riscv32-esp-elf", "esp-2021r2-patch3")],
      ]);
      expect(result).toEqual({
        assignments: [
          {
            name: "PATH",
            values: [
              join(TOOLS, "xtensa-esp32-elf", "esp-2021r2-patch3", "xtensa-esp32-elf", "bin"),
              join(TOOLS, "riscv32-esp-elf", "esp-2021r2-patch3", "riscv32-esp-elf", "bin"),
            ],
            prependToExisting: true,
          },
        ],
      });
    });

    it("installs a shared toolchain once", async () => {
      await createService().installGcc(["esp32c3", "esp32c3"]);

      expect(fetchEngine.fetch).toHaveBeenCalledTimes(1);
      expect(fetchEngine.unpack).toHaveBeenCalledTimes(1);
    });

    it("exports nothing without chips", async () => {
      expect(await createService().installGcc([])).toEqual({ assignments: [] });
    });
  });

  describe("installLlvm", () => {
    it("unpacks the release of the major version and exports its lib directory", async () => {
      const result = await createService().installLlvm("14");

      const fileName = "xtensa-esp32-elf-llvm14_0_0-esp-14.0.0-20220415-linux-amd64.tar.xz";
      const outputDir = join(TOOLS, "xtensa-esp32-elf-clang", "esp-14.0.0-20220415");
      expect(fetchEngine.fetch).toHaveBeenCalledWith(
        `${LLVM_URL}/esp-14.0.0-20220415/${fileName}`,
        fileName,
        DIST,
        false
      );
      expect(fetchEngine.unpack).toHaveBeenCalledWith(join(DIST, fileName), outputDir);
      expect(result).toEqual({
        assignments: [
          { name: "LIBCLANG_PATH", values: [join(outputDir, "xtensa-esp32-elf-clang", "lib")] },
        ],
      });
    });

    it.each(["12", "15"])("rejects LLVM %s without downloading", async (major) => {
      await expect(createService().installLlvm(major)).rejects.toBeInstanceOf(VersionParseError);
      expect(fetchEngine.fetch).not.toHaveBeenCalled();
    });
  });

  describe("installRust", () => {
    const toolchainFile = "rust-1.62.1.0-x86_64-unknown-linux-gnu.tar.xz";
    const srcFile = "rust-src-1.62.1.0.tar.xz";
    const installerArgs = [`--destdir=${RUST_DIR}`, "--prefix=", "--without=rust-docs"];

    it("runs the bundled installer of the compiler and the sources", async () => {
      const result = await createService().installRust("1.62.1.0");

      expect(result).toBe(RUST_DIR);
      expect(fetchEngine.fetch.mock.calls).toEqual([
        [`${RUST_URL}/${toolchainFile}`, toolchainFile, DIST, false],
        [`${RUST_URL}/${srcFile}`, srcFile, DIST, false],
      ]);
      expect(fetchEngine.unpack.mock.calls).toEqual([
        [join(DIST, toolchainFile), DIST],
        [join(DIST, srcFile), DIST],
      ]);
      expect(processRunner.run.mock.calls).toEqual([
        [
          "./install.sh",
          installerArgs,
          { cwd: join(DIST, "rust-1.62.1.0-x86_64-unknown-linux-gnu"), inheritOutput: true },
        ],
        ["./install.sh", installerArgs, { cwd: join(DIST, "rust-src-1.62.1.0"), inheritOutput: true }],
      ]);
    });

    it("unpacks the archive into the toolchain directory on Windows", async () => {
      await createService("x86_64-pc-windows-msvc").installRust("v1.62.1.0");

      const fileName = "rust-1.62.1.0-x86_64-pc-windows-msvc.zip";
      expect(fetchEngine.fetch.mock.calls).toEqual([[`${RUST_URL}/${fileName}`, fileName, DIST, false]]);
      expect(fetchEngine.unpack.mock.calls).toEqual([[join(DIST, fileName), RUST_DIR]]);
      expect(processRunner.run).not.toHaveBeenCalled();
    });

    it("throws INSTALLER_FAILED and skips the sources when the installer fails", async () => {
      processRunner = createMockProcessRunner({ exitCode: 1, stderr: "install: permission denied\n" });

      const error = await createService().installRust("1.62.1.0").catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InstallError);
      expect(error).toMatchObject({
        errorCode: "INSTALLER_FAILED",
        message:
          "./install.sh of rust-1.62.1.0-x86_64-unknown-linux-gnu failed with exit code 1: install: permission denied",
      });
      expect(fetchEngine.fetch).toHaveBeenCalledTimes(1);
    });

    it("rejects a malformed version without downloading", async () => {
      await expect(createService().installRust("nightly")).rejects.toMatchObject({
        errorCode: "INVALID_RUST_VERSION",
      });
      expect(fetchEngine.fetch).not.toHaveBeenCalled();
    });
  });
});
