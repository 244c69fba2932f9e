/**
 * Integration tests for ToolchainService with the real fetch engine,
 * filesystem layer and archive extractor. Only HTTP and processes are mocked.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { ToolchainService } from "./toolchain-service";
import { DefaultFetchEngine } from "../download/fetch-engine";
import { DefaultArchiveExtractor } from "../download/archive-extractor";
import { createTarGzBytes } from "../download/archive-fixtures.test-utils";
import { DefaultFileSystemLayer } from "../platform/filesystem";
import { DefaultPathProvider } from "../platform/path-provider";
import { createMockHttpClient } from "../platform/network.test-utils";
import { createMockProcessRunner } from "../platform/process.test-utils";
import { createSilentLogger } from "../logging/logging.test-utils";
import { createTempDir } from "../test-utils";

const GCC_FILE = "riscv32-esp-elf-gcc8_4_0-esp-2021r2-patch3-linux-amd64.tar.gz";
const GCC_URL = `https://github.com/espressif/crosstool-NG/releases/download/esp-2021r2-patch3/${GCC_FILE}`;

describe("ToolchainService (integration)", () => {
  let tempDir: { path: string; cleanup: () => Promise<void> };

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await tempDir.cleanup();
  });

  it("serves a repeated GCC install from the download cache", async () => {
    const logger = createSilentLogger();
    const bytes = await createTarGzBytes({
      "riscv32-esp-elf/bin/riscv32-esp-elf-gcc": { content: "gcc", mode: 0o755 },
    });
    const http = createMockHttpClient({ [GCC_URL]: { body: bytes } });
    const pathProvider = new DefaultPathProvider({ toolsRoot: tempDir.path });
    const fileSystem = new DefaultFileSystemLayer(logger);
    const service = new ToolchainService({
      fetchEngine: new DefaultFetchEngine({
        httpClient: http,
        fileSystem,
        extractor: new DefaultArchiveExtractor(logger),
        pathProvider,
        logger,
      }),
      processRunner: createMockProcessRunner(),
      pathProvider,
      host: { triple: "x86_64-unknown-linux-gnu" },
      config: { rustToolchainDir: join(tempDir.path, "rustup", "toolchains", "esp") },
      logger,
    });

    const first = await service.installGcc(["esp32c3"]);
    const second = await service.installGcc(["esp32c3"]);

    expect(http.fetch).toHaveBeenCalledTimes(1);
    expect(second).toEqual(first);
    expect(await readdir(pathProvider.distDir)).toEqual([GCC_FILE]);
    const binDir = join(
      tempDir.path,
      "tools",
      "riscv32-esp-elf",
      "esp-2021r2-patch3",
      "riscv32-esp-elf",
      "bin"
    );
    expect(first.assignments).toEqual([{ name: "PATH", values: [binDir], prependToExisting: true }]);
    expect(await readFile(join(binDir, "riscv32-esp-elf-gcc"), "utf-8")).toBe("gcc");
  });
});
