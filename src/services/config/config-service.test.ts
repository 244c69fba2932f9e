import { describe, it, expect } from "vitest";
import { join } from "node:path";
import { loadInstallerConfig } from "./config-service";
import { ConfigError } from "../errors";

const home = { homeDir: join("/home", "test") };

describe("loadInstallerConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadInstallerConfig({}, home)).toEqual({
      toolsRoot: join("/home", "test", ".espressif"),
      espIdfRepository: "https://github.com/espressif/esp-idf",
      rustToolchainDir: join("/home", "test", ".rustup", "toolchains", "esp"),
      logLevel: "info",
      loggerFilter: null,
    });
  });

  it("takes the tools root from IDF_TOOLS_PATH", () => {
    const config = loadInstallerConfig({ IDF_TOOLS_PATH: join("/opt", "esp") }, home);

    expect(config.toolsRoot).toBe(join("/opt", "esp"));
  });

  it("installs the Rust toolchain below RUSTUP_HOME", () => {
    const config = loadInstallerConfig({ RUSTUP_HOME: join("/opt", "rustup") }, home);

    expect(config.rustToolchainDir).toBe(join("/opt", "rustup", "toolchains", "esp"));
  });

  it("treats empty values as unset", () => {
    const config = loadInstallerConfig({ IDF_TOOLS_PATH: "  ", ESP_INSTALLER_LOGLEVEL: "" }, home);

    expect(config.toolsRoot).toBe(join("/home", "test", ".espressif"));
    expect(config.logLevel).toBe("info");
  });

  it("normalises the log level", () => {
    expect(loadInstallerConfig({ ESP_INSTALLER_LOGLEVEL: "DEBUG" }, home).logLevel).toBe("debug");
  });

  it("parses the logger filter", () => {
    const config = loadInstallerConfig({ ESP_INSTALLER_LOGGER: "fetch, git,," }, home);

    expect(config.loggerFilter).toEqual(["fetch", "git"]);
  });

  it("overrides the ESP-IDF repository", () => {
    const config = loadInstallerConfig(
      { ESP_IDF_REPOSITORY: "https://example.test/mirror/esp-idf.git" },
      home
    );

    expect(config.espIdfRepository).toBe("https://example.test/mirror/esp-idf.git");
  });

  it("rejects a relative tools root", () => {
    expect(() => loadInstallerConfig({ IDF_TOOLS_PATH: "tools" }, home)).toThrow(ConfigError);
  });

  it("names every invalid variable", () => {
    const error = (() => {
      try {
        loadInstallerConfig({ ESP_INSTALLER_LOGLEVEL: "loud", ESP_IDF_REPOSITORY: "nope" }, home);
      } catch (e) {
        return e;
      }
      return undefined;
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ code: "INVALID_CONFIG" });
    expect(String(error)).toContain("ESP_IDF_REPOSITORY");
    expect(String(error)).toContain("ESP_INSTALLER_LOGLEVEL");
  });
});
