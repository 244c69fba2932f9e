import { describe, it, expect } from "vitest";
import { hostCapabilities, hostTriple } from "./host-capabilities";
import { createMockPlatformInfo } from "./platform-info.test-utils";

describe("hostTriple", () => {
  it.each([
    ["linux", "x64", "x86_64-unknown-linux-gnu"],
    ["linux", "arm64", "aarch64-unknown-linux-gnu"],
    ["darwin", "x64", "x86_64-apple-darwin"],
    ["darwin", "arm64", "aarch64-apple-darwin"],
    ["win32", "x64", "x86_64-pc-windows-msvc"],
  ] as const)("maps %s/%s to %s", (platform, arch, expected) => {
    expect(hostTriple({ platform, arch })).toBe(expected);
  });

  it("keeps unknown platforms recognisable", () => {
    expect(hostTriple({ platform: "freebsd", arch: "x64" })).toBe("x86_64-unknown-freebsd");
  });
});

describe("hostCapabilities", () => {
  it("requests the windows-only tools on win32", () => {
    const host = hostCapabilities(createMockPlatformInfo({ platform: "win32" }));

    expect(host.needsInstallerHelper).toBe(true);
    expect(host.needsCompilerCache).toBe(true);
    expect(host.needsFlashingUtility).toBe(true);
    expect(host.pythonExecutable).toBe("python");
  });

  it("uses Ninja and ULP toolchains on linux x64", () => {
    const host = hostCapabilities(createMockPlatformInfo());

    expect(host).toEqual({
      triple: "x86_64-unknown-linux-gnu",
      needsInstallerHelper: false,
      needsCompilerCache: false,
      needsFlashingUtility: false,
      supportsUlpToolchain: true,
      defaultGenerator: "Ninja",
      pythonExecutable: "python3",
    });
  });

  it("falls back to Unix Makefiles without ULP on linux arm64", () => {
    const host = hostCapabilities(createMockPlatformInfo({ arch: "arm64" }));

    expect(host.defaultGenerator).toBe("UnixMakefiles");
    expect(host.supportsUlpToolchain).toBe(false);
  });

  it("keeps Ninja on macOS arm64", () => {
    const host = hostCapabilities(createMockPlatformInfo({ platform: "darwin", arch: "arm64" }));

    expect(host.defaultGenerator).toBe("Ninja");
    expect(host.supportsUlpToolchain).toBe(true);
  });
});
