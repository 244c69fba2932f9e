import { describe, it, expect } from "vitest";
import { gccToolchainName, ulpToolchainName } from "./toolchain-names";

const v = (major: number, minor: number, patch: number) => ({ major, minor, patch });

describe("gccToolchainName", () => {
  it.each([
    ["esp32", "xtensa-esp32-elf"],
    ["esp32s2", "xtensa-esp32s2-elf"],
    ["esp32s3", "xtensa-esp32s3-elf"],
    ["esp32c3", "riscv32-esp-elf"],
  ] as const)("maps %s to %s", (chip, name) => {
    expect(gccToolchainName(chip)).toBe(name);
  });
});

describe("ulpToolchainName", () => {
  it("always uses esp32ulp-elf for ESP32", () => {
    expect(ulpToolchainName("esp32", v(4, 1, 0))).toBe("esp32ulp-elf");
  });

  it("has no ULP toolchain for ESP32C3", () => {
    expect(ulpToolchainName("esp32c3", v(5, 0, 0))).toBeNull();
  });

  it.each([
    [v(4, 3, 5), "esp32s2ulp-elf"],
    [v(4, 4, 1), "esp32s2ulp-elf"],
    [v(4, 4, 2), "esp32ulp-elf"],
    [v(4, 5, 0), "esp32ulp-elf"],
    [v(5, 0, 0), "esp32ulp-elf"],
  ])("picks the S2/S3 toolchain for %o", (version, name) => {
    expect(ulpToolchainName("esp32s2", version)).toBe(name);
    expect(ulpToolchainName("esp32s3", version)).toBe(name);
  });

  it("treats an unknown version as current", () => {
    expect(ulpToolchainName("esp32s3", null)).toBe("esp32ulp-elf");
  });
});
