/**
 * Names of the compiler toolchains idf_tools.py installs per chip.
 */

import type { EspIdfVersion } from "../esp-idf/version";
import type { Chip } from "./chip";

export const GCC_TOOLCHAIN_NAMES = {
  esp32: "xtensa-esp32-elf",
  esp32s2: "xtensa-esp32s2-elf",
  esp32s3: "xtensa-esp32s3-elf",
  esp32c3: "riscv32-esp-elf",
} as const satisfies Record<Chip, string>;

export function gccToolchainName(chip: Chip): string {
  return GCC_TOOLCHAIN_NAMES[chip];
}

/**
 * Name of the ULP coprocessor toolchain for a chip.
 *
 * ESP32-S2/S3 share the ESP32 ULP toolchain from ESP-IDF 4.4.2 on; older
 * releases ship a dedicated one. An unknown version is treated as current.
 *
 * @returns the toolchain name, or null for chips without a ULP coprocessor
 */
export function ulpToolchainName(chip: Chip, version: EspIdfVersion | null): string | null {
  switch (chip) {
    case "esp32":
      return "esp32ulp-elf";
    case "esp32s2":
    case "esp32s3": {
      const shared =
        version === null ||
        version.major > 4 ||
        (version.major === 4 && version.minor > 4) ||
        (version.major === 4 && version.minor === 4 && version.patch >= 2);
      return shared ? "esp32ulp-elf" : "esp32s2ulp-elf";
    }
    case "esp32c3":
      return null;
  }
}
