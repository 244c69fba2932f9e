import { describe, it, expect } from "vitest";
import { archiveKindFromFileName } from "./types";
import { FetchError } from "../errors";

describe("archiveKindFromFileName", () => {
  it.each([
    ["xtensa-esp32-elf-gcc8_4_0-esp-2021r2-patch3-win64.zip", "zip"],
    ["cmake-3.20.3-linux-x86_64.tar.gz", "tar.gz"],
    ["release.tgz", "tar.gz"],
    ["xtensa-esp32-elf-llvm14_0_0-esp-14.0.0-20220415-linux-amd64.tar.xz", "tar.xz"],
    ["UPPER.ZIP", "zip"],
  ])("resolves %s to %s", (fileName, kind) => {
    expect(archiveKindFromFileName(fileName)).toBe(kind);
  });

  it("rejects unknown extensions naming the extension", () => {
    expect(() => archiveKindFromFileName("toolchain.tar.bz2")).toThrow(
      new FetchError("Unsupported file extension: 'bz2'", "UNSUPPORTED_EXTENSION")
    );
  });

  it("rejects file names without an extension", () => {
    let caught: unknown;
    try {
      archiveKindFromFileName("installer");
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(FetchError);
    expect(caught).toMatchObject({
      errorCode: "UNSUPPORTED_EXTENSION",
      message: "Unsupported file extension: ''",
    });
  });
});
