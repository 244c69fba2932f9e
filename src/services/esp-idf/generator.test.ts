import { describe, it, expect } from "vitest";
import { defaultCmakeGenerator } from "./generator";

describe("defaultCmakeGenerator", () => {
  it("uses Unix Makefiles on linux/arm64", () => {
    expect(defaultCmakeGenerator({ platform: "linux", arch: "arm64" })).toBe("UnixMakefiles");
  });

  it.each([
    ["linux", "x64"],
    ["darwin", "arm64"],
    ["win32", "x64"],
  ] as const)("uses Ninja on %s/%s", (platform, arch) => {
    expect(defaultCmakeGenerator({ platform, arch })).toBe("Ninja");
  });
});
