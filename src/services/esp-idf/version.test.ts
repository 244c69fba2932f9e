import { describe, it, expect } from "vitest";
import { compareVersions, formatEspIdfVersion, parseVersionCmake } from "./version";
import { versionCmake } from "../test-utils";

describe("parseVersionCmake", () => {
  it("reads the three components", () => {
    expect(parseVersionCmake(versionCmake(4, 4, 2))).toEqual({ major: 4, minor: 4, patch: 2 });
  });

  it("tolerates extra whitespace", () => {
    const content = "  set( IDF_VERSION_MAJOR  5 )\nset(IDF_VERSION_MINOR 1)\nset(IDF_VERSION_PATCH 0)\n";

    expect(parseVersionCmake(content)).toEqual({ major: 5, minor: 1, patch: 0 });
  });

  it("returns null when a component is missing", () => {
    expect(parseVersionCmake("set(IDF_VERSION_MAJOR 5)\nset(IDF_VERSION_MINOR 1)\n")).toBeNull();
  });

  it("returns null for unrelated content", () => {
    expect(parseVersionCmake("cmake_minimum_required(VERSION 3.16)")).toBeNull();
  });
});

describe("formatEspIdfVersion", () => {
  it("formats known and unknown versions", () => {
    expect(formatEspIdfVersion({ major: 5, minor: 0, patch: 1 })).toBe("v5.0.1");
    expect(formatEspIdfVersion(null)).toBe("(unknown)");
  });
});

describe("compareVersions", () => {
  it("orders by major, minor, then patch", () => {
    const v = (major: number, minor: number, patch: number) => ({ major, minor, patch });

    expect(compareVersions(v(5, 0, 0), v(4, 4, 0))).toBeGreaterThan(0);
    expect(compareVersions(v(4, 3, 9), v(4, 4, 0))).toBeLessThan(0);
    expect(compareVersions(v(4, 4, 1), v(4, 4, 2))).toBeLessThan(0);
    expect(compareVersions(v(4, 4, 2), v(4, 4, 2))).toBe(0);
  });
});
