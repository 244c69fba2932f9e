import { describe, it, expect } from "vitest";
import {
  ServiceError,
  TargetParseError,
  VersionParseError,
  FetchError,
  ArchiveError,
  GitError,
  InstallError,
  ConfigError,
  FileSystemError,
  isServiceError,
  getErrorMessage,
} from "./errors";

describe("ServiceError", () => {
  describe("GitError", () => {
    it("has correct type", () => {
      const error = new GitError("Repository not found");
      expect(error.type).toBe("git");
    });

    it("preserves optional code", () => {
      const error = new GitError("Repository not found", "CLONE_FAILED");
      expect(error.code).toBe("CLONE_FAILED");
    });

    it("is instanceof Error and ServiceError", () => {
      const error = new GitError("test");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(ServiceError);
    });

    it("serializes without code when not provided", () => {
      expect(new GitError("Repository not found").toJSON()).toEqual({
        type: "git",
        message: "Repository not found",
      });
    });
  });

  describe("TargetParseError", () => {
    it("carries the offending token", () => {
      const error = new TargetParseError("Unknown target: esp8266", "UNKNOWN_TARGET", "esp8266");

      expect(error.token).toBe("esp8266");
      expect(error.name).toBe("TargetParseError");
      expect(error.toJSON()).toEqual({
        type: "target-parse",
        message: "Unknown target: esp8266",
        code: "UNKNOWN_TARGET",
      });
    });
  });

  describe("VersionParseError", () => {
    it("has correct type and code", () => {
      const error = new VersionParseError("Unknown LLVM version: 12", "UNKNOWN_LLVM_VERSION", "12");
      expect(error.type).toBe("version-parse");
      expect(error.code).toBe("UNKNOWN_LLVM_VERSION");
    });
  });

  describe("FetchError", () => {
    it("keeps the underlying cause", () => {
      const cause = new Error("ECONNRESET");
      const error = new FetchError("Download failed", "NETWORK_ERROR", cause);

      expect(error.errorCode).toBe("NETWORK_ERROR");
      expect(error.cause).toBe(cause);
      expect(error).toBeInstanceOf(FetchError);
    });
  });

  describe("ArchiveError", () => {
    it("serializes with code", () => {
      expect(new ArchiveError("bad zip", "INVALID_ARCHIVE").toJSON()).toEqual({
        type: "archive",
        message: "bad zip",
        code: "INVALID_ARCHIVE",
      });
    });

    it("exposes the cause through Error.cause", () => {
      const cause = new Error("unexpected end of file");
      const error: Error = new ArchiveError("bad tar", "INVALID_ARCHIVE", cause);

      expect(error.cause).toBe(cause);
    });
  });

  describe("InstallError", () => {
    it("has correct type", () => {
      const error = new InstallError("Could not remove docs", "MINIFY_FAILED");
      expect(error.type).toBe("install");
      expect(error.errorCode).toBe("MINIFY_FAILED");
    });
  });

  describe("FileSystemError", () => {
    it("serializes path and filesystem code", () => {
      const error = new FileSystemError("ENOENT", "/tools/dist", "not found");

      expect(error.toJSON()).toEqual({
        type: "filesystem",
        message: "not found",
        path: "/tools/dist",
        code: "ENOENT",
      });
    });

    it("exposes the cause through Error.cause", () => {
      const cause = new Error("EMFILE: too many open files");
      const error: Error = new FileSystemError("UNKNOWN", "/tools/dist", "open failed", cause, "EMFILE");

      expect(error.cause).toBe(cause);
    });
  });
});

describe("isServiceError", () => {
  it("accepts service errors", () => {
    expect(isServiceError(new ConfigError("bad"))).toBe(true);
  });

  it("rejects plain errors and values", () => {
    expect(isServiceError(new Error("plain"))).toBe(false);
    expect(isServiceError("string")).toBe(false);
  });
});

describe("getErrorMessage", () => {
  it("extracts message from Error", () => {
    expect(getErrorMessage(new Error("boom"))).toBe("boom");
  });

  it("stringifies other values", () => {
    expect(getErrorMessage(42)).toBe("42");
  });
});
