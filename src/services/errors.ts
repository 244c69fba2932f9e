/**
 * Service error definitions with JSON serialization for CLI reporting.
 */

import type { FileSystemErrorCode } from "./platform/filesystem";

/**
 * Error codes for target list parsing.
 */
export type TargetParseErrorCode = "UNKNOWN_TARGET" | "EMPTY_TARGETS";

/**
 * Error codes for version and reference parsing.
 */
export type VersionParseErrorCode =
  | "UNKNOWN_LLVM_VERSION"
  | "INVALID_RUST_VERSION"
  | "INVALID_GIT_REF";

/**
 * Error codes for fetch/cache operations.
 */
export type FetchErrorCode = "DIRECTORY_CREATE" | "NETWORK_ERROR" | "UNSUPPORTED_EXTENSION";

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode = "INVALID_ARCHIVE" | "EXTRACTION_FAILED" | "PERMISSION_DENIED";

/**
 * Error codes for SDK and toolchain installation.
 */
export type InstallErrorCode = "INSTALLER_FAILED" | "MINIFY_FAILED" | "UNSUPPORTED_HOST";

/**
 * Serialized error format.
 */
export interface SerializedError {
  readonly type:
    | "target-parse"
    | "version-parse"
    | "fetch"
    | "archive"
    | "filesystem"
    | "git"
    | "install"
    | "config";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error for structured output.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * A target token could not be mapped to a supported chip.
 */
export class TargetParseError extends ServiceError {
  readonly type = "target-parse" as const;

  constructor(
    message: string,
    readonly errorCode: TargetParseErrorCode,
    /** Offending token, empty for EMPTY_TARGETS */
    readonly token: string
  ) {
    super(message, errorCode);
    this.name = "TargetParseError";
  }
}

/**
 * A version string (LLVM release, ESP-IDF reference) could not be interpreted.
 */
export class VersionParseError extends ServiceError {
  readonly type = "version-parse" as const;

  constructor(
    message: string,
    readonly errorCode: VersionParseErrorCode,
    readonly token: string
  ) {
    super(message, errorCode);
    this.name = "VersionParseError";
  }
}

/**
 * Error from the fetch/cache engine.
 */
export class FetchError extends ServiceError {
  readonly type = "fetch" as const;

  constructor(
    message: string,
    readonly errorCode: FetchErrorCode,
    override readonly cause?: Error
  ) {
    super(message, errorCode);
    this.name = "FetchError";
  }
}

/**
 * Error from archive extraction operations (zip, tar.gz, tar.xz).
 */
export class ArchiveError extends ServiceError {
  readonly type = "archive" as const;

  constructor(
    message: string,
    readonly errorCode?: ArchiveErrorCode,
    override readonly cause?: Error
  ) {
    super(message, errorCode);
    this.name = "ArchiveError";
  }
}

/**
 * Error from git operations.
 */
export class GitError extends ServiceError {
  readonly type = "git" as const;
}

/**
 * Error from SDK/toolchain installation or post-install pruning.
 */
export class InstallError extends ServiceError {
  readonly type = "install" as const;

  constructor(
    message: string,
    readonly errorCode: InstallErrorCode
  ) {
    super(message, errorCode);
    this.name = "InstallError";
  }
}

/**
 * Invalid environment configuration.
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    override readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

export { getErrorMessage } from "../shared/error-utils";
