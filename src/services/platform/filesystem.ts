/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against real filesystem
 * - Consistent error handling via FileSystemError
 */

import { createReadStream, createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import { pipeline } from "node:stream/promises";
import { FileSystemError } from "../errors";
import type { Logger } from "../logging";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  readonly isDirectory: boolean;
  readonly isFile: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 */
export interface FileSystemLayer {
  /**
   * Check whether a file, directory or symlink exists at the path.
   * This is the whole validity check of the download cache.
   *
   * @returns true if the path exists
   */
  pathExists(path: string): Promise<boolean>;

  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFile(path: string): Promise<string>;

  /**
   * Write content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Stream bytes from a readable into a file. Overwrites existing file.
   * Errors raised by the source propagate unchanged; only errors of the
   * file itself are mapped to FileSystemError.
   *
   * @example
   * await fs.writeStream('/tools/dist/tool.bin', Readable.fromWeb(response.body));
   */
  writeStream(path: string, source: Readable): Promise<void>;

  /**
   * Open a file for streaming. The file is opened lazily, so a missing file
   * fails the first read rather than this call.
   *
   * @example
   * await extractor.extract("tar.xz", fs.readStream('/tools/dist/rust-src-1.62.1.0.tar.xz'), dir);
   */
  readStream(path: string): ReadableStream<Uint8Array>;

  /**
   * Create directory and its parents. No-op if it already exists.
   *
   * @throws FileSystemError with code EEXIST or ENOTDIR if a path component is a file
   * @throws FileSystemError with code EACCES if permission denied
   */
  mkdir(path: string): Promise<void>;

  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Remove a file or directory.
   *
   * @example Remove an installed SDK subtree
   * await fs.rm('/tools/esp-idf-291de8283bb0766a/v5.0/docs', { recursive: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;
}

// ============================================================================
// Helper Functions
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is FileSystemErrorCode {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * fs.rm() reports `ERR_FS_*` codes with the POSIX code under `info.code`.
 */
function extractErrorCode(error: Error): string | undefined {
  if ("info" in error && typeof error.info === "object" && error.info !== null) {
    const info: object = error.info;
    if ("code" in info && typeof info.code === "string") {
      return info.code;
    }
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (error instanceof FileSystemError) {
    return error;
  }
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);
  if (code !== undefined && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async pathExists(path: string): Promise<boolean> {
    try {
      await fs.lstat(path);
      return true;
    } catch (error) {
      const fsError = mapError(error, path);
      if (fsError.fsCode === "ENOENT") {
        return false;
      }
      throw this.failed("Stat", fsError);
    }
  }

  async readFile(path: string): Promise<string> {
    this.logger.debug("Read", { path });
    try {
      return await fs.readFile(path, "utf-8");
    } catch (error) {
      throw this.failed("Read", mapError(error, path));
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.logger.debug("Write", { path });
    try {
      await fs.writeFile(path, content, "utf-8");
    } catch (error) {
      throw this.failed("Write", mapError(error, path));
    }
  }

  async writeStream(path: string, source: Readable): Promise<void> {
    this.logger.debug("Write stream", { path });
    const sink = createWriteStream(path);
    // pipeline destroys both ends with the first error, so remember which end raised it
    let firstFailure: "source" | "sink" | null = null;
    source.once("error", () => {
      firstFailure ??= "source";
    });
    sink.once("error", () => {
      firstFailure ??= "sink";
    });
    try {
      await pipeline(source, sink);
    } catch (error) {
      if (firstFailure === "sink") {
        throw this.failed("Write stream", mapError(error, path));
      }
      throw error;
    }
  }

  readStream(path: string): ReadableStream<Uint8Array> {
    this.logger.debug("Read stream", { path });
    return Readable.toWeb(createReadStream(path));
  }

  async mkdir(path: string): Promise<void> {
    this.logger.debug("Mkdir", { path });
    try {
      await fs.mkdir(path, { recursive: true });
    } catch (error) {
      throw this.failed("Mkdir", mapError(error, path));
    }
  }

  async readdir(path: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(path, { withFileTypes: true });
      this.logger.debug("Readdir", { path, count: entries.length });
      return entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
      }));
    } catch (error) {
      throw this.failed("Readdir", mapError(error, path));
    }
  }

  async rm(path: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path, recursive });
    try {
      await fs.rm(path, { recursive, force });
    } catch (error) {
      throw this.failed("Rm", mapError(error, path));
    }
  }

  private failed(operation: string, fsError: FileSystemError): FileSystemError {
    this.logger.warn(`${operation} failed`, {
      path: fsError.path,
      code: fsError.fsCode,
      error: fsError.message,
    });
    return fsError;
  }
}
