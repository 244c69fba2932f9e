/**
 * Archive extraction interface and implementation.
 *
 * Tar archives are unpacked while the body is still downloading; zip needs
 * random access to its central directory and goes through a temp file.
 */

import * as tar from "tar";
import yauzl from "yauzl";
import { XzReadableStream } from "xz-decompress";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { randomUUID } from "node:crypto";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import type { ReadableStream } from "node:stream/web";
import { createGunzip } from "node:zlib";
import { ArchiveError, FetchError } from "../errors";
import { getErrorMessage, isErrnoException } from "../../shared/error-utils";
import type { Logger } from "../logging";
import type { CompressedArchiveKind } from "./types";
import { readChunks } from "./streams";

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Unpack an archive stream into a destination directory.
   *
   * @param kind - Archive format
   * @param source - Archive bytes, typically a response body
   * @param destDir - Directory to extract to (must exist)
   * @throws ArchiveError on extraction failure
   * @throws FetchError when the source stream fails
   */
  extract(
    kind: CompressedArchiveKind,
    source: ReadableStream<Uint8Array>,
    destDir: string
  ): Promise<void>;
}

/**
 * Default ArchiveExtractor using `tar`, `yauzl` and `xz-decompress`.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  constructor(private readonly logger: Logger) {}

  async extract(
    kind: CompressedArchiveKind,
    source: ReadableStream<Uint8Array>,
    destDir: string
  ): Promise<void> {
    this.logger.debug("Extracting", { kind, destDir });
    try {
      if (kind === "zip") {
        await this.extractZip(source, destDir);
      } else {
        await unpackTar(decodeTar(kind, source), destDir);
      }
    } catch (error) {
      throw toArchiveError(error, destDir);
    }
    this.logger.debug("Extracted", { kind, destDir });
  }

  private async extractZip(source: ReadableStream<Uint8Array>, destDir: string): Promise<void> {
    const tempFile = path.join(os.tmpdir(), `esp-installer-${randomUUID()}.zip`);
    try {
      await pipeline(Readable.from(readChunks(source)), fs.createWriteStream(tempFile));
      await extractZipFile(tempFile, destDir);
    } finally {
      await fs.promises.rm(tempFile, { force: true }).catch((error: unknown) => {
        this.logger.warn("Failed to remove temp file", {
          path: tempFile,
          error: getErrorMessage(error),
        });
      });
    }
  }
}

/**
 * Decompress a tar stream into a Node stream of tar bytes.
 */
function decodeTar(
  kind: Exclude<CompressedArchiveKind, "zip">,
  source: ReadableStream<Uint8Array>
): Readable {
  if (kind === "tar.xz") {
    return Readable.from(readChunks(new XzReadableStream(source)));
  }
  const input = Readable.from(readChunks(source));
  const gunzip = createGunzip();
  input.once("error", (error: Error) => gunzip.destroy(error));
  return input.pipe(gunzip);
}

/**
 * Feed a decoded tar stream into `tar.x`, honouring backpressure.
 */
function unpackTar(decoded: Readable, destDir: string): Promise<void> {
  const unpacker = tar.x({ cwd: destDir, strict: true });

  return new Promise<void>((resolve, reject) => {
    let settled = false;
    const fail = (error: unknown): void => {
      if (settled) return;
      settled = true;
      decoded.destroy();
      reject(error);
    };
    const done = (): void => {
      if (settled) return;
      settled = true;
      resolve();
    };

    unpacker.on("error", fail);
    unpacker.on("finish", done);
    unpacker.on("close", done);
    unpacker.on("drain", () => decoded.resume());

    decoded.on("error", fail);
    decoded.on("data", (chunk: Buffer) => {
      if (!unpacker.write(chunk)) {
        decoded.pause();
      }
    });
    decoded.on("end", () => unpacker.end());
  });
}

function openZip(archivePath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (err, zipfile) => {
      if (err) {
        reject(
          new ArchiveError(
            `Invalid or corrupt zip archive at ${archivePath}: ${err.message}`,
            "INVALID_ARCHIVE",
            err
          )
        );
        return;
      }
      resolve(zipfile);
    });
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, readStream) => {
      if (err) {
        reject(
          new ArchiveError(
            `Failed to read entry ${entry.fileName}: ${err.message}`,
            "EXTRACTION_FAILED",
            err
          )
        );
        return;
      }
      resolve(readStream);
    });
  });
}

/**
 * Extract every entry of a zip file, preserving Unix permissions.
 */
async function extractZipFile(archivePath: string, destDir: string): Promise<void> {
  const zipfile = await openZip(archivePath);
  const root = path.resolve(destDir);

  const writeEntry = async (entry: yauzl.Entry): Promise<void> => {
    const entryPath = path.resolve(root, entry.fileName);
    if (entryPath !== root && !entryPath.startsWith(root + path.sep)) {
      throw new ArchiveError(
        `Path traversal detected in archive: ${entry.fileName}`,
        "INVALID_ARCHIVE"
      );
    }

    if (entry.fileName.endsWith("/")) {
      await fs.promises.mkdir(entryPath, { recursive: true });
      return;
    }

    await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
    const readStream = await openEntryStream(zipfile, entry);
    await pipeline(readStream, fs.createWriteStream(entryPath));
    // Unix mode lives in the upper 16 bits
    const mode = (entry.externalFileAttributes >>> 16) & 0o777;
    if (mode !== 0) {
      await fs.promises.chmod(entryPath, mode);
    }
  };

  await new Promise<void>((resolve, reject) => {
    zipfile.on("entry", (entry: yauzl.Entry) => {
      writeEntry(entry)
        .then(() => zipfile.readEntry())
        .catch((error: unknown) => {
          zipfile.close();
          reject(error);
        });
    });
    zipfile.on("end", () => resolve());
    // yauzl closes the file itself before emitting errors
    zipfile.on("error", (err: Error) => {
      reject(new ArchiveError(`Error reading zip archive: ${err.message}`, "INVALID_ARCHIVE", err));
    });
    zipfile.readEntry();
  });
}

function toArchiveError(error: unknown, destDir: string): Error {
  if (error instanceof ArchiveError || error instanceof FetchError) {
    return error;
  }
  const cause = error instanceof Error ? error : undefined;
  if (isErrnoException(error) && (error.code === "EACCES" || error.code === "EPERM")) {
    return new ArchiveError(
      `Permission denied extracting to ${destDir}: ${error.message}`,
      "PERMISSION_DENIED",
      cause
    );
  }
  return new ArchiveError(
    `Invalid or corrupt archive for ${destDir}: ${getErrorMessage(error)}`,
    "INVALID_ARCHIVE",
    cause
  );
}
