/**
 * Types for the download cache.
 */

import { extname } from "node:path";
import { FetchError } from "../errors";

/**
 * How a downloaded file is laid down on disk.
 * `raw` files are written as-is; the other kinds are unpacked into the output directory.
 */
export type ArchiveKind = "raw" | "zip" | "tar.gz" | "tar.xz";

/**
 * Archive kinds that are unpacked rather than written verbatim.
 */
export type CompressedArchiveKind = Exclude<ArchiveKind, "raw">;

const ARCHIVE_EXTENSIONS: ReadonlyMap<string, CompressedArchiveKind> = new Map<
  string,
  CompressedArchiveKind
>([
  ["zip", "zip"],
  ["gz", "tar.gz"],
  ["tgz", "tar.gz"],
  ["xz", "tar.xz"],
]);

/**
 * Resolve the archive kind from the last extension of a file name.
 *
 * @throws FetchError with code UNSUPPORTED_EXTENSION for anything but zip, gz, tgz and xz
 *
 * @example
 * archiveKindFromFileName("cmake-3.20.3-linux-x86_64.tar.gz"); // "tar.gz"
 */
export function archiveKindFromFileName(fileName: string): CompressedArchiveKind {
  const extension = extname(fileName).slice(1).toLowerCase();
  const kind = ARCHIVE_EXTENSIONS.get(extension);
  if (kind === undefined) {
    throw new FetchError(`Unsupported file extension: '${extension}'`, "UNSUPPORTED_EXTENSION");
  }
  return kind;
}

/**
 * Progress information for downloads.
 */
export interface DownloadProgress {
  /** Number of bytes downloaded so far */
  readonly bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  readonly totalBytes: number | null;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;
