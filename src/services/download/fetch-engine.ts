/**
 * Download cache for release archives.
 *
 * A download is cached when `<outputDir>/<fileName>` exists; nothing else is
 * checked. Archives are either unpacked straight into the output directory or
 * kept raw under `<toolsRoot>/dist` and unpacked from there with `unpack`.
 */

import { basename, join } from "node:path";
import { Readable } from "node:stream";
import type { ReadableStream } from "node:stream/web";
import { FetchError, FileSystemError } from "../errors";
import { getErrorMessage } from "../../shared/error-utils";
import type { HttpClient } from "../platform/network";
import type { FileSystemLayer } from "../platform/filesystem";
import type { PathProvider } from "../platform/path-provider";
import type { Logger } from "../logging";
import type { ArchiveExtractor } from "./archive-extractor";
import { archiveKindFromFileName, type ArchiveKind, type DownloadProgressCallback } from "./types";
import { monitorBody, parseContentLength, readChunks } from "./streams";

/** Release archives are large; allow a slow CDN to start responding. */
const DOWNLOAD_TIMEOUT_MS = 300_000;

/**
 * Fetches files into the tools tree, skipping anything already present.
 */
export interface FetchEngine {
  /**
   * Download `url` into `outputDir`.
   *
   * With `uncompress`, the archive kind is taken from the last extension of
   * `fileName` and the contents are unpacked into `outputDir`; otherwise the
   * bytes are written to `<outputDir>/<fileName>`.
   *
   * @returns `<outputDir>/<fileName>`, also when the file was unpacked and so
   *   never written under that name
   * @throws FetchError UNSUPPORTED_EXTENSION before any network or filesystem effect
   * @throws FetchError DIRECTORY_CREATE when `outputDir` cannot be created
   * @throws FetchError NETWORK_ERROR on transport failure or a non-2xx status
   * @throws ArchiveError when the archive cannot be decoded
   *
   * @example
   * const outputDir = join(pathProvider.toolPath(artifact.toolName), artifact.release);
   * await engine.fetch(artifact.url, artifact.fileName, outputDir, true);
   */
  fetch(
    url: string,
    fileName: string,
    outputDir: string,
    uncompress: boolean,
    onProgress?: DownloadProgressCallback
  ): Promise<string>;

  /**
   * Unpack an archive already on disk, typically one fetched raw into the
   * download cache. The kind is taken from the last extension of the path.
   *
   * @throws FetchError UNSUPPORTED_EXTENSION before any filesystem effect
   * @throws FetchError DIRECTORY_CREATE when `outputDir` cannot be created
   * @throws ArchiveError when the archive cannot be decoded
   *
   * @example
   * const archive = await engine.fetch(url, fileName, pathProvider.distDir, false);
   * await engine.unpack(archive, outputDir);
   */
  unpack(archivePath: string, outputDir: string): Promise<void>;

  /**
   * Remove the download cache directory (`<toolsRoot>/dist`).
   */
  clearCache(): Promise<void>;
}

/**
 * Dependencies of DefaultFetchEngine.
 */
export interface FetchEngineDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
  readonly extractor: ArchiveExtractor;
  readonly pathProvider: Pick<PathProvider, "distDir">;
  readonly logger: Logger;
}

export class DefaultFetchEngine implements FetchEngine {
  constructor(private readonly deps: FetchEngineDeps) {}

  async fetch(
    url: string,
    fileName: string,
    outputDir: string,
    uncompress: boolean,
    onProgress?: DownloadProgressCallback
  ): Promise<string> {
    const { fileSystem, logger } = this.deps;
    const fullPath = join(outputDir, fileName);

    if (await fileSystem.pathExists(fullPath)) {
      logger.debug("Cache hit", { path: fullPath });
      return fullPath;
    }

    const kind: ArchiveKind = uncompress ? archiveKindFromFileName(fileName) : "raw";
    await this.createOutputDir(outputDir);

    logger.info("Downloading", { url, kind, outputDir });
    const { body: responseBody, totalBytes } = await this.request(url);
    const body = monitorBody(url, responseBody, totalBytes, onProgress);

    if (kind === "raw") {
      await this.writeRaw(url, body, fullPath);
    } else {
      await this.deps.extractor.extract(kind, body, outputDir);
    }

    logger.info("Download complete", { url, path: fullPath });
    return fullPath;
  }

  async unpack(archivePath: string, outputDir: string): Promise<void> {
    const kind = archiveKindFromFileName(basename(archivePath));
    await this.createOutputDir(outputDir);
    this.deps.logger.info("Unpacking", { path: archivePath, kind, outputDir });
    await this.deps.extractor.extract(kind, this.deps.fileSystem.readStream(archivePath), outputDir);
  }

  async clearCache(): Promise<void> {
    const { distDir } = this.deps.pathProvider;
    this.deps.logger.info("Clearing download cache", { path: distDir });
    await this.deps.fileSystem.rm(distDir, { recursive: true, force: true });
  }

  private async createOutputDir(outputDir: string): Promise<void> {
    try {
      await this.deps.fileSystem.mkdir(outputDir);
    } catch (error) {
      throw new FetchError(
        `Failed to create directory ${outputDir}: ${getErrorMessage(error)}`,
        "DIRECTORY_CREATE",
        error instanceof Error ? error : undefined
      );
    }
  }

  private async request(
    url: string
  ): Promise<{ body: ReadableStream<Uint8Array>; totalBytes: number | null }> {
    let response: Response;
    try {
      response = await this.deps.httpClient.fetch(url, { timeout: DOWNLOAD_TIMEOUT_MS });
    } catch (error) {
      throw new FetchError(
        `Network error downloading from ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR",
        error instanceof Error ? error : undefined
      );
    }

    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status} downloading from ${url}`, "NETWORK_ERROR");
    }
    const { body } = response;
    if (body === null) {
      throw new FetchError(`Empty response body from ${url}`, "NETWORK_ERROR");
    }
    return { body, totalBytes: parseContentLength(response.headers.get("content-length")) };
  }

  private async writeRaw(
    url: string,
    body: ReadableStream<Uint8Array>,
    fullPath: string
  ): Promise<void> {
    try {
      await this.deps.fileSystem.writeStream(fullPath, Readable.from(readChunks(body)));
    } catch (error) {
      if (error instanceof FileSystemError || error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(
        `Failed to download ${url}: ${getErrorMessage(error)}`,
        "NETWORK_ERROR",
        error instanceof Error ? error : undefined
      );
    }
  }
}
