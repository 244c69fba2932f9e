/**
 * Download cache: fetch, unpack and clear.
 */

export type { ArchiveKind, CompressedArchiveKind, DownloadProgress, DownloadProgressCallback } from "./types";
export { archiveKindFromFileName } from "./types";
export type { ArchiveExtractor } from "./archive-extractor";
export { DefaultArchiveExtractor } from "./archive-extractor";
export type { FetchEngine, FetchEngineDeps } from "./fetch-engine";
export { DefaultFetchEngine } from "./fetch-engine";
