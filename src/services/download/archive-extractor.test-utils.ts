/**
 * Test utilities for ArchiveExtractor.
 */

import { vi, type Mock } from "vitest";
import type { ArchiveExtractor } from "./archive-extractor";
import { ArchiveError, type ArchiveErrorCode } from "../errors";

/**
 * Options for creating a mock archive extractor.
 */
export interface MockArchiveExtractorOptions {
  /**
   * If provided, the extract method will reject with this error.
   */
  error?: {
    message: string;
    code: ArchiveErrorCode;
  };
}

/**
 * Mock ArchiveExtractor type with spy on extract.
 */
export interface MockArchiveExtractor extends ArchiveExtractor {
  extract: Mock<ArchiveExtractor["extract"]>;
}

/**
 * Create a mock ArchiveExtractor with controllable behavior.
 * The mock drains the source stream so that progress callbacks fire as they
 * would for a real extraction.
 */
export function createMockArchiveExtractor(
  options: MockArchiveExtractorOptions = {}
): MockArchiveExtractor {
  return {
    extract: vi.fn<ArchiveExtractor["extract"]>(async (_kind, source) => {
      const reader = source.getReader();
      for (;;) {
        const { done } = await reader.read();
        if (done) break;
      }
      if (options.error) {
        throw new ArchiveError(options.error.message, options.error.code);
      }
    }),
  };
}
