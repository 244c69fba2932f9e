/**
 * Test utilities for FetchEngine.
 */

import { join } from "node:path";
import { vi, type Mock } from "vitest";
import type { FetchEngine } from "./fetch-engine";

export interface MockFetchEngine extends FetchEngine {
  fetch: Mock<FetchEngine["fetch"]>;
  unpack: Mock<FetchEngine["unpack"]>;
  clearCache: Mock<FetchEngine["clearCache"]>;
}

/**
 * Create a FetchEngine that resolves every request to `<outputDir>/<fileName>`
 * and unpacks nothing, without touching the network or disk.
 */
export function createMockFetchEngine(overrides?: Partial<MockFetchEngine>): MockFetchEngine {
  return {
    fetch:
      overrides?.fetch ??
      vi.fn<FetchEngine["fetch"]>(async (_url, fileName, outputDir) => join(outputDir, fileName)),
    unpack: overrides?.unpack ?? vi.fn<FetchEngine["unpack"]>(async () => {}),
    clearCache: overrides?.clearCache ?? vi.fn<FetchEngine["clearCache"]>(async () => {}),
  };
}
