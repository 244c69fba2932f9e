/**
 * Test utilities for IGitClient.
 */

import { vi, type Mock } from "vitest";
import type { IGitClient } from "./git-client";

export interface MockGitClient extends IGitClient {
  isRepositoryRoot: Mock<IGitClient["isRepositoryRoot"]>;
  clone: Mock<IGitClient["clone"]>;
}

/**
 * Create a git client where nothing is cloned yet and every clone succeeds.
 */
export function createMockGitClient(overrides?: Partial<MockGitClient>): MockGitClient {
  return {
    isRepositoryRoot:
      overrides?.isRepositoryRoot ?? vi.fn<IGitClient["isRepositoryRoot"]>(async () => false),
    clone: overrides?.clone ?? vi.fn<IGitClient["clone"]>(async () => {}),
  };
}
