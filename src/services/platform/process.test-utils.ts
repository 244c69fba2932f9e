/**
 * Test utilities for ProcessRunner mocking.
 */

import { vi, type Mock } from "vitest";
import type { ProcessResult, ProcessRunner } from "./process";

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  run: Mock<ProcessRunner["run"]>;
}

/**
 * Create a mock ProcessRunner whose commands all finish with the given result.
 *
 * @example Simulate a failing installer
 * const runner = createMockProcessRunner({ exitCode: 2, stderr: "ERROR: tool not found" });
 */
export function createMockProcessRunner(result?: Partial<ProcessResult>): MockProcessRunner {
  const finalResult: ProcessResult = {
    stdout: "",
    stderr: "",
    exitCode: 0,
    ...result,
  };
  return {
    run: vi.fn<ProcessRunner["run"]>(async () => finalResult),
  };
}
