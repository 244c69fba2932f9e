/**
 * Test utilities for FileSystemLayer mocking.
 */

import { ReadableStream } from "node:stream/web";
import { vi, type Mock } from "vitest";
import type { FileSystemLayer } from "./filesystem";

/**
 * FileSystemLayer whose methods are vitest mocks.
 */
export interface MockFileSystemLayer extends FileSystemLayer {
  pathExists: Mock<FileSystemLayer["pathExists"]>;
  readFile: Mock<FileSystemLayer["readFile"]>;
  writeFile: Mock<FileSystemLayer["writeFile"]>;
  writeStream: Mock<FileSystemLayer["writeStream"]>;
  readStream: Mock<FileSystemLayer["readStream"]>;
  mkdir: Mock<FileSystemLayer["mkdir"]>;
  readdir: Mock<FileSystemLayer["readdir"]>;
  rm: Mock<FileSystemLayer["rm"]>;
}

/**
 * Create a mock FileSystemLayer.
 * By default nothing exists, reads fail with ENOENT-like errors, streams are
 * empty, and writes succeed.
 *
 * @example
 * const fs = createMockFileSystemLayer({
 *   pathExists: vi.fn().mockResolvedValue(true),
 * });
 */
export function createMockFileSystemLayer(
  overrides?: Partial<MockFileSystemLayer>
): MockFileSystemLayer {
  return {
    pathExists: overrides?.pathExists ?? vi.fn<FileSystemLayer["pathExists"]>(async () => false),
    readFile:
      overrides?.readFile ??
      vi.fn<FileSystemLayer["readFile"]>(async (path: string) => {
        throw new Error(`ENOENT: ${path}`);
      }),
    writeFile: overrides?.writeFile ?? vi.fn<FileSystemLayer["writeFile"]>(async () => {}),
    writeStream: overrides?.writeStream ?? vi.fn<FileSystemLayer["writeStream"]>(async () => {}),
    readStream:
      overrides?.readStream ??
      vi.fn<FileSystemLayer["readStream"]>(
        () =>
          new ReadableStream<Uint8Array>({
            start(controller) {
              controller.close();
            },
          })
      ),
    mkdir: overrides?.mkdir ?? vi.fn<FileSystemLayer["mkdir"]>(async () => {}),
    readdir: overrides?.readdir ?? vi.fn<FileSystemLayer["readdir"]>(async () => []),
    rm: overrides?.rm ?? vi.fn<FileSystemLayer["rm"]>(async () => {}),
  };
}
