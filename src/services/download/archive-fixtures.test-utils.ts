/**
 * Builders for small archives used by extraction tests.
 */

import archiver from "archiver";
import * as tar from "tar";
import { spawnSync } from "node:child_process";
import { chmod, readFile } from "node:fs/promises";
import { join } from "node:path";
import { ReadableStream } from "node:stream/web";
import { withTempDir, writeTree } from "../test-utils";

/**
 * One file inside a fixture archive.
 */
export interface FixtureFile {
  readonly content: string;
  /** Unix permission bits, e.g. 0o755 */
  readonly mode?: number;
}

export type FixtureTree = Record<string, FixtureFile>;

/**
 * Build a zip archive in memory.
 */
export async function createZipBytes(files: FixtureTree): Promise<Buffer> {
  const archive = archiver("zip");
  const chunks: Buffer[] = [];
  archive.on("data", (chunk: Buffer) => chunks.push(chunk));
  const ended = new Promise<void>((resolve, reject) => {
    archive.on("end", () => resolve());
    archive.on("error", reject);
  });

  for (const [name, file] of Object.entries(files)) {
    archive.append(file.content, file.mode === undefined ? { name } : { name, mode: file.mode });
  }
  await archive.finalize();
  await ended;
  return Buffer.concat(chunks);
}

async function createTarBytes(files: FixtureTree, gzip: boolean): Promise<Buffer> {
  let bytes: Buffer = Buffer.alloc(0);
  await withTempDir(async (dir) => {
    const sourceDir = join(dir, "source");
    const contents: Record<string, string> = {};
    for (const [name, file] of Object.entries(files)) {
      contents[name] = file.content;
    }
    await writeTree(sourceDir, contents);
    for (const [name, file] of Object.entries(files)) {
      if (file.mode !== undefined) {
        await chmod(join(sourceDir, ...name.split("/")), file.mode);
      }
    }

    const archivePath = join(dir, "fixture.tar");
    await tar.c({ gzip, cwd: sourceDir, file: archivePath, portable: true }, Object.keys(files));
    bytes = await readFile(archivePath);
  });
  return bytes;
}

/**
 * Build a gzip-compressed tarball in memory.
 */
export function createTarGzBytes(files: FixtureTree): Promise<Buffer> {
  return createTarBytes(files, true);
}

/**
 * Whether the `xz` command is available to build `.tar.xz` fixtures.
 */
export function isXzAvailable(): boolean {
  return spawnSync("xz", ["--version"]).status === 0;
}

/**
 * Build an xz-compressed tarball in memory. Requires the `xz` command.
 */
export async function createTarXzBytes(files: FixtureTree): Promise<Buffer> {
  const tarBytes = await createTarBytes(files, false);
  const result = spawnSync("xz", ["--compress", "--stdout"], { input: tarBytes });
  if (result.status !== 0) {
    throw new Error(`xz failed: ${result.stderr.toString()}`);
  }
  return result.stdout;
}

/**
 * Web stream over the given bytes, delivered in small chunks.
 */
export function streamOf(bytes: Uint8Array, chunkSize = 512): ReadableStream<Uint8Array> {
  let offset = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      if (offset >= bytes.length) {
        controller.close();
        return;
      }
      controller.enqueue(bytes.slice(offset, offset + chunkSize));
      offset += chunkSize;
    },
  });
}

/**
 * Web stream that fails on the first read.
 */
export function failingStream(error: Error): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.error(error);
    },
  });
}
