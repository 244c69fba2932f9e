/**
 * Shared test utilities for service tests.
 */

import { mkdtemp, mkdir, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { simpleGit } from "simple-git";

/**
 * Create a temporary directory for a test.
 * The returned path is canonical so that path comparisons hold on every OS.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "esp-installer-test-"));
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, { recursive: true, force: true, maxRetries: 5, retryDelay: 200 });
    },
  };
}

/**
 * Run a function with a temporary directory that is removed afterwards.
 */
export async function withTempDir(fn: (dirPath: string) => Promise<void>): Promise<void> {
  const { path, cleanup } = await createTempDir();
  try {
    await fn(path);
  } finally {
    await cleanup();
  }
}

/**
 * Write a tree of files below `root`. Keys are relative paths using `/`.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, ...relativePath.split("/"));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, "utf-8");
  }
}

/**
 * A `tools/cmake/version.cmake` file as shipped by ESP-IDF.
 */
export function versionCmake(major: number, minor: number, patch: number): string {
  return [
    `set(IDF_VERSION_MAJOR ${major})`,
    `set(IDF_VERSION_MINOR ${minor})`,
    `set(IDF_VERSION_PATCH ${patch})`,
    "",
    'set(ENV{IDF_VERSION} "${IDF_VERSION_MAJOR}.${IDF_VERSION_MINOR}.${IDF_VERSION_PATCH}")',
    "",
  ].join("\n");
}

/**
 * Create a local git repository that looks like a minimal ESP-IDF checkout,
 * with a `main` branch and a `v5.0` tag.
 */
export async function createTestSdkRepo(): Promise<{ path: string; cleanup: () => Promise<void> }> {
  const { path, cleanup } = await createTempDir();
  const git = simpleGit(path);

  await git.init(["--initial-branch=main"]);
  await git.addConfig("user.email", "test@test.com");
  await git.addConfig("user.name", "Test User");

  await writeTree(path, {
    "README.md": "# Test SDK\n",
    "tools/cmake/version.cmake": versionCmake(5, 0, 1),
    "tools/idf_tools.py": "# placeholder\n",
  });
  await git.add(".");
  await git.commit("Initial commit");
  await git.addTag("v5.0");

  return { path, cleanup };
}

/**
 * Whether a git binary is available for boundary tests.
 */
export async function isGitAvailable(): Promise<boolean> {
  const version = await simpleGit().version();
  return version.installed;
}
