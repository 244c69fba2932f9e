// @vitest-environment node
/**
 * Boundary tests for SimpleGitClient.
 * These tests use real git repositories to verify the implementation.
 */

import { describe, it, expect, beforeAll, beforeEach, afterEach } from "vitest";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { simpleGit } from "simple-git";
import { SimpleGitClient } from "./simple-git-client";
import { GitError } from "../errors";
import { createSilentLogger } from "../logging/logging.test-utils";
import { createTempDir, createTestSdkRepo, isGitAvailable } from "../test-utils";

const gitAvailable = await isGitAvailable();

describe.skipIf(!gitAvailable)("SimpleGitClient", () => {
  let client: SimpleGitClient;
  let repo: { path: string; cleanup: () => Promise<void> };
  let target: { path: string; cleanup: () => Promise<void> };

  beforeAll(() => {
    client = new SimpleGitClient(createSilentLogger());
  });

  beforeEach(async () => {
    repo = await createTestSdkRepo();
    target = await createTempDir();
  });

  afterEach(async () => {
    await target.cleanup();
    await repo.cleanup();
  });

  describe("isRepositoryRoot", () => {
    it("returns true for a repository root", async () => {
      expect(await client.isRepositoryRoot(repo.path)).toBe(true);
    });

    it("returns false for a subdirectory of a repository", async () => {
      expect(await client.isRepositoryRoot(join(repo.path, "tools"))).toBe(false);
    });

    it("returns false for a plain directory", async () => {
      expect(await client.isRepositoryRoot(target.path)).toBe(false);
    });

    it("throws GitError for a non-existent path", async () => {
      await expect(client.isRepositoryRoot(join(target.path, "missing"))).rejects.toThrow(
        GitError
      );
    });
  });

  describe("clone", () => {
    it("clones a tag into nested directories", async () => {
      const checkout = join(target.path, "esp-idf-a6d4aaabde14e586", "v5.0");

      await client.clone(repo.path, checkout, { kind: "tag", name: "v5.0" });

      expect(await client.isRepositoryRoot(checkout)).toBe(true);
      expect(await readFile(join(checkout, "README.md"), "utf-8")).toBe("# Test SDK\n");
    });

    it("clones a branch", async () => {
      const checkout = join(target.path, "main");

      await client.clone(repo.path, checkout, { kind: "branch", name: "main" });

      expect(await simpleGit(checkout).revparse(["--abbrev-ref", "HEAD"])).toBe("main");
    });

    it("checks out a commit", async () => {
      const hash = await simpleGit(repo.path).revparse(["HEAD"]);
      const checkout = join(target.path, hash);

      await client.clone(repo.path, checkout, { kind: "commit", hash });

      expect(await simpleGit(checkout).revparse(["HEAD"])).toBe(hash);
      expect(await readFile(join(checkout, "README.md"), "utf-8")).toBe("# Test SDK\n");
    });

    it("throws GitError for an unknown tag", async () => {
      const error = await client
        .clone(repo.path, join(target.path, "v9.9"), { kind: "tag", name: "v9.9" })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GitError);
      expect(error).toMatchObject({
        message: expect.stringContaining(`Failed to clone ${repo.path} at tag v9.9`),
      });
    });
  });
});
