/**
 * SimpleGitClient implementation using the simple-git library.
 */

import simpleGit, { CheckRepoActions, type SimpleGit, type SimpleGitOptions } from "simple-git";
import { GitError } from "../errors";
import { formatRef, type RemoteRef } from "../esp-idf/git-ref";
import type { Logger } from "../logging";
import type { IGitClient } from "./git-client";

/**
 * Implementation of IGitClient using the simple-git library.
 * Wraps simple-git calls and maps errors to GitError.
 */
export class SimpleGitClient implements IGitClient {
  constructor(private readonly logger: Logger) {}

  /**
   * Create a simple-git instance for a given path.
   */
  private getGit(basePath?: string): SimpleGit {
    const options: Partial<SimpleGitOptions> = {
      binary: "git",
      maxConcurrentProcesses: 6,
      trimmed: true,
      ...(basePath !== undefined && { baseDir: basePath }),
    };
    return simpleGit(options);
  }

  /**
   * Wrap a simple-git operation and convert errors to GitError.
   */
  private async wrapGitOperation<T>(operation: () => Promise<T>, errorMessage: string): Promise<T> {
    try {
      return await operation();
    } catch (error: unknown) {
      const message = error instanceof Error ? `${errorMessage}: ${error.message}` : errorMessage;
      this.logger.warn("Git operation failed", { error: message });
      throw new GitError(message);
    }
  }

  async isRepositoryRoot(path: string): Promise<boolean> {
    return this.wrapGitOperation(async () => {
      const git = this.getGit(path);
      return git.checkIsRepo(CheckRepoActions.IS_REPO_ROOT);
    }, "Failed to check repository");
  }

  async clone(url: string, targetDir: string, ref: RemoteRef): Promise<void> {
    this.logger.info("Cloning", { url, ref: formatRef(ref), targetDir });
    return this.wrapGitOperation(async () => {
      if (ref.kind !== "commit") {
        await this.getGit().clone(url, targetDir, [
          "--depth",
          "1",
          "--branch",
          ref.name,
          "--recurse-submodules",
          "--shallow-submodules",
        ]);
        return;
      }

      await this.getGit().clone(url, targetDir, ["--no-checkout"]);
      const git = this.getGit(targetDir);
      await git.checkout(ref.hash);
      await git.submoduleUpdate(["--init", "--recursive", "--depth", "1"]);
    }, `Failed to clone ${url} at ${formatRef(ref)}`);
  }
}
