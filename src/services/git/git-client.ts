/**
 * Abstract interface for git operations.
 * This abstraction allows swapping the underlying git implementation
 * (e.g., simple-git, isomorphic-git).
 */

import type { RemoteRef } from "../esp-idf/git-ref";

/**
 * Interface for the git operations the SDK installer needs.
 */
export interface IGitClient {
  /**
   * Check if path is the root of a git repository.
   * Returns true only if the path is exactly the repository root,
   * not a subdirectory within a repository.
   * @param path Absolute path to check
   * @returns Promise resolving to true if path is a git repository root
   * @throws GitError if path doesn't exist or is inaccessible
   */
  isRepositoryRoot(path: string): Promise<boolean>;

  /**
   * Clone a repository at a reference, including submodules.
   * Branches and tags are cloned shallow; commits need the full history to
   * check out.
   * @param url Repository URL (or local path)
   * @param targetDir Directory to clone into; parents are created
   * @param ref Branch, tag or commit to check out
   * @throws GitError if the clone or checkout fails
   */
  clone(url: string, targetDir: string, ref: RemoteRef): Promise<void>;
}
