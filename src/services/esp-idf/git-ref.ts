/**
 * Git references for ESP-IDF checkouts.
 */

import { VersionParseError } from "../errors";

export type RemoteRef =
  | { readonly kind: "branch"; readonly name: string }
  | { readonly kind: "tag"; readonly name: string }
  | { readonly kind: "commit"; readonly hash: string };

/**
 * The branch name, tag name or commit hash of a reference.
 */
export function refName(ref: RemoteRef): string {
  return ref.kind === "commit" ? ref.hash : ref.name;
}

export function formatRef(ref: RemoteRef): string {
  return `${ref.kind} ${refName(ref)}`;
}

const PREFIXES = ["commit:", "tag:", "branch:"] as const;

/**
 * Interpret a user-supplied ESP-IDF version.
 *
 * - `commit:<hash>`, `tag:<name>`, `branch:<name>` select the kind explicitly
 * - `4.4`, `5.0.1` are release tags and get a `v` prefix
 * - `v4.4` is a tag as given
 * - anything else (`master`, `release/v5.0`) is a branch
 *
 * @throws VersionParseError with code INVALID_GIT_REF for an empty version
 */
export function parseEspIdfGitRef(version: string): RemoteRef {
  const trimmed = version.trim();

  for (const prefix of PREFIXES) {
    if (trimmed.startsWith(prefix)) {
      const value = requireNonEmpty(trimmed.slice(prefix.length).trim(), version);
      switch (prefix) {
        case "commit:":
          return { kind: "commit", hash: value };
        case "tag:":
          return { kind: "tag", name: value };
        case "branch:":
          return { kind: "branch", name: value };
      }
    }
  }

  const name = requireNonEmpty(trimmed, version);
  if (/^\d/.test(name)) {
    return { kind: "tag", name: `v${name}` };
  }
  if (/^v\d/.test(name)) {
    return { kind: "tag", name };
  }
  return { kind: "branch", name };
}

function requireNonEmpty(value: string, original: string): string {
  if (value === "") {
    throw new VersionParseError(
      `Invalid ESP-IDF version: '${original}'`,
      "INVALID_GIT_REF",
      original
    );
  }
  return value;
}
