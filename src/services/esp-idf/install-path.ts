/**
 * Content-addressed location of ESP-IDF checkouts.
 *
 *     <base>/esp-idf-<hash(url)>/<ref>
 *
 * The hash keeps checkouts of different repositories apart; the ref name
 * keeps versions apart. 16 hex characters (64 bits) of SHA-256 are used, so a
 * prefix collision would merge two repositories' directories. That risk is
 * accepted.
 */

import { createHash } from "node:crypto";
import { join } from "node:path";
import { refName, type RemoteRef } from "./git-ref";

const HASH_LENGTH = 16;

export function hashSourceUrl(sourceUrl: string): string {
  return createHash("sha256").update(sourceUrl, "utf8").digest("hex").slice(0, HASH_LENGTH);
}

/**
 * Replace path separators so that refs like `release/v5.0` stay one directory.
 */
export function sanitizeRefName(name: string): string {
  return name.replace(/[/\\]/g, "-");
}

/**
 * @example
 * deriveInstallPath("/home/u/.espressif", "https://github.com/espressif/esp-idf", { kind: "tag", name: "v5.0" });
 * // "/home/u/.espressif/esp-idf-291de8283bb0766a/v5.0"
 */
export function deriveInstallPath(base: string, sourceUrl: string, ref: RemoteRef): string {
  return join(base, `esp-idf-${hashSourceUrl(sourceUrl)}`, sanitizeRefName(refName(ref)));
}
