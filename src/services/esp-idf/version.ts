/**
 * ESP-IDF version detection.
 *
 * A checkout records its version in `tools/cmake/version.cmake`:
 *
 *     set(IDF_VERSION_MAJOR 5)
 *     set(IDF_VERSION_MINOR 0)
 *     set(IDF_VERSION_PATCH 1)
 */

export interface EspIdfVersion {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
}

/**
 * Location of the version file relative to the checkout root.
 */
export const VERSION_CMAKE_PATH = ["tools", "cmake", "version.cmake"] as const;

function readComponent(content: string, name: "MAJOR" | "MINOR" | "PATCH"): number | null {
  const match = new RegExp(`^\\s*set\\s*\\(\\s*IDF_VERSION_${name}\\s+(\\d+)\\s*\\)`, "m").exec(
    content
  );
  const value = match?.[1];
  return value === undefined ? null : Number.parseInt(value, 10);
}

/**
 * Parse the contents of `version.cmake`.
 *
 * @returns the version, or null if any component is missing
 */
export function parseVersionCmake(content: string): EspIdfVersion | null {
  const major = readComponent(content, "MAJOR");
  const minor = readComponent(content, "MINOR");
  const patch = readComponent(content, "PATCH");
  if (major === null || minor === null || patch === null) {
    return null;
  }
  return { major, minor, patch };
}

export function formatEspIdfVersion(version: EspIdfVersion | null): string {
  return version ? `v${version.major}.${version.minor}.${version.patch}` : "(unknown)";
}

/**
 * Compare two versions component-wise.
 *
 * @returns negative, zero or positive like Array.prototype.sort comparators
 */
export function compareVersions(a: EspIdfVersion, b: EspIdfVersion): number {
  return a.major - b.major || a.minor - b.minor || a.patch - b.patch;
}
