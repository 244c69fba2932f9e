/**
 * Formatting of environment export files.
 *
 * The installer leaves a file the user sources (or calls, on Windows) to put
 * the installed tools on their environment:
 *
 *     export PATH="/tools/tools/xtensa-esp32-elf/esp-2021r2-patch3/xtensa-esp32-elf/bin:$PATH"
 *     export LIBCLANG_PATH="/tools/tools/xtensa-esp32-elf-clang/esp-14.0.0-20220415/xtensa-esp32-elf-clang/lib"
 */

import { extname } from "node:path";

export type EnvFileFormat = "sh" | "bat";

/**
 * One variable of the export file.
 */
export interface EnvAssignment {
  readonly name: string;
  /** Joined with the format's list separator */
  readonly values: readonly string[];
  /** Keep the variable's current value after the new entries (PATH-like variables) */
  readonly prependToExisting?: boolean;
}

const BATCH_EXTENSIONS: ReadonlySet<string> = new Set([".bat", ".cmd"]);

/**
 * Choose the format from the export file name: `.bat`/`.cmd` are batch files,
 * anything else is a POSIX shell script.
 */
export function envFileFormat(path: string): EnvFileFormat {
  return BATCH_EXTENSIONS.has(extname(path).toLowerCase()) ? "bat" : "sh";
}

/** Characters with meaning inside a double-quoted shell word */
function escapeShell(value: string): string {
  return value.replace(/[\\"$`]/g, (char) => `\\${char}`);
}

/**
 * Inside `set "NAME=value"` only `%` still expands.
 */
function escapeBatch(value: string): string {
  return value.replace(/%/g, "%%");
}

export function formatAssignment(assignment: EnvAssignment, format: EnvFileFormat): string {
  const { name, values, prependToExisting } = assignment;
  if (format === "bat") {
    const entries = values.map(escapeBatch);
    if (prependToExisting) {
      entries.push(`%${name}%`);
    }
    return `set "${name}=${entries.join(";")}"`;
  }
  const entries = values.map(escapeShell);
  if (prependToExisting) {
    entries.push(`$${name}`);
  }
  return `export ${name}="${entries.join(":")}"`;
}

/**
 * Render a whole export file, one line per assignment.
 */
export function formatEnvFile(
  assignments: readonly EnvAssignment[],
  format: EnvFileFormat
): string {
  return assignments.map((assignment) => `${formatAssignment(assignment, format)}\n`).join("");
}
