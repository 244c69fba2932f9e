/**
 * Process execution through execa.
 *
 * The installer runs external tools (ESP-IDF's `idf_tools.py`) to completion;
 * there is no cancellation or process-tree management.
 */

import { execa } from "execa";
import type { Logger } from "../logging";

export interface ProcessOptions {
  /** Working directory for the process */
  readonly cwd?: string;
  /** Extra environment variables, merged over the current environment */
  readonly env?: Readonly<Record<string, string>>;
  /**
   * Forward the child's stdout/stderr to this process instead of capturing
   * them. The result then carries empty output strings.
   */
  readonly inheritOutput?: boolean;
}

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /** Exit code, or null if the process did not exit normally (signal, spawn error) */
  readonly exitCode: number | null;
}

export interface ProcessRunner {
  /**
   * Run a command and wait for it to exit.
   * Never rejects for a failing command: check `exitCode` instead.
   *
   * @example
   * const result = await runner.run("python3", [idfTools, "install", "cmake"], {
   *   env: { IDF_TOOLS_PATH: toolsRoot },
   * });
   * if (result.exitCode !== 0) throw new InstallError(result.stderr, "INSTALLER_FAILED");
   */
  run(command: string, args: readonly string[], options?: ProcessOptions): Promise<ProcessResult>;
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  async run(
    command: string,
    args: readonly string[],
    options?: ProcessOptions
  ): Promise<ProcessResult> {
    this.logger.debug("Run", { command, args: args.join(" "), cwd: options?.cwd ?? null });
    const output = options?.inheritOutput ? "inherit" : "pipe";

    const result = await execa(command, [...args], {
      reject: false,
      encoding: "utf8",
      stdout: output,
      stderr: output,
      ...(options?.cwd && { cwd: options.cwd }),
      ...(options?.env && { env: { ...options.env } }),
    });

    const stdout = typeof result.stdout === "string" ? result.stdout : "";
    let stderr = typeof result.stderr === "string" ? result.stderr : "";
    // Spawn errors (ENOENT, EACCES) resolve with failed=true and no stderr
    if (
      result.failed &&
      stderr === "" &&
      result.exitCode === undefined &&
      "message" in result &&
      typeof result.message === "string"
    ) {
      stderr = result.message;
    }

    const processResult: ProcessResult = {
      stdout,
      stderr,
      exitCode: result.exitCode ?? null,
    };
    this.logOutputLines(command, processResult.stdout, "stdout");
    this.logOutputLines(command, processResult.stderr, "stderr");
    this.logger.debug("Exited", { command, exitCode: processResult.exitCode });
    return processResult;
  }

  private logOutputLines(command: string, output: string, stream: "stdout" | "stderr"): void {
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`[${command}] ${stream}: ${line}`);
    }
  }
}
