import { join, isAbsolute } from "node:path";
import type { InstallerConfig } from "../config/types";

/**
 * Installer path provider.
 *
 * Every directory the installer touches hangs off one tools root, which the
 * configuration resolves (default `~/.espressif`, overridable by `IDF_TOOLS_PATH`).
 */
export interface PathProvider {
  /** Root directory for all installed tools and SDK checkouts */
  readonly toolsRoot: string;

  /** Download cache: `<toolsRoot>/dist/` */
  readonly distDir: string;

  /** Session log files: `<toolsRoot>/logs/` */
  readonly logsDir: string;

  /**
   * Directory of one unpacked tool.
   * @returns `<toolsRoot>/tools/<toolName>`
   */
  toolPath(toolName: string): string;
}

/**
 * Default PathProvider implementation.
 */
export class DefaultPathProvider implements PathProvider {
  readonly toolsRoot: string;
  readonly distDir: string;
  readonly logsDir: string;
  private readonly toolsDir: string;

  /**
   * @throws TypeError if the configured tools root is not absolute
   */
  constructor(config: Pick<InstallerConfig, "toolsRoot">) {
    if (!isAbsolute(config.toolsRoot)) {
      throw new TypeError(`Tools root must be an absolute path: ${config.toolsRoot}`);
    }
    this.toolsRoot = config.toolsRoot;
    this.distDir = join(this.toolsRoot, "dist");
    this.toolsDir = join(this.toolsRoot, "tools");
    this.logsDir = join(this.toolsRoot, "logs");
  }

  toolPath(toolName: string): string {
    return join(this.toolsDir, toolName);
  }
}
