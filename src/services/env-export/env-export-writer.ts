import { dirname } from "node:path";
import type { FileSystemLayer } from "../platform/filesystem";
import type { Logger } from "../logging";
import { envFileFormat, formatEnvFile, type EnvAssignment } from "./env-file";

/**
 * Writes the environment export file.
 */
export class EnvExportWriter {
  constructor(
    private readonly fileSystem: FileSystemLayer,
    private readonly logger: Logger
  ) {}

  /**
   * Write `assignments` to `path`, replacing an existing file. The format
   * follows the file extension, see envFileFormat.
   *
   * @throws FileSystemError when the directory or file cannot be written
   */
  async write(path: string, assignments: readonly EnvAssignment[]): Promise<void> {
    const format = envFileFormat(path);
    await this.fileSystem.mkdir(dirname(path));
    await this.fileSystem.writeFile(path, formatEnvFile(assignments, format));
    this.logger.info("Wrote environment export file", {
      path,
      format,
      variables: assignments.map((a) => a.name).join(","),
    });
  }
}
