/**
 * Moves handled files out of the input directory.
 *
 * Success: `<archiveDir>/<date>/<module>/<category>/<name>`
 * Failure: `<errorDir>/<date>/<name>`
 */
import { join } from "node:path";
import { ArchiveError, errorMessage } from "../core/exceptions.js";
import type { DetectedFile } from "../core/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { FileStore } from "../storage/backend.js";

export interface ArchiveDirs {
  archiveDir: string;
  errorDir: string;
}

export class Archiver {
  private store: FileStore;
  private dirs: ArchiveDirs;
  private log: Logger;

  constructor(store: FileStore, dirs: ArchiveDirs, logger: Logger = rootLogger) {
    this.store = store;
    this.dirs = dirs;
    this.log = logger.child({ component: "archiver" });
  }

  successPath(file: DetectedFile): string {
    return join(
      this.dirs.archiveDir,
      file.fileDate,
      file.module,
      file.category,
      file.name,
    );
  }

  errorPath(file: DetectedFile): string {
    return join(this.dirs.errorDir, file.fileDate, file.name);
  }

  /** Returns the new location, or null when `path` no longer exists. */
  async archive(
    path: string,
    file: DetectedFile,
    success: boolean,
  ): Promise<string | null> {
    if (!(await this.store.exists(path))) {
      this.log.warn({ file: file.name }, "File already gone, nothing to archive");
      return null;
    }

    const dest = success ? this.successPath(file) : this.errorPath(file);
    try {
      await this.store.move(path, dest);
    } catch (err) {
      throw new ArchiveError(
        `Failed to archive ${file.name}: ${errorMessage(err)}`,
        path,
      );
    }

    this.log.info({ file: file.name, from: path, to: dest }, "File archived");
    return dest;
  }
}
