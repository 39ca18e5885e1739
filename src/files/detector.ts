/**
 * Finds ingestible files in the input directory.
 */
import { basename } from "node:path";
import { FileDetectionError, errorMessage } from "../core/exceptions.js";
import type { DetectedFile } from "../core/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { FileStat, FileStore } from "../storage/backend.js";
import { classify } from "./pattern.js";

function processedKey(name: string, version: number | string): string {
  return `${name}:${version}`;
}

export class FileDetector {
  private store: FileStore;
  private log: Logger;
  /** Files handled during this instance's lifetime, keyed by name + mtime. */
  private processed = new Set<string>();

  constructor(store: FileStore, logger: Logger = rootLogger) {
    this.store = store;
    this.log = logger.child({ component: "detector" });
  }

  /**
   * Non-recursive scan for `*.csv` files whose names classify. Files marked
   * processed earlier in this run are skipped.
   */
  async detect(inputDir: string): Promise<DetectedFile[]> {
    let paths: string[];
    try {
      paths = await this.store.list(inputDir);
    } catch (err) {
      throw new FileDetectionError(
        `Cannot read input directory ${inputDir}: ${errorMessage(err)}`,
        inputDir,
      );
    }

    const detected: DetectedFile[] = [];
    for (const path of paths) {
      const name = basename(path);
      if (!name.endsWith(".csv")) continue;

      const classification = classify(name);
      if (!classification) continue;

      let stat: FileStat;
      try {
        stat = await this.store.stat(path);
      } catch (err) {
        this.log.warn({ file: name, err: errorMessage(err) }, "Cannot stat file, skipping");
        continue;
      }

      if (this.processed.has(processedKey(name, stat.mtimeMs))) {
        this.log.debug({ file: name }, "Already processed in this run");
        continue;
      }

      detected.push({ path, name, ...classification, size: stat.size });
      this.log.info(
        { file: name, fileType: classification.fileType, size: stat.size },
        "File detected",
      );
    }

    return detected.sort((a, b) => a.name.localeCompare(b.name));
  }

  /** Falls back to the file date as the version when the file is already gone. */
  async markProcessed(path: string, file: DetectedFile): Promise<void> {
    let key: string;
    try {
      const stat = await this.store.stat(path);
      key = processedKey(file.name, stat.mtimeMs);
    } catch {
      key = processedKey(file.name, file.fileDate);
    }
    this.processed.add(key);
    this.log.debug({ file: file.name }, "Marked as processed");
  }

  get processedCount(): number {
    return this.processed.size;
  }
}
