/**
 * Filesystem access used by detection, reading and archiving.
 */

export interface FileStat {
  size: number;
  mtimeMs: number;
}

export interface FileStore {
  /** Absolute paths of regular files directly under `dir` (non-recursive). */
  list(dir: string): Promise<string[]>;

  stat(path: string): Promise<FileStat>;

  read(path: string): Promise<Uint8Array>;

  exists(path: string): Promise<boolean>;

  /** Move `src` to `dest`, creating the destination's parent directories. */
  move(src: string, dest: string): Promise<void>;
}
