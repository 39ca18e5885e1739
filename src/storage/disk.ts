/**
 * Local filesystem store.
 */
import {
  access,
  copyFile,
  mkdir,
  readFile,
  readdir,
  rename,
  stat,
  unlink,
} from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { FileStat, FileStore } from "./backend.js";

export class DiskFileStore implements FileStore {
  async list(dir: string): Promise<string[]> {
    const base = resolve(dir);
    const entries = await readdir(base, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile())
      .map((entry) => join(base, entry.name))
      .sort();
  }

  async stat(path: string): Promise<FileStat> {
    const s = await stat(path);
    return { size: s.size, mtimeMs: s.mtimeMs };
  }

  async read(path: string): Promise<Uint8Array> {
    const buf = await readFile(path);
    return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await access(path);
      return true;
    } catch {
      return false;
    }
  }

  async move(src: string, dest: string): Promise<void> {
    await mkdir(dirname(dest), { recursive: true });
    try {
      await rename(src, dest);
    } catch (err) {
      // rename cannot cross filesystems
      if (!isCrossDevice(err)) throw err;
      await copyFile(src, dest);
      await unlink(src);
    }
  }
}

function isCrossDevice(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    err.code === "EXDEV"
  );
}
