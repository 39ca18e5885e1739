/**
 * Shared test fixtures: temp directories, export-file writer, pre-wired ingestor.
 */
import { mkdirSync, mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { DetectedFile, NormalizedRow } from "../src/core/types.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { ExportIngestor } from "../src/index.js";
import type { FileStore } from "../src/storage/backend.js";
import type { RequiredColumns } from "../src/transform/schema.js";

export const BACKLOG_FILE = "IDPS-TG-EID-WO-BACKLOG-2024-01-15.csv";
export const QC_ERROR_FILE = "IDPS-TG-EID-QC-ERROR-2024-01-15.csv";

export const WORKFLOW_HEADER =
  "Timestamp;Type de document;Code de destination;Request ID";
export const ERROR_HEADER =
  "Timestamp;Type de document;Code de destination;Request ID;Service;infos_comment";

export function makeTmpDir(): string {
  return mkdtempSync(join(tmpdir(), "eid-ingest-test-"));
}

export interface Dirs {
  root: string;
  inputDir: string;
  archiveDir: string;
  errorDir: string;
}

/** Input, archive and error roots under a fresh temp dir. */
export function makeDirs(): Dirs {
  const root = makeTmpDir();
  const dirs = {
    root,
    inputDir: join(root, "input"),
    archiveDir: join(root, "archive"),
    errorDir: join(root, "error"),
  };
  for (const dir of [dirs.inputDir, dirs.archiveDir, dirs.errorDir]) {
    mkdirSync(dir, { recursive: true });
  }
  return dirs;
}

/** Newline-terminated file body. */
export function csv(...lines: string[]): string {
  return `${lines.join("\n")}\n`;
}

export function writeExport(
  dir: string,
  name: string,
  content: string | Uint8Array,
): string {
  const path = join(dir, name);
  writeFileSync(path, content);
  return path;
}

export async function makeIngestor(
  dirs: Dirs,
  opts: { store?: FileStore; requiredColumns?: RequiredColumns } = {},
): Promise<{ ingestor: ExportIngestor; db: SQLiteBackend }> {
  const db = new SQLiteBackend(":memory:");
  const ingestor = new ExportIngestor({
    db,
    files: {
      inputDir: dirs.inputDir,
      archiveDir: dirs.archiveDir,
      errorDir: dirs.errorDir,
      csvSeparator: ";",
      csvEncoding: "utf-8",
    },
    store: opts.store,
    requiredColumns: opts.requiredColumns,
  });
  await ingestor.initialize();
  return { ingestor, db };
}

export function makeDetectedFile(
  overrides: Partial<DetectedFile> = {},
): DetectedFile {
  return {
    path: `/data/input/${BACKLOG_FILE}`,
    name: BACKLOG_FILE,
    module: "IDPS",
    fileType: "WO-BACKLOG",
    fileDate: "2024-01-15",
    size: 120,
    category: "workflow",
    ...overrides,
  };
}

export const INGESTED_AT = new Date("2024-01-16T06:00:00.000Z");

export function makeNormalizedRow(
  fields: Record<string, unknown>,
  overrides: Partial<NormalizedRow> = {},
): NormalizedRow {
  return {
    sourceFile: BACKLOG_FILE,
    fileType: "WO-BACKLOG",
    fileDate: "2024-01-15",
    module: "IDPS",
    category: "workflow",
    ingestionTimestamp: INGESTED_AT,
    lineNumber: 2,
    fields,
    ...overrides,
  };
}
