/**
 * File-name grammar: `<PREFIX>-TG-EID-<TYPE>-<YYYY-MM-DD>.csv`.
 */
import { DateTime } from "luxon";
import type { Category } from "../core/types.js";

const FILE_NAME_PATTERN =
  /^([A-Z0-9]+)-TG-EID-([A-Z-]+)-(\d{4}-\d{2}-\d{2})\.csv$/;

export const WORKFLOW_TYPES: ReadonlySet<string> = new Set([
  "WO-BACKLOG",
  "WO-FINISH",
]);

export const ERROR_TYPES: ReadonlySet<string> = new Set([
  "QC-ERROR",
  "PERSO-ERROR",
  "SUP-ERROR",
]);

export const KNOWN_FILE_TYPES: readonly string[] = [
  ...WORKFLOW_TYPES,
  ...ERROR_TYPES,
];

export interface FileClassification {
  module: string;
  fileType: string;
  fileDate: string;
  category: Category;
}

export function categoryOf(fileType: string): Category {
  if (WORKFLOW_TYPES.has(fileType)) return "workflow";
  if (ERROR_TYPES.has(fileType)) return "error";
  return "unknown";
}

/** Returns null unless the name matches exactly and carries a real calendar date. */
export function classify(fileName: string): FileClassification | null {
  const match = FILE_NAME_PATTERN.exec(fileName);
  if (!match) return null;

  const [, module, fileType, fileDate] = match;
  if (!DateTime.fromFormat(fileDate, "yyyy-MM-dd").isValid) return null;

  return { module, fileType, fileDate, category: categoryOf(fileType) };
}
