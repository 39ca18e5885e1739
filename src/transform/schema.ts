/**
 * Structural checks run on parsed rows before any transformation.
 */
import type { RawRow } from "../core/types.js";

/** Required column names per file type. Empty lists disable the check. */
export type RequiredColumns = Record<string, readonly string[]>;

export const DEFAULT_REQUIRED_COLUMNS: RequiredColumns = {
  "WO-BACKLOG": [],
  "WO-FINISH": [],
  "QC-ERROR": [],
  "PERSO-ERROR": [],
  "SUP-ERROR": [],
};

function sameColumns(a: Set<string>, b: string[]): boolean {
  return a.size === b.length && b.every((name) => a.has(name));
}

/** Returns an error message, or null when the rows pass. */
export function checkSchema(
  rows: RawRow[],
  fileType: string,
  requiredColumns: RequiredColumns = DEFAULT_REQUIRED_COLUMNS,
): string | null {
  if (rows.length === 0) return "no rows to validate";

  const expected = new Set(Object.keys(rows[0].fields));
  for (const row of rows.slice(1)) {
    if (!sameColumns(expected, Object.keys(row.fields))) {
      return `line ${row.lineNumber}: inconsistent columns`;
    }
  }

  const required = requiredColumns[fileType] ?? [];
  const missing = required.filter((name) => !expected.has(name));
  if (missing.length > 0) {
    return `missing columns for ${fileType}: ${missing.join(", ")}`;
  }

  return null;
}
