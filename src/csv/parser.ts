/**
 * Tolerant reader for upstream export files.
 *
 * Exports come with a free-text title line, `----;----` decoration rows and
 * a trailing record count, none of which belong to the table. Those are
 * stripped before the remaining block is handed to csv-parse.
 */
import { parse } from "csv-parse/sync";
import { errorMessage } from "../core/exceptions.js";
import type { RawFields, RawRow } from "../core/types.js";
import type { FileStore } from "../storage/backend.js";
import { decode, detectEncoding } from "./encoding.js";

export type ParseOutcome =
  | {
      ok: true;
      rows: RawRow[];
      columns: string[];
      encoding: string;
      /** Non-tabular lines removed above the header. */
      headerLinesDropped: number;
    }
  | { ok: false; error: string; encoding?: string };

export interface CleanedText {
  lines: string[];
  headerLinesDropped: number;
}

const isBlank = (line: string): boolean => line.trim() === "";

function isDecorationLine(line: string, separator: string): boolean {
  const cleaned = line.split(separator).join("").replace(/\s+/g, "");
  return cleaned.length > 0 && /^-+$/.test(cleaned);
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  // A final newline terminates the last line rather than opening a new one.
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/** Steps 3–7 of the cleaning pass; exported for tests. */
export function cleanLines(text: string, separator: string): CleanedText {
  let lines = splitLines(text).map((line) => line.replace(/\t/g, " "));

  while (lines.length > 0 && isBlank(lines[0])) lines.shift();

  let headerLinesDropped = 0;
  if (lines.length > 0 && !lines[0].includes(separator)) {
    lines.shift();
    headerLinesDropped++;
  }
  while (lines.length > 0 && isBlank(lines[0])) {
    lines.shift();
    headerLinesDropped++;
  }

  lines = lines.filter((line) => !isDecorationLine(line, separator));

  if (lines.length > 0) {
    const tail = lines[lines.length - 1].trim();
    if (!tail.includes(separator) || /^\d+$/.test(tail)) lines.pop();
  }

  return { lines, headerLinesDropped };
}

export function cleanHeader(name: string): string {
  return name.trim().replace(/^\uFEFF/, "").trim();
}

/**
 * Decode, clean and parse a delimiter-separated file. Failures are
 * reported in the outcome rather than thrown.
 */
export function parseCsv(
  bytes: Uint8Array,
  separator: string,
  fallbackEncoding: string,
): ParseOutcome {
  const encoding = detectEncoding(bytes, fallbackEncoding);
  const text = decode(bytes, encoding);

  const { lines, headerLinesDropped } = cleanLines(text, separator);
  if (lines.length === 0) {
    return { ok: false, error: "empty after cleaning", encoding };
  }

  // An opening quote that never closes swallows the rest of the file, so it
  // fails the file instead of being skipped like other malformed records.
  const skipped: string[] = [];
  let records: string[][];
  try {
    records = parse(lines.join("\n"), {
      delimiter: separator,
      bom: true,
      cast: false,
      relax_column_count: true,
      relax_quotes: true,
      skip_empty_lines: true,
      skip_records_with_error: true,
      on_skip: (err) => {
        if (err) skipped.push(err.code);
        return undefined;
      },
    });
  } catch (err) {
    return {
      ok: false,
      error: `CSV format error: ${errorMessage(err)}`,
      encoding,
    };
  }

  if (skipped.includes("CSV_QUOTE_NOT_CLOSED")) {
    // The quoted record starts right after the last one parsed.
    const line = headerLinesDropped + records.length + 1;
    return {
      ok: false,
      error: `CSV format error: quote not closed at line ${line}`,
      encoding,
    };
  }

  const [header, ...data] = records;
  if (!header) {
    return { ok: false, error: "empty after cleaning", encoding };
  }

  const columns = header.map(cleanHeader);
  const rows: RawRow[] = [];
  for (const record of data) {
    // Rows wider than the header are malformed and skipped.
    if (record.length > columns.length) continue;
    rows.push({
      fields: toFields(columns, record),
      lineNumber: headerLinesDropped + rows.length + 2,
    });
  }

  if (rows.length === 0) {
    return { ok: false, error: "no data rows", encoding };
  }

  return { ok: true, rows, columns, encoding, headerLinesDropped };
}

/** `parseCsv` over a file in `store`; a missing or unreadable file is an error outcome. */
export async function readAndParse(
  store: FileStore,
  path: string,
  separator: string,
  fallbackEncoding: string,
): Promise<ParseOutcome> {
  if (!(await store.exists(path))) {
    return { ok: false, error: `file not found: ${path}` };
  }

  let bytes: Uint8Array;
  try {
    bytes = await store.read(path);
  } catch (err) {
    return { ok: false, error: `cannot read file: ${errorMessage(err)}` };
  }
  return parseCsv(bytes, separator, fallbackEncoding);
}

function toFields(columns: string[], record: string[]): RawFields {
  const seen = new Set<string>();
  const entries: [string, string | null][] = [];
  columns.forEach((column, i) => {
    // First occurrence wins for duplicated header names.
    if (seen.has(column)) return;
    seen.add(column);
    const value = record[i];
    entries.push([column, value === undefined || value === "" ? null : value]);
  });
  return Object.fromEntries(entries);
}
