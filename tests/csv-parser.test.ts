/**
 * Unit tests for the tolerant CSV reader.
 */
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { decode, detectEncoding } from "../src/csv/encoding.js";
import { cleanLines, parseCsv, readAndParse } from "../src/csv/parser.js";
import { DiskFileStore } from "../src/storage/disk.js";
import { csv, makeTmpDir, writeExport } from "./fixtures.js";

const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);

function parseOk(text: string) {
  const outcome = parseCsv(bytes(text), ";", "utf-8");
  if (!outcome.ok) throw new Error(`unexpected failure: ${outcome.error}`);
  return outcome;
}

function parseError(text: string): string {
  const outcome = parseCsv(bytes(text), ";", "utf-8");
  if (outcome.ok) throw new Error("expected a failure");
  return outcome.error;
}

describe("cleanLines", () => {
  test("leaves clean input alone", () => {
    expect(cleanLines("a;b\n1;2\n3;4\n", ";")).toEqual({
      lines: ["a;b", "1;2", "3;4"],
      headerLinesDropped: 0,
    });
  });

  test("drops a title line and the blank lines after it", () => {
    expect(cleanLines("Export EID\n\n\na;b\n1;2\n", ";")).toEqual({
      lines: ["a;b", "1;2"],
      headerLinesDropped: 3,
    });
  });

  test("leading blank lines are not counted", () => {
    expect(cleanLines("\n\na;b\n1;2\n", ";")).toEqual({
      lines: ["a;b", "1;2"],
      headerLinesDropped: 0,
    });
  });

  test("drops dash decoration rows", () => {
    expect(cleanLines("a;b\n----;----\n1;2\n - ; - \n3;4\n", ";").lines).toEqual(
      ["a;b", "1;2", "3;4"],
    );
  });

  test("drops a record-count footer", () => {
    expect(cleanLines("a;b\n1;2\n3;4\n2\n", ";").lines).toEqual([
      "a;b",
      "1;2",
      "3;4",
    ]);
  });

  test("drops a trailing line without separator", () => {
    expect(cleanLines("a;b\n1;2\n(2 rows)\n", ";").lines).toEqual([
      "a;b",
      "1;2",
    ]);
  });

  test("turns tabs into spaces and accepts CRLF", () => {
    expect(cleanLines("a;b\r\nx\ty;2\r\n", ";").lines).toEqual([
      "a;b",
      "x y;2",
    ]);
  });
});

describe("parseCsv", () => {
  test("clean file keeps every data row", () => {
    const outcome = parseOk(csv("a;b", "1;2", "3;4"));
    expect(outcome.columns).toEqual(["a", "b"]);
    expect(outcome.headerLinesDropped).toBe(0);
    expect(outcome.rows).toEqual([
      { fields: { a: "1", b: "2" }, lineNumber: 2 },
      { fields: { a: "3", b: "4" }, lineNumber: 3 },
    ]);
  });

  test("preamble and footer are stripped; line numbers follow the source file", () => {
    const outcome = parseOk(
      csv("Extraction du 15/01/2024", "a;b", "1;2", "3;4", "2"),
    );
    // 5 lines - title - footer - header
    expect(outcome.rows).toHaveLength(2);
    expect(outcome.headerLinesDropped).toBe(1);
    expect(outcome.rows.map((r) => r.lineNumber)).toEqual([3, 4]);
  });

  test("blank cells are null and short rows are padded", () => {
    const outcome = parseOk(csv("a;b;c", "1;;3", "4;5"));
    expect(outcome.rows.map((r) => r.fields)).toEqual([
      { a: "1", b: null, c: "3" },
      { a: "4", b: "5", c: null },
    ]);
  });

  test("rows wider than the header are skipped", () => {
    const outcome = parseOk(csv("a;b", "1;2;3", "4;5"));
    expect(outcome.rows.map((r) => r.fields)).toEqual([{ a: "4", b: "5" }]);
  });

  test("header names are trimmed and lose their BOM", () => {
    const outcome = parseOk(csv("\uFEFF Timestamp ; Request ID", "x;y"));
    expect(outcome.columns).toEqual(["Timestamp", "Request ID"]);
    expect(outcome.rows[0].fields).toEqual({ Timestamp: "x", "Request ID": "y" });
  });

  test("duplicate header names keep the first column", () => {
    const outcome = parseOk(csv("a;a;b", "1;2;3"));
    expect(outcome.rows[0].fields).toEqual({ a: "1", b: "3" });
  });

  test("values stay text", () => {
    const outcome = parseOk(csv("n;flag", "007;true"));
    expect(outcome.rows[0].fields).toEqual({ n: "007", flag: "true" });
  });

  test("UTF-8 accents survive decoding", () => {
    const outcome = parseOk(
      csv("Type de document;Commentaire", "Carte vitale;Données reçues, déjà vérifiées à l'entrée"),
    );
    expect(outcome.rows[0].fields.Commentaire).toBe(
      "Données reçues, déjà vérifiées à l'entrée",
    );
  });

  test("an unclosed quote fails the file instead of dropping the rows after it", () => {
    expect(parseError(csv("a;b", "1;2", '"x;3', "4;5", "6;7", "8;9"))).toBe(
      "CSV format error: quote not closed at line 3",
    );
  });

  test("unclosed quote line counts the dropped title", () => {
    expect(parseError(csv("Extraction du 15/01/2024", "a;b", "1;2", '"x;3', "4;5"))).toBe(
      "CSV format error: quote not closed at line 4",
    );
  });

  test("empty file", () => {
    expect(parseError("")).toBe("empty after cleaning");
  });

  test("title only", () => {
    expect(parseError(csv("Extraction du 15/01/2024"))).toBe(
      "empty after cleaning",
    );
  });

  test("header without data rows", () => {
    expect(parseError(csv("a;b"))).toBe("no data rows");
  });
});

describe("encoding", () => {
  test("empty input falls back", () => {
    expect(detectEncoding(new Uint8Array(0), "windows-1252")).toBe(
      "windows-1252",
    );
  });

  test("decode handles single-byte encodings", () => {
    const latin1 = Uint8Array.from([0x43, 0x72, 0xe9, 0xe9]);
    expect(decode(latin1, "latin1")).toBe("Créé");
  });

  test("unknown encoding names decode as UTF-8", () => {
    expect(decode(bytes("déjà"), "no-such-encoding")).toBe("déjà");
  });
});

describe("readAndParse", () => {
  test("reads from the store", async () => {
    const dir = makeTmpDir();
    const path = writeExport(dir, "x.csv", csv("a;b", "1;2"));
    const outcome = await readAndParse(new DiskFileStore(), path, ";", "utf-8");
    expect(outcome.ok).toBe(true);
    if (outcome.ok) expect(outcome.rows).toHaveLength(1);
  });

  test("missing file is an error outcome", async () => {
    const path = join(makeTmpDir(), "gone.csv");
    const outcome = await readAndParse(new DiskFileStore(), path, ";", "utf-8");
    expect(outcome).toEqual({ ok: false, error: `file not found: ${path}` });
  });
});
