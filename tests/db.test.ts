/**
 * Unit tests for the SQLite backend and the Postgres placeholder rewrite.
 */
import { join } from "node:path";
import { describe, expect, test } from "vitest";
import { toPositional } from "../src/db/postgres.js";
import { SQLiteBackend } from "../src/db/sqlite.js";
import { makeTmpDir } from "./fixtures.js";

async function makeDb(): Promise<SQLiteBackend> {
  const db = new SQLiteBackend(":memory:");
  await db.initialize();
  return db;
}

describe("SQLiteBackend", () => {
  test("initialize creates tables", async () => {
    const db = await makeDb();
    const tables = await db.query<{ name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' ORDER BY name",
    );
    expect(tables.map((t) => t.name)).toEqual([
      "error_events",
      "ingestion_audit_log",
      "workflow_events",
    ]);
    await db.close();
  });

  test("initialize is idempotent", async () => {
    const db = await makeDb();
    await db.initialize();
    const row = await db.queryOne<{ n: number }>(
      "SELECT COUNT(*) AS n FROM workflow_events",
    );
    expect(row?.n).toBe(0);
    await db.close();
  });

  test("audit file_name is unique", async () => {
    const db = await makeDb();
    const insert =
      "INSERT INTO ingestion_audit_log (id, file_name, file_type, file_date, status, started_at) VALUES (?, ?, ?, ?, ?, ?)";
    await db.execute(insert, ["a", "f.csv", "WO-FINISH", "2024-01-15", "success", "t"]);
    await expect(
      db.execute(insert, ["b", "f.csv", "WO-FINISH", "2024-01-15", "success", "t"]),
    ).rejects.toThrow(/UNIQUE/);
    await db.close();
  });

  test("transaction commits", async () => {
    const db = await makeDb();
    const result = await db.transaction(async () => {
      await db.execute(
        "INSERT INTO ingestion_audit_log (id, file_name, file_type, file_date, status, started_at) VALUES (?, ?, ?, ?, ?, ?)",
        ["a", "f.csv", "WO-FINISH", "2024-01-15", "success", "t"],
      );
      return "done";
    });
    expect(result).toBe("done");
    expect(await db.queryOne("SELECT id FROM ingestion_audit_log")).toEqual({ id: "a" });
    await db.close();
  });

  test("transaction rolls back on failure", async () => {
    const db = await makeDb();
    await expect(
      db.transaction(async () => {
        await db.execute(
          "INSERT INTO ingestion_audit_log (id, file_name, file_type, file_date, status, started_at) VALUES (?, ?, ?, ?, ?, ?)",
          ["a", "f.csv", "WO-FINISH", "2024-01-15", "success", "t"],
        );
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await db.query("SELECT id FROM ingestion_audit_log")).toEqual([]);
    await db.close();
  });

  test("a file database keeps its rows across connections", async () => {
    const path = join(makeTmpDir(), "data", "ingest.db");
    const first = new SQLiteBackend(path);
    await first.initialize();
    await first.transaction(async () => {
      await first.execute(
        "INSERT INTO ingestion_audit_log (id, file_name, file_type, file_date, status, started_at) VALUES (?, ?, ?, ?, ?, ?)",
        ["a", "f.csv", "WO-FINISH", "2024-01-15", "success", "t"],
      );
    });
    await first.close();

    const second = new SQLiteBackend(path);
    await second.initialize();
    expect(await second.query("SELECT id, file_name FROM ingestion_audit_log")).toEqual([
      { id: "a", file_name: "f.csv" },
    ]);
    await second.close();
  });

  test("statements after close reject", async () => {
    const db = await makeDb();
    await db.close();
    await expect(db.query("SELECT 1")).rejects.toThrow("SQLite database :memory: is closed");
  });

  test("queryOne returns null when nothing matches", async () => {
    const db = await makeDb();
    expect(
      await db.queryOne("SELECT id FROM workflow_events WHERE id = ?", ["nope"]),
    ).toBeNull();
    await db.close();
  });
});

describe("toPositional", () => {
  test("numbers placeholders in order", () => {
    expect(toPositional("UPDATE t SET a = ?, b = ? WHERE id = ?")).toBe(
      "UPDATE t SET a = $1, b = $2 WHERE id = $3",
    );
  });
});
