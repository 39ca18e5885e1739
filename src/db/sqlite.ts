/**
 * SQLite backend on sql.js (SQLite compiled to WebAssembly).
 *
 * The database is held in memory. Given a file path, it is loaded from that
 * file on first use and written back after every write that commits.
 */
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import sqlJs, { type Database, type ParamsObject, type SqlJsStatic } from "sql.js";
import type { DatabaseBackend, SqlParam } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

const MEMORY = ":memory:";

let engine: Promise<SqlJsStatic> | null = null;

/**
 * The wasm module is compiled once per process. The CommonJS build exposes
 * its initializer as both the module and the module's `default`.
 */
function loadEngine(): Promise<SqlJsStatic> {
  if (!engine) engine = sqlJs.default();
  return engine;
}

async function readIfExists(path: string): Promise<Uint8Array | null> {
  try {
    return await readFile(path);
  } catch (err) {
    if (typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT") {
      return null;
    }
    throw err;
  }
}

export class SQLiteBackend implements DatabaseBackend {
  private path: string;
  private db: Promise<Database> | null = null;
  private inTransaction = false;
  private closed = false;

  constructor(path: string = MEMORY) {
    this.path = path;
  }

  async initialize(): Promise<void> {
    const db = await this.open();
    db.exec(SCHEMA_SQL);
    await this.persist(db);
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    const db = await this.open();
    db.run(sql, params);
    await this.persist(db);
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    const db = await this.open();
    const stmt = db.prepare(sql, params);
    try {
      const rows: ParamsObject[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows as T[];
    } finally {
      stmt.free();
    }
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const [row] = await this.query<T>(sql, params);
    return row ?? null;
  }

  /** Statements inside `fn` are written to disk once, after COMMIT. */
  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const db = await this.open();
    db.exec("BEGIN");
    this.inTransaction = true;

    let result: T;
    try {
      result = await fn();
      db.exec("COMMIT");
    } catch (err) {
      db.exec("ROLLBACK");
      throw err;
    } finally {
      this.inTransaction = false;
    }

    await this.persist(db);
    return result;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.db) (await this.db).close();
  }

  private open(): Promise<Database> {
    if (this.closed) {
      return Promise.reject(new Error(`SQLite database ${this.path} is closed`));
    }
    if (!this.db) this.db = this.load();
    return this.db;
  }

  private async load(): Promise<Database> {
    const SQL = await loadEngine();
    const data = this.path === MEMORY ? null : await readIfExists(this.path);
    return new SQL.Database(data);
  }

  private async persist(db: Database): Promise<void> {
    if (this.path === MEMORY || this.inTransaction) return;
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, db.export());
  }
}
