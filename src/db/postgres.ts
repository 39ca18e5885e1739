/**
 * PostgreSQL database backend using postgres.js.
 *
 * Statements are written with `?` placeholders and renumbered to `$n`.
 * Anything issued inside `transaction()` runs on the transaction's
 * connection.
 */
import { AsyncLocalStorage } from "node:async_hooks";
import postgres from "postgres";
import type { DatabaseBackend, SqlParam } from "./backend.js";
import { SCHEMA_SQL } from "./schema.js";

export function toPositional(sql: string): string {
  let index = 0;
  return sql.replace(/\?/g, () => `$${++index}`);
}

export class PostgresBackend implements DatabaseBackend {
  private sql: postgres.Sql;
  private tx = new AsyncLocalStorage<postgres.TransactionSql>();

  constructor(connectionString: string) {
    this.sql = postgres(connectionString, { onnotice: () => undefined });
  }

  private get conn(): postgres.Sql | postgres.TransactionSql {
    return this.tx.getStore() ?? this.sql;
  }

  async initialize(): Promise<void> {
    await this.sql.unsafe(SCHEMA_SQL).simple();
  }

  async execute(sql: string, params: SqlParam[] = []): Promise<void> {
    await this.conn.unsafe(toPositional(sql), params);
  }

  async query<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T[]> {
    return await this.conn.unsafe<T[]>(toPositional(sql), params);
  }

  async queryOne<T = Record<string, unknown>>(
    sql: string,
    params: SqlParam[] = [],
  ): Promise<T | null> {
    const rows = await this.query<T>(sql, params);
    return rows[0] ?? null;
  }

  async transaction<T>(fn: () => Promise<T>): Promise<T> {
    const box = await this.sql.begin(async (tx) => ({
      value: await this.tx.run(tx, fn),
    }));
    return box.value;
  }

  async close(): Promise<void> {
    await this.sql.end();
  }
}
