/**
 * Abstract database backend interface.
 *
 * Implementations run raw SQL with `?` placeholders.
 */

export type SqlParam = string | number | null;

export interface DatabaseBackend {
  /** Create tables / indexes from SCHEMA_SQL. */
  initialize(): Promise<void>;

  /** Execute a write statement (INSERT, UPDATE, DELETE). */
  execute(sql: string, params?: SqlParam[]): Promise<void>;

  /** Run a SELECT and return all matching rows. */
  query<T = Record<string, unknown>>(
    sql: string,
    params?: SqlParam[],
  ): Promise<T[]>;

  /** Run a SELECT and return the first row, or null. */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: SqlParam[],
  ): Promise<T | null>;

  /** Execute `fn` inside a transaction; a throw rolls everything back. */
  transaction<T>(fn: () => Promise<T>): Promise<T>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
