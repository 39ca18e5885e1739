/**
 * Configuration validation and backend factory.
 */
import { resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./core/exceptions.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import { LogLevelSchema } from "./logger.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const FilesConfigSchema = z.object({
  inputDir: z.string().min(1).default(() => resolve("input")),
  archiveDir: z.string().min(1).default(() => resolve("archive")),
  errorDir: z.string().min(1).default(() => resolve("error")),
  csvSeparator: z.string().length(1).default(";"),
  csvEncoding: z.string().min(1).default("utf-8"),
});

const DbConfigSchema = z.object({
  provider: z.enum(["sqlite", "postgres"]).default("sqlite"),
  config: z
    .object({
      path: z.string().min(1).default("./ingest.db"),
      connectionString: z.string().min(1).optional(),
    })
    .default({}),
});

export const ConfigSchema = z
  .object({
    files: FilesConfigSchema.default({}),
    db: DbConfigSchema.default({}),
    /** Required column names per file type; unset types are not checked. */
    requiredColumns: z.record(z.array(z.string())).optional(),
    logLevel: LogLevelSchema.default("info"),
  })
  .superRefine((config, ctx) => {
    if (config.db.provider === "postgres" && !config.db.config.connectionString) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["db", "config", "connectionString"],
        message: "required when db.provider is postgres",
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;
export type FilesConfig = Config["files"];

/** Validates a raw config object; failures name the offending keys. */
export function parseConfig(raw: unknown): Config {
  const result = ConfigSchema.safeParse(raw);
  if (result.success) return result.data;

  const keys = result.error.issues.map((issue) => issue.path.join("."));
  const details = result.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new ConfigurationError(`Invalid configuration: ${details}`, keys);
}

// ---------------------------------------------------------------------------
// Environment → config
// ---------------------------------------------------------------------------

export type Env = Record<string, string | undefined>;

function present(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/** `DATABASE_URL`, else a URL composed from the `DB_*` parts when a host is set. */
function databaseUrl(env: Env): string | undefined {
  const url = present(env.DATABASE_URL);
  if (url) return url;

  const host = present(env.DB_HOST);
  if (!host) return undefined;

  const port = present(env.DB_PORT) ?? "5432";
  const name = present(env.DB_NAME) ?? "";
  const user = present(env.DB_USER);
  const password = present(env.DB_PASSWORD);
  const auth = user
    ? `${encodeURIComponent(user)}${password ? `:${encodeURIComponent(password)}` : ""}@`
    : "";
  return `postgres://${auth}${host}:${port}/${encodeURIComponent(name)}`;
}

export function loadConfig(env: Env = process.env): Config {
  return parseConfig({
    files: {
      inputDir: present(env.INPUT_DIR),
      archiveDir: present(env.ARCHIVE_DIR),
      errorDir: present(env.ERROR_DIR),
      csvSeparator: env.CSV_SEPARATOR || undefined,
      csvEncoding: present(env.CSV_ENCODING),
    },
    db: {
      provider: present(env.DB_PROVIDER),
      config: {
        path: present(env.DB_PATH),
        connectionString: databaseUrl(env),
      },
    },
    logLevel: present(env.LOG_LEVEL),
  });
}

// ---------------------------------------------------------------------------
// DB factory
// ---------------------------------------------------------------------------

export function buildDb(config: Config): DatabaseBackend {
  const { provider, config: dbConfig } = config.db;
  switch (provider) {
    case "sqlite":
      return new SQLiteBackend(dbConfig.path);
    case "postgres":
      if (!dbConfig.connectionString) {
        throw new ConfigurationError("Postgres needs a connection string", [
          "db.config.connectionString",
        ]);
      }
      return new PostgresBackend(dbConfig.connectionString);
  }
}
