#!/usr/bin/env node
/**
 * CLI entrypoint for eid-ingest. Runs one ingestion pass over the input
 * directory; scheduling is left to cron or similar.
 *
 * Usage:
 *   eid-ingest --input-dir ./input --archive-dir ./archive --error-dir ./error
 *   eid-ingest --init-db
 */
import dotenv from "dotenv";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { parseArgs } from "node:util";
import { loadConfig, type Env } from "./config.js";
import { errorMessage } from "./core/exceptions.js";
import { ExportIngestor, summarize } from "./index.js";
import { logger } from "./logger.js";

const USAGE = `
eid-ingest: load tracking-export CSV files into the event tables

Usage:
  eid-ingest [options]

Options:
  --input-dir <dir>     Directory scanned for export files  (env INPUT_DIR)
  --archive-dir <dir>   Destination for ingested files      (env ARCHIVE_DIR)
  --error-dir <dir>     Destination for rejected files      (env ERROR_DIR)
  --db-path <file>      SQLite database file                (env DB_PATH)
  --init-db             Create the tables and exit
  --help                Show this help
`.trim();

// .env.local wins over .env; neither overrides the real environment.
for (const file of [".env.local", ".env"]) {
  const path = join(process.cwd(), file);
  if (existsSync(path)) dotenv.config({ path });
}

const { values } = parseArgs({
  args: process.argv.slice(2),
  options: {
    "input-dir": { type: "string" },
    "archive-dir": { type: "string" },
    "error-dir": { type: "string" },
    "db-path": { type: "string" },
    "init-db": { type: "boolean", default: false },
    help: { type: "boolean", short: "h", default: false },
  },
  strict: true,
});

if (values.help) {
  console.log(USAGE);
  process.exit(0);
}

const env: Env = {
  ...process.env,
  INPUT_DIR: values["input-dir"] ?? process.env.INPUT_DIR,
  ARCHIVE_DIR: values["archive-dir"] ?? process.env.ARCHIVE_DIR,
  ERROR_DIR: values["error-dir"] ?? process.env.ERROR_DIR,
  DB_PATH: values["db-path"] ?? process.env.DB_PATH,
};

let ingestor: ExportIngestor | undefined;
try {
  const config = loadConfig(env);
  logger.level = config.logLevel;
  ingestor = await ExportIngestor.fromConfig(config);

  if (values["init-db"]) {
    logger.info("Database schema ready");
  } else {
    const results = await ingestor.run();
    const summary = summarize(results);
    logger.info(summary, "Ingestion summary");
    for (const result of results) {
      if (result.status === "error") {
        logger.warn(
          { file: result.file.name, err: result.errorMessage },
          "File rejected",
        );
      }
    }
  }
} catch (err) {
  logger.fatal({ err: errorMessage(err) }, "Ingestion run failed");
  process.exitCode = 1;
} finally {
  await ingestor?.close();
}
