/**
 * eid-ingest – batch ingestion of tracking-export CSV files into the
 * workflow / error event tables.
 */
import { buildDb, type Config, type FilesConfig } from "./config.js";
import { IngestError, errorMessage } from "./core/exceptions.js";
import { FilePipeline } from "./core/pipeline.js";
import type {
  DetectedFile,
  IngestionResult,
  RunSummary,
} from "./core/types.js";
import type { DatabaseBackend } from "./db/backend.js";
import { PersistenceGateway } from "./db/gateway.js";
import { Archiver } from "./files/archiver.js";
import { FileDetector } from "./files/detector.js";
import { createLogger, logger as rootLogger, type Logger } from "./logger.js";
import type { FileStore } from "./storage/backend.js";
import { DiskFileStore } from "./storage/disk.js";
import type { RequiredColumns } from "./transform/schema.js";
import type { RowTransformer } from "./transform/transformer.js";

export { buildDb, loadConfig, parseConfig } from "./config.js";
export type { Config, Env, FilesConfig } from "./config.js";
export * from "./core/exceptions.js";
export type * from "./core/types.js";
export { FilePipeline } from "./core/pipeline.js";
export { parseCsv, readAndParse } from "./csv/parser.js";
export type { DatabaseBackend, SqlParam } from "./db/backend.js";
export { PersistenceGateway } from "./db/gateway.js";
export { PostgresBackend } from "./db/postgres.js";
export { SQLiteBackend } from "./db/sqlite.js";
export { Archiver } from "./files/archiver.js";
export { FileDetector } from "./files/detector.js";
export { categoryOf, classify } from "./files/pattern.js";
export { mapRow } from "./mappers/registry.js";
export type { FileStore } from "./storage/backend.js";
export { DiskFileStore } from "./storage/disk.js";

export interface ExportIngestorOptions {
  db: DatabaseBackend;
  files: FilesConfig;
  store?: FileStore;
  requiredColumns?: RequiredColumns;
  /** Replaces the default normalizer chain. */
  transformer?: RowTransformer;
  logger?: Logger;
}

interface Progress {
  startedAt: Date;
  rowsProcessed: number;
  rowsInserted: number;
}

export function summarize(results: IngestionResult[]): RunSummary {
  const successes = results.filter((r) => r.status === "success").length;
  return {
    files: results.length,
    successes,
    errors: results.length - successes,
    rowsInserted: results.reduce((sum, r) => sum + r.rowsInserted, 0),
  };
}

export class ExportIngestor {
  private db: DatabaseBackend;
  private files: FilesConfig;
  private log: Logger;
  private detector: FileDetector;
  private archiver: Archiver;
  private pipeline: FilePipeline;
  readonly gateway: PersistenceGateway;

  constructor(opts: ExportIngestorOptions) {
    const store = opts.store ?? new DiskFileStore();
    const logger = opts.logger ?? rootLogger;

    this.db = opts.db;
    this.files = opts.files;
    this.log = logger.child({ component: "ingestor" });
    this.gateway = new PersistenceGateway(opts.db, logger);
    this.detector = new FileDetector(store, logger);
    this.archiver = new Archiver(
      store,
      { archiveDir: opts.files.archiveDir, errorDir: opts.files.errorDir },
      logger,
    );
    this.pipeline = new FilePipeline({
      store,
      gateway: this.gateway,
      separator: opts.files.csvSeparator,
      fallbackEncoding: opts.files.csvEncoding,
      requiredColumns: opts.requiredColumns,
      transformer: opts.transformer,
      logger,
    });
  }

  /** Build the backend named in `config` and create its tables. */
  static async fromConfig(config: Config): Promise<ExportIngestor> {
    const ingestor = new ExportIngestor({
      db: buildDb(config),
      files: config.files,
      requiredColumns: config.requiredColumns,
      logger: createLogger(config.logLevel),
    });
    await ingestor.initialize();
    return ingestor;
  }

  /** Create tables and indexes. Safe to call more than once. */
  async initialize(): Promise<void> {
    await this.db.initialize();
  }

  async close(): Promise<void> {
    await this.db.close();
  }

  // ------------------------------------------------------------------
  // Public API
  // ------------------------------------------------------------------

  /**
   * Process every file currently in the input directory, one after the
   * other. Only a detection failure rejects; per-file failures come back
   * as results with status "error".
   */
  async run(): Promise<IngestionResult[]> {
    const detected = await this.detector.detect(this.files.inputDir);
    this.log.info(
      { inputDir: this.files.inputDir, files: detected.length },
      "Run started",
    );

    const results: IngestionResult[] = [];
    for (const file of detected) {
      results.push(await this.processFile(file));
    }

    this.log.info(summarize(results), "Run finished");
    return results;
  }

  /** Never rejects. */
  async processFile(file: DetectedFile): Promise<IngestionResult> {
    const progress: Progress = {
      startedAt: new Date(),
      rowsProcessed: 0,
      rowsInserted: 0,
    };
    this.log.info({ file: file.name, fileType: file.fileType }, "Processing file");

    try {
      const rows = await this.pipeline.read(file);
      progress.rowsProcessed = rows.length;

      this.pipeline.checkSchema(rows, file);

      const transformed = this.pipeline.transform(rows, file);
      if (transformed.transformedCount === 0) {
        throw new IngestError(
          `No rows survived transformation (${transformed.errors.length} errors)`,
          { errors: transformed.errors },
        );
      }

      const records = this.pipeline.map(transformed.rows, file);
      progress.rowsInserted = await this.pipeline.persist(records, file);
      if (progress.rowsInserted === 0) {
        throw new IngestError("No rows inserted");
      }

      await this.detector.markProcessed(file.path, file);
      await this.archiver.archive(file.path, file, true);
      await this.gateway.upsertAuditLog({
        file,
        status: "success",
        recordsExpected: progress.rowsProcessed,
        recordsInserted: progress.rowsInserted,
        startedAt: progress.startedAt,
      });

      const result = this.result(file, "success", progress, null);
      this.log.info(
        {
          file: file.name,
          rowsInserted: result.rowsInserted,
          elapsedMs: result.elapsedMs,
        },
        "File ingested",
      );
      return result;
    } catch (err) {
      return this.handleError(file, err, progress);
    }
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  /** Move to the error tree and record the failure; both are best effort. */
  private async handleError(
    file: DetectedFile,
    err: unknown,
    progress: Progress,
  ): Promise<IngestionResult> {
    const message = errorMessage(err);
    this.log.error({ file: file.name, err: message }, "File ingestion failed");

    try {
      await this.archiver.archive(file.path, file, false);
    } catch (archiveErr) {
      this.log.error(
        { file: file.name, err: errorMessage(archiveErr) },
        "Could not move file to the error tree",
      );
    }

    try {
      await this.gateway.upsertAuditLog({
        file,
        status: "error",
        recordsExpected: progress.rowsProcessed,
        recordsInserted: progress.rowsInserted,
        errorMessage: message,
        startedAt: progress.startedAt,
      });
    } catch (auditErr) {
      this.log.error(
        { file: file.name, err: errorMessage(auditErr) },
        "Could not record failure in the audit log",
      );
    }

    return this.result(file, "error", progress, message);
  }

  private result(
    file: DetectedFile,
    status: IngestionResult["status"],
    progress: Progress,
    message: string | null,
  ): IngestionResult {
    return {
      file,
      status,
      rowsProcessed: progress.rowsProcessed,
      rowsInserted: progress.rowsInserted,
      errorMessage: message,
      elapsedMs: Date.now() - progress.startedAt.getTime(),
    };
  }
}
