/**
 * Per-file pipeline – the stages one export file goes through between
 * detection and archiving. Each stage raises a typed error on failure; the
 * orchestrator decides what happens next.
 */
import { readAndParse } from "../csv/parser.js";
import type { PersistenceGateway } from "../db/gateway.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { mapRow } from "../mappers/registry.js";
import type { FileStore } from "../storage/backend.js";
import {
  checkSchema,
  DEFAULT_REQUIRED_COLUMNS,
  type RequiredColumns,
} from "../transform/schema.js";
import { RowTransformer } from "../transform/transformer.js";
import { FileValidationError, SchemaValidationError } from "./exceptions.js";
import type {
  DetectedFile,
  MappedRecord,
  NormalizedRow,
  RawRow,
  TransformationResult,
} from "./types.js";

export interface FilePipelineOptions {
  store: FileStore;
  gateway: PersistenceGateway;
  separator: string;
  fallbackEncoding: string;
  requiredColumns?: RequiredColumns;
  transformer?: RowTransformer;
  logger?: Logger;
}

export class FilePipeline {
  private store: FileStore;
  private gateway: PersistenceGateway;
  private separator: string;
  private fallbackEncoding: string;
  private requiredColumns: RequiredColumns;
  private transformer: RowTransformer;
  private log: Logger;

  constructor(opts: FilePipelineOptions) {
    this.store = opts.store;
    this.gateway = opts.gateway;
    this.separator = opts.separator;
    this.fallbackEncoding = opts.fallbackEncoding;
    this.requiredColumns = opts.requiredColumns ?? DEFAULT_REQUIRED_COLUMNS;
    this.log = (opts.logger ?? rootLogger).child({ component: "pipeline" });
    this.transformer =
      opts.transformer ?? new RowTransformer({ logger: opts.logger });
  }

  /** Step 1: read, clean and parse the file. */
  async read(file: DetectedFile): Promise<RawRow[]> {
    const outcome = await readAndParse(
      this.store,
      file.path,
      this.separator,
      this.fallbackEncoding,
    );
    if (!outcome.ok) {
      throw new FileValidationError(
        `Invalid file ${file.name}: ${outcome.error}`,
        file.path,
      );
    }

    this.log.info(
      {
        file: file.name,
        encoding: outcome.encoding,
        rows: outcome.rows.length,
        columns: outcome.columns.length,
      },
      "File validated",
    );
    return outcome.rows;
  }

  /** Step 2: structural checks on the parsed rows. */
  checkSchema(rows: RawRow[], file: DetectedFile): void {
    const problem = checkSchema(rows, file.fileType, this.requiredColumns);
    if (problem !== null) {
      throw new SchemaValidationError(problem, file.fileType);
    }
  }

  /** Step 3: normalize. Failing rows are reported, not thrown. */
  transform(rows: RawRow[], file: DetectedFile): TransformationResult {
    return this.transformer.transform(rows, file);
  }

  /** Step 4: shape each row for its category's table. */
  map(rows: NormalizedRow[], file: DetectedFile): MappedRecord[] {
    return rows.map((row) => mapRow(row, file));
  }

  /** Step 5: insert the whole batch in one transaction. */
  async persist(records: MappedRecord[], file: DetectedFile): Promise<number> {
    return this.gateway.insertEvents(records, file.category);
  }
}
