/**
 * Ingestion data model types.
 */

/** Classification of a file by its type code. */
export type Category = "workflow" | "error" | "unknown";

export type IngestionStatus = "success" | "error";

/** A candidate file found in the input directory. Built once per scan. */
export interface DetectedFile {
  readonly path: string;
  readonly name: string;
  /** File-name prefix, e.g. `IDPS`. Used as the archive partition. */
  readonly module: string;
  readonly fileType: string;
  /** Calendar date from the file name, `YYYY-MM-DD`. */
  readonly fileDate: string;
  readonly size: number;
  readonly category: Category;
}

/** Cell values keep their header order; blank cells are null. */
export type RawFields = Record<string, string | null>;

export interface RawRow {
  fields: RawFields;
  /** 1-based line in the source file, header line included. */
  lineNumber: number;
}

/** Field values after date / JSON normalization. */
export type NormalizedFields = Record<string, unknown>;

export interface NormalizedRow {
  sourceFile: string;
  fileType: string;
  fileDate: string;
  module: string;
  category: Category;
  ingestionTimestamp: Date;
  lineNumber: number;
  fields: NormalizedFields;
}

export interface TransformationResult {
  rows: NormalizedRow[];
  originalCount: number;
  transformedCount: number;
  errors: string[];
  /** Percentage of rows that survived the transform. */
  successRate: number;
}

// ---------------------------------------------------------------------------
// Mapped records
// ---------------------------------------------------------------------------

export interface WorkflowEvent {
  kind: "workflow";
  eventTimestamp: Date;
  documentType: string;
  destinationCode: string;
  requestId: string;
  /** `BACKLOG`, `FINISH`, or the raw file type when unrecognized. */
  status: string;
  fileName: string;
  ingestedAt: Date;
}

export interface ErrorEvent {
  kind: "error";
  eventTimestamp: Date;
  documentType: string;
  destinationCode: string;
  requestId: string;
  serviceName: string;
  /** `QC_ERROR`, `PERSO_ERROR`, `SUP_ERROR`, or the raw file type. */
  errorCategory: string;
  comment: string | null;
  fileName: string;
  ingestedAt: Date;
}

/** Rows of an unknown category keep the generic normalized shape. */
export interface UnknownRecord {
  kind: "unknown";
  row: NormalizedRow;
}

export type MappedRecord = WorkflowEvent | ErrorEvent | UnknownRecord;

// ---------------------------------------------------------------------------
// Audit + results
// ---------------------------------------------------------------------------

export interface AuditLogEntry {
  id: string;
  fileName: string;
  fileType: string;
  fileDate: string;
  recordsExpected: number;
  recordsInserted: number;
  status: IngestionStatus;
  errorMessage: string | null;
  startedAt: Date;
  endedAt: Date | null;
}

/** Outcome of one file's trip through the pipeline. */
export interface IngestionResult {
  file: DetectedFile;
  status: IngestionStatus;
  rowsProcessed: number;
  rowsInserted: number;
  errorMessage: string | null;
  elapsedMs: number;
}

/** Totals over one run, as printed by the CLI. */
export interface RunSummary {
  files: number;
  successes: number;
  errors: number;
  rowsInserted: number;
}
