/**
 * Error taxonomy for ingestion runs.
 *
 * Only `FileDetectionError` (and `ConfigurationError`, before a run starts)
 * escape to callers of `run()`; everything else is turned into a per-file
 * `IngestionResult` with status "error".
 */

export class IngestError extends Error {
  context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "IngestError";
    this.context = context;
  }
}

export class FileDetectionError extends IngestError {
  constructor(message: string, directory?: string) {
    super(message, { directory });
    this.name = "FileDetectionError";
  }
}

export class FileValidationError extends IngestError {
  filePath: string | undefined;

  constructor(message: string, filePath?: string) {
    super(message, { filePath });
    this.name = "FileValidationError";
    this.filePath = filePath;
  }
}

export class SchemaValidationError extends IngestError {
  constructor(message: string, fileType?: string) {
    super(message ? `Invalid schema: ${message}` : "Invalid schema", {
      fileType,
    });
    this.name = "SchemaValidationError";
  }
}

/** Describes a single row that could not be normalized. Collected, not thrown out of a file. */
export class DataTransformationError extends IngestError {
  lineNumber: number;

  constructor(message: string, lineNumber: number) {
    super(`line ${lineNumber}: ${message}`, { lineNumber });
    this.name = "DataTransformationError";
    this.lineNumber = lineNumber;
  }
}

export class DatabaseError extends IngestError {
  operation: string;

  constructor(message: string, operation: string) {
    super(message, { operation });
    this.name = "DatabaseError";
    this.operation = operation;
  }
}

export class ArchiveError extends IngestError {
  filePath: string;

  constructor(message: string, filePath: string) {
    super(message, { filePath });
    this.name = "ArchiveError";
    this.filePath = filePath;
  }
}

export class ConfigurationError extends IngestError {
  keys: string[];

  constructor(message: string, keys: string[] = []) {
    super(message, { keys });
    this.name = "ConfigurationError";
    this.keys = keys;
  }
}

/** Message text for anything caught in a `catch` clause. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
