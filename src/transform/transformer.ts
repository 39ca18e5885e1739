/**
 * Generic row transform: wraps each parsed row with its file metadata and
 * runs the field normalizers over it.
 */
import { DataTransformationError, errorMessage } from "../core/exceptions.js";
import type {
  DetectedFile,
  NormalizedRow,
  RawRow,
  TransformationResult,
} from "../core/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { defaultNormalizers, type FieldNormalizer } from "./normalizers.js";

export interface RowTransformerOptions {
  normalizers?: FieldNormalizer[];
  logger?: Logger;
  now?: () => Date;
}

export class RowTransformer {
  private normalizers: FieldNormalizer[];
  private log: Logger;
  private now: () => Date;

  constructor(opts: RowTransformerOptions = {}) {
    this.normalizers = opts.normalizers ?? defaultNormalizers();
    this.log = (opts.logger ?? rootLogger).child({ component: "transformer" });
    this.now = opts.now ?? (() => new Date());
  }

  /** A row that fails is dropped and reported; the others carry on. */
  transform(rows: RawRow[], file: DetectedFile): TransformationResult {
    const normalized: NormalizedRow[] = [];
    const errors: string[] = [];

    for (const row of rows) {
      try {
        normalized.push(this.transformRow(row, file));
      } catch (err) {
        const failure = new DataTransformationError(
          errorMessage(err),
          row.lineNumber,
        );
        errors.push(failure.message);
        this.log.warn(
          { file: file.name, line: row.lineNumber, err: failure.message },
          "Row transform failed",
        );
      }
    }

    const originalCount = rows.length;
    const transformedCount = normalized.length;
    const successRate =
      originalCount > 0 ? (transformedCount / originalCount) * 100 : 0;

    this.log.info(
      {
        file: file.name,
        transformedCount,
        originalCount,
        successRate: Number(successRate.toFixed(1)),
      },
      "Transform complete",
    );

    return {
      rows: normalized,
      originalCount,
      transformedCount,
      errors,
      successRate,
    };
  }

  private transformRow(row: RawRow, file: DetectedFile): NormalizedRow {
    const fields: Record<string, unknown> = { ...row.fields };
    for (const normalizer of this.normalizers) {
      normalizer.normalize(fields, row);
    }
    return {
      sourceFile: file.name,
      fileType: file.fileType,
      fileDate: file.fileDate,
      module: file.module,
      category: file.category,
      ingestionTimestamp: this.now(),
      lineNumber: row.lineNumber,
      fields,
    };
  }
}
