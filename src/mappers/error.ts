/**
 * QC-ERROR / PERSO-ERROR / SUP-ERROR rows → error events.
 */
import type { DetectedFile, ErrorEvent, NormalizedRow } from "../core/types.js";
import {
  COLUMN_CANDIDATES,
  commonEventFields,
  parseComment,
  resolveColumn,
} from "./columns.js";
import type { RowMapper } from "./registry.js";

const CATEGORY_BY_FILE_TYPE: Record<string, string> = {
  "QC-ERROR": "QC_ERROR",
  "PERSO-ERROR": "PERSO_ERROR",
  "SUP-ERROR": "SUP_ERROR",
};

export function errorCategory(fileType: string): string {
  return CATEGORY_BY_FILE_TYPE[fileType] ?? fileType;
}

export class ErrorEventMapper implements RowMapper {
  map(row: NormalizedRow, file: DetectedFile): ErrorEvent {
    const { fields } = row;
    return {
      kind: "error",
      ...commonEventFields(row),
      serviceName: resolveColumn(fields, COLUMN_CANDIDATES.serviceName, ""),
      errorCategory: errorCategory(file.fileType),
      comment: parseComment(
        resolveColumn(fields, COLUMN_CANDIDATES.comment, null),
      ),
    };
  }
}
