/**
 * Mapper registry – maps a file category to the mapper that shapes its rows.
 */
import type {
  Category,
  DetectedFile,
  MappedRecord,
  NormalizedRow,
} from "../core/types.js";
import { ErrorEventMapper } from "./error.js";
import { WorkflowEventMapper } from "./workflow.js";

export interface RowMapper {
  map(row: NormalizedRow, file: DetectedFile): MappedRecord;
}

/** Rows of unrecognized file types keep their generic shape. */
export class PassthroughMapper implements RowMapper {
  map(row: NormalizedRow): MappedRecord {
    return { kind: "unknown", row };
  }
}

export const MAPPER_REGISTRY: Record<Category, RowMapper> = {
  workflow: new WorkflowEventMapper(),
  error: new ErrorEventMapper(),
  unknown: new PassthroughMapper(),
};

export function mapRow(row: NormalizedRow, file: DetectedFile): MappedRecord {
  return MAPPER_REGISTRY[file.category].map(row, file);
}
