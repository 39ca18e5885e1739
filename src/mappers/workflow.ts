/**
 * WO-BACKLOG / WO-FINISH rows → workflow events.
 */
import type { DetectedFile, NormalizedRow, WorkflowEvent } from "../core/types.js";
import { commonEventFields } from "./columns.js";
import type { RowMapper } from "./registry.js";

const STATUS_BY_FILE_TYPE: Record<string, string> = {
  "WO-BACKLOG": "BACKLOG",
  "WO-FINISH": "FINISH",
};

export function workflowStatus(fileType: string): string {
  return STATUS_BY_FILE_TYPE[fileType] ?? fileType;
}

export class WorkflowEventMapper implements RowMapper {
  map(row: NormalizedRow, file: DetectedFile): WorkflowEvent {
    return {
      kind: "workflow",
      ...commonEventFields(row),
      status: workflowStatus(file.fileType),
    };
  }
}
