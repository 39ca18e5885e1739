/**
 * Persistence gateway – writes mapped events and the per-file audit trail.
 *
 * One transaction per event batch and a separate one per audit upsert.
 * A failed audit upsert does not undo a batch that already committed.
 */
import { randomUUID } from "node:crypto";
import { DatabaseError, errorMessage } from "../core/exceptions.js";
import type {
  AuditLogEntry,
  Category,
  DetectedFile,
  ErrorEvent,
  IngestionStatus,
  MappedRecord,
  WorkflowEvent,
} from "../core/types.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { DatabaseBackend, SqlParam } from "./backend.js";

export type EventTable = "workflow_events" | "error_events";

export interface AuditUpsert {
  file: DetectedFile;
  status: IngestionStatus;
  recordsExpected: number;
  recordsInserted: number;
  errorMessage?: string | null;
  /** Used only when the entry is created. Defaults to now. */
  startedAt?: Date;
}

export type StoredWorkflowEvent = WorkflowEvent & { id: string };
export type StoredErrorEvent = ErrorEvent & { id: string };

interface WorkflowEventRow {
  id: string;
  event_timestamp: string;
  document_type: string;
  destination_code: string;
  request_id: string;
  status: string;
  file_name: string;
  ingested_at: string;
}

interface ErrorEventRow {
  id: string;
  event_timestamp: string;
  document_type: string;
  destination_code: string;
  request_id: string;
  service_name: string;
  error_category: string;
  comment: string | null;
  file_name: string;
  ingested_at: string;
}

interface AuditLogRow {
  id: string;
  file_name: string;
  file_type: string;
  file_date: string;
  records_expected: number;
  records_inserted: number;
  status: IngestionStatus;
  error_message: string | null;
  started_at: string;
  ended_at: string | null;
}

/** Unknown categories land in the workflow table. */
export function tableFor(category: Category): EventTable {
  return category === "error" ? "error_events" : "workflow_events";
}

/** Generic rows written to the workflow table keep their file type as status. */
function asWorkflowEvent(record: MappedRecord): WorkflowEvent {
  switch (record.kind) {
    case "workflow":
      return record;
    case "unknown": {
      const { row } = record;
      return {
        kind: "workflow",
        eventTimestamp: row.ingestionTimestamp,
        documentType: "",
        destinationCode: "",
        requestId: "",
        status: row.fileType,
        fileName: row.sourceFile,
        ingestedAt: row.ingestionTimestamp,
      };
    }
    case "error":
      throw new Error(
        `error event for ${record.fileName} cannot be written to workflow_events`,
      );
  }
}

function asErrorEvent(record: MappedRecord): ErrorEvent {
  if (record.kind !== "error") {
    throw new Error(`${record.kind} record cannot be written to error_events`);
  }
  return record;
}

export class PersistenceGateway {
  private db: DatabaseBackend;
  private log: Logger;

  constructor(db: DatabaseBackend, logger: Logger = rootLogger) {
    this.db = db;
    this.log = logger.child({ component: "persistence" });
  }

  /** All-or-nothing insert of one file's batch. Returns the row count. */
  async insertEvents(
    records: MappedRecord[],
    category: Category,
  ): Promise<number> {
    if (records.length === 0) return 0;

    const table = tableFor(category);
    if (category === "unknown") {
      this.log.warn({ table }, "Unknown category, writing to workflow_events");
    }

    try {
      const inserted = await this.db.transaction(async () => {
        for (const record of records) {
          if (table === "error_events") {
            await this.insertErrorEvent(asErrorEvent(record));
          } else {
            await this.insertWorkflowEvent(asWorkflowEvent(record));
          }
        }
        return records.length;
      });
      this.log.info({ table, count: inserted }, "Events inserted");
      return inserted;
    } catch (err) {
      const message = `Failed to insert into ${table}: ${errorMessage(err)}`;
      this.log.error(
        { table, err: errorMessage(err) },
        "Event insert rolled back",
      );
      throw new DatabaseError(message, "insert_events");
    }
  }

  /**
   * Create or refresh the single audit entry for `file.name`. An existing
   * entry keeps its `started_at`.
   */
  async upsertAuditLog(entry: AuditUpsert): Promise<string> {
    const { file } = entry;
    const now = new Date().toISOString();
    const errorText = entry.errorMessage ?? null;

    try {
      const { id, created } = await this.db.transaction(async () => {
        const existing = await this.db.queryOne<{ id: string }>(
          "SELECT id FROM ingestion_audit_log WHERE file_name = ?",
          [file.name],
        );

        if (existing) {
          await this.db.execute(
            `UPDATE ingestion_audit_log
             SET file_type = ?, file_date = ?, records_expected = ?, records_inserted = ?,
                 status = ?, error_message = ?, ended_at = ?
             WHERE id = ?`,
            [
              file.fileType,
              file.fileDate,
              entry.recordsExpected,
              entry.recordsInserted,
              entry.status,
              errorText,
              now,
              existing.id,
            ],
          );
          return { id: existing.id, created: false };
        }

        const newId = randomUUID();
        await this.db.execute(
          `INSERT INTO ingestion_audit_log
             (id, file_name, file_type, file_date, records_expected, records_inserted,
              status, error_message, started_at, ended_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
          [
            newId,
            file.name,
            file.fileType,
            file.fileDate,
            entry.recordsExpected,
            entry.recordsInserted,
            entry.status,
            errorText,
            (entry.startedAt ?? new Date()).toISOString(),
            now,
          ],
        );
        return { id: newId, created: true };
      });

      this.log.info(
        { file: file.name, id, created, status: entry.status },
        created ? "Audit log created" : "Audit log updated",
      );
      return id;
    } catch (err) {
      throw new DatabaseError(
        `Failed to upsert audit log for ${file.name}: ${errorMessage(err)}`,
        "upsert_audit_log",
      );
    }
  }

  // ------------------------------------------------------------------
  // Read side
  // ------------------------------------------------------------------

  async getWorkflowEvents(
    limit = 100,
    offset = 0,
  ): Promise<StoredWorkflowEvent[]> {
    const rows = await this.db.query<WorkflowEventRow>(
      "SELECT * FROM workflow_events ORDER BY ingested_at DESC, id LIMIT ? OFFSET ?",
      [limit, offset],
    );
    return rows.map((row): StoredWorkflowEvent => ({
      id: row.id,
      kind: "workflow",
      eventTimestamp: new Date(row.event_timestamp),
      documentType: row.document_type,
      destinationCode: row.destination_code,
      requestId: row.request_id,
      status: row.status,
      fileName: row.file_name,
      ingestedAt: new Date(row.ingested_at),
    }));
  }

  async getErrorEvents(limit = 100, offset = 0): Promise<StoredErrorEvent[]> {
    const rows = await this.db.query<ErrorEventRow>(
      "SELECT * FROM error_events ORDER BY ingested_at DESC, id LIMIT ? OFFSET ?",
      [limit, offset],
    );
    return rows.map((row): StoredErrorEvent => ({
      id: row.id,
      kind: "error",
      eventTimestamp: new Date(row.event_timestamp),
      documentType: row.document_type,
      destinationCode: row.destination_code,
      requestId: row.request_id,
      serviceName: row.service_name,
      errorCategory: row.error_category,
      comment: row.comment,
      fileName: row.file_name,
      ingestedAt: new Date(row.ingested_at),
    }));
  }

  async getAuditLog(fileName: string): Promise<AuditLogEntry | null> {
    const row = await this.db.queryOne<AuditLogRow>(
      "SELECT * FROM ingestion_audit_log WHERE file_name = ?",
      [fileName],
    );
    return row ? toAuditLogEntry(row) : null;
  }

  async listAuditLogs(limit = 100, offset = 0): Promise<AuditLogEntry[]> {
    const rows = await this.db.query<AuditLogRow>(
      "SELECT * FROM ingestion_audit_log ORDER BY started_at DESC, id LIMIT ? OFFSET ?",
      [limit, offset],
    );
    return rows.map(toAuditLogEntry);
  }

  private async insertWorkflowEvent(event: WorkflowEvent): Promise<void> {
    const params: SqlParam[] = [
      randomUUID(),
      event.eventTimestamp.toISOString(),
      event.documentType,
      event.destinationCode,
      event.requestId,
      event.status,
      event.fileName,
      event.ingestedAt.toISOString(),
    ];
    await this.db.execute(
      `INSERT INTO workflow_events
         (id, event_timestamp, document_type, destination_code, request_id, status, file_name, ingested_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      params,
    );
  }

  private async insertErrorEvent(event: ErrorEvent): Promise<void> {
    const params: SqlParam[] = [
      randomUUID(),
      event.eventTimestamp.toISOString(),
      event.documentType,
      event.destinationCode,
      event.requestId,
      event.serviceName,
      event.errorCategory,
      event.comment,
      event.fileName,
      event.ingestedAt.toISOString(),
    ];
    await this.db.execute(
      `INSERT INTO error_events
         (id, event_timestamp, document_type, destination_code, request_id, service_name,
          error_category, comment, file_name, ingested_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      params,
    );
  }
}

function toAuditLogEntry(row: AuditLogRow): AuditLogEntry {
  return {
    id: row.id,
    fileName: row.file_name,
    fileType: row.file_type,
    fileDate: row.file_date,
    recordsExpected: Number(row.records_expected),
    recordsInserted: Number(row.records_inserted),
    status: row.status,
    errorMessage: row.error_message,
    startedAt: new Date(row.started_at),
    endedAt: row.ended_at ? new Date(row.ended_at) : null,
  };
}
