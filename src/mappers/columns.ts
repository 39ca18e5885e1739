/**
 * Header-name resolution and value helpers shared by the row mappers.
 */
import { DateTime } from "luxon";
import type { NormalizedFields, NormalizedRow } from "../core/types.js";

const BOM = "\uFEFF";

/** Accepted header spellings for each logical field, in priority order. */
export const COLUMN_CANDIDATES = {
  timestamp: ["Timestamp", "timestamp", "TIMESTAMP"],
  documentType: ["Type de document", "type_de_document", "Document Type"],
  destinationCode: [
    "Code de destination",
    "code_de_destination",
    "Destination Code",
  ],
  requestId: ["Request ID", "request_id", "RequestID", "requestId"],
  serviceName: ["Service", "service", "service_name", "SERVICE"],
  comment: ["infos_comment", "comment", "Comment"],
} as const satisfies Record<string, readonly string[]>;

export function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value !== null && typeof value === "object") return JSON.stringify(value);
  return String(value);
}

/**
 * First non-blank value among `candidates`, each also tried with a BOM
 * prefix. Values come back trimmed.
 */
export function resolveColumn<T>(
  fields: NormalizedFields,
  candidates: readonly string[],
  fallback: T,
): string | T {
  for (const name of candidates) {
    for (const key of [name, `${BOM}${name}`]) {
      if (!Object.hasOwn(fields, key)) continue;
      const value = fields[key];
      if (value === null || value === undefined) continue;
      const text = asText(value).trim();
      if (text !== "") return text;
    }
  }
  return fallback;
}

/** ISO parse with `YYYY-MM-DD HH:MM:SS` accepted; naive values are UTC. */
export function parseEventTimestamp(value: string): Date | null {
  const parsed = DateTime.fromISO(value.trim().replace(" ", "T"), {
    zone: "utc",
  });
  return parsed.isValid ? parsed.toJSDate() : null;
}

/**
 * `infos_comment` is sometimes a JSON envelope such as `{"raw": "..."}`.
 * Objects yield their `raw` key, other JSON its text form, plain text as is.
 */
export function parseComment(value: string | null): string | null {
  if (!value) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch {
    return value;
  }

  if (parsed !== null && typeof parsed === "object" && !Array.isArray(parsed)) {
    const raw = "raw" in parsed ? parsed.raw : undefined;
    return raw ? asText(raw) : JSON.stringify(parsed);
  }
  return asText(parsed);
}

export interface CommonEventFields {
  eventTimestamp: Date;
  documentType: string;
  destinationCode: string;
  requestId: string;
  fileName: string;
  ingestedAt: Date;
}

/** Columns shared by workflow and error events. */
export function commonEventFields(row: NormalizedRow): CommonEventFields {
  const { fields } = row;
  const timestamp = resolveColumn(fields, COLUMN_CANDIDATES.timestamp, null);
  const eventTimestamp =
    (timestamp !== null ? parseEventTimestamp(timestamp) : null) ??
    row.ingestionTimestamp;

  return {
    eventTimestamp,
    documentType: resolveColumn(fields, COLUMN_CANDIDATES.documentType, ""),
    destinationCode: resolveColumn(
      fields,
      COLUMN_CANDIDATES.destinationCode,
      "",
    ),
    requestId: resolveColumn(fields, COLUMN_CANDIDATES.requestId, ""),
    fileName: row.sourceFile,
    ingestedAt: row.ingestionTimestamp,
  };
}
