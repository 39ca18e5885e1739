/**
 * Field normalizers applied by the row transformer.
 */
import { DateTime } from "luxon";
import type { NormalizedFields, RawRow } from "../core/types.js";

/**
 * Rewrites entries of `fields` in place. `row` holds the values as parsed,
 * so normalizers never see each other's output.
 */
export interface FieldNormalizer {
  normalize(fields: NormalizedFields, row: RawRow): void;
}

const DATE_NAME_HINTS = ["date", "timestamp", "time", "created", "updated"];
const JSON_NAME_HINTS = ["json", "data", "payload", "metadata"];

/** Tried in order; the first format that parses wins. */
export const DATE_FORMATS = [
  "yyyy-MM-dd",
  "yyyy-MM-dd HH:mm:ss",
  "dd/MM/yyyy",
  "dd/MM/yyyy HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss",
  "yyyy-MM-dd'T'HH:mm:ss.u",
  "yyyy/MM/dd",
  "dd-MM-yyyy",
] as const;

function nameHas(name: string, hints: string[]): boolean {
  const lower = name.toLowerCase();
  return hints.some((hint) => lower.includes(hint));
}

const FRACTION = /\.(\d+)$/;

/** Microsecond digits of a trailing fraction, or "" when it is zero or absent. */
function fractionSuffix(text: string): string {
  const digits = FRACTION.exec(text)?.[1];
  if (!digits || /^0+$/.test(digits)) return "";
  return "." + digits.slice(0, 6).padEnd(6, "0");
}

/**
 * Wall-clock ISO text (no offset), or null when no format matches.
 * Luxon keeps milliseconds only, so the fraction is copied from the input.
 */
export function parseDate(value: string): string | null {
  const text = value.trim();
  for (const format of DATE_FORMATS) {
    const parsed = DateTime.fromFormat(text, format, { zone: "utc" });
    if (parsed.isValid) {
      const fraction = format.endsWith(".u") ? fractionSuffix(text) : "";
      return parsed.toFormat("yyyy-MM-dd'T'HH:mm:ss") + fraction;
    }
  }
  return null;
}

export class DateFieldNormalizer implements FieldNormalizer {
  normalize(fields: NormalizedFields, row: RawRow): void {
    for (const [name, value] of Object.entries(row.fields)) {
      if (!value || !nameHas(name, DATE_NAME_HINTS)) continue;
      const iso = parseDate(value);
      if (iso !== null) fields[name] = iso;
    }
  }
}

export class JsonFieldNormalizer implements FieldNormalizer {
  normalize(fields: NormalizedFields, row: RawRow): void {
    for (const [name, value] of Object.entries(row.fields)) {
      if (!value || !nameHas(name, JSON_NAME_HINTS)) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(value);
      } catch {
        continue; // not JSON, keep the text
      }
      fields[name] = parsed;
      fields[`${name}_parsed`] = parsed;
    }
  }
}

export function defaultNormalizers(): FieldNormalizer[] {
  return [new DateFieldNormalizer(), new JsonFieldNormalizer()];
}
