import {
  type CleanedRecord,
  type JsonObject,
  type JsonValue,
  type Outcome,
  ok,
  skip,
} from "../types.js";

export const TIMESTAMP_FIELDS = [
  "timestamp",
  "created_at",
  "updated_at",
  "datetime",
  "date",
] as const;

const HAS_OFFSET = /(?:[zZ]|[+-]\d{2}(?::?\d{2})?)$/;

export interface NormalizedRecord {
  record: CleanedRecord;
  warnings: string[];
}

export type TimestampOutcome =
  | { changed: false; warning?: string }
  | { changed: true; value: string };

/** Epoch seconds → `YYYY-MM-DDTHH:mm:ssZ`, keeping milliseconds only when present. */
export function epochSecondsToIso(seconds: number): string {
  const iso = new Date(seconds * 1000).toISOString();
  return Number.isInteger(seconds) ? iso.replace(/\.000Z$/, "Z") : iso;
}

export function normalizeTimestamp(
  field: string,
  value: JsonValue
): TimestampOutcome {
  if (typeof value === "string") {
    if (!value.includes("T") || HAS_OFFSET.test(value)) {
      return { changed: false };
    }
    // Naive date-times are UTC.
    const candidate = `${value}Z`;
    if (Number.isNaN(Date.parse(candidate))) {
      return {
        changed: false,
        warning: `Could not parse timestamp field '${field}': ${value}`,
      };
    }
    return { changed: true, value: candidate };
  }

  if (typeof value === "number") {
    try {
      return { changed: true, value: epochSecondsToIso(value) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      return {
        changed: false,
        warning: `Could not parse timestamp field '${field}': ${reason}`,
      };
    }
  }

  return { changed: false };
}

/**
 * Drops null and empty-string fields and canonicalizes the known
 * timestamp fields. Timestamp problems become warnings, never drops.
 */
export function normalizeRecord(row: JsonObject): Outcome<NormalizedRecord> {
  const record: CleanedRecord = Object.fromEntries(
    Object.entries(row).filter(([, value]) => value !== null && value !== "")
  );

  if (Object.keys(record).length === 0) {
    return skip("empty: no fields left after removing nulls");
  }

  const warnings: string[] = [];
  for (const field of TIMESTAMP_FIELDS) {
    if (!(field in record)) continue;
    const outcome = normalizeTimestamp(field, record[field]);
    if (outcome.changed) record[field] = outcome.value;
    else if (outcome.warning) warnings.push(outcome.warning);
  }

  return ok({ record, warnings });
}
