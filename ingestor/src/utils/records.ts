import type { RawRecord } from "../modules/ingest/types/mention.js";

const SECONDS_CUTOFF = 1e12;

export const TIMESTAMP_FIELDS = [
  "timestamp",
  "created_at",
  "createdAt",
  "publishedAt",
  "published_at",
  "pubDate",
  "published",
  "updated",
  "date",
] as const;

export function isRecord(value: unknown): value is RawRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Reads a scalar text value. XML feeds parsed with attributes enabled wrap
 * text nodes as `{ "#text": ... }`.
 */
export function readText(value: unknown): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  if (isRecord(value)) return readText(value["#text"]);
  return null;
}

export function firstText(record: RawRecord, fields: readonly string[]): string | null {
  for (const field of fields) {
    const text = readText(record[field]);
    if (text !== null && text.trim().length > 0) {
      return text;
    }
  }
  return null;
}

export function parseTimestamp(value: unknown): number | null {
  if (value instanceof Date) {
    const time = value.getTime();
    return Number.isNaN(time) ? null : time;
  }

  if (typeof value === "number") {
    if (!Number.isFinite(value) || value <= 0) return null;
    return value < SECONDS_CUTOFF ? value * 1000 : value;
  }

  const text = readText(value)?.trim();
  if (!text) return null;

  if (/^\d+(\.\d+)?$/.test(text)) {
    return parseTimestamp(Number(text));
  }

  const parsed = Date.parse(text);
  return Number.isNaN(parsed) ? null : parsed;
}

export function extractTimestamp(record: RawRecord): number | null {
  for (const field of TIMESTAMP_FIELDS) {
    const parsed = parseTimestamp(record[field]);
    if (parsed !== null) return parsed;
  }
  return null;
}

/** Keeps records without a readable timestamp; the normalizer stamps them with the fetch time. */
export function keepSince(records: RawRecord[], since: Date): RawRecord[] {
  const cutoff = since.getTime();
  return records.filter((record) => {
    const timestamp = extractTimestamp(record);
    return timestamp === null || timestamp >= cutoff;
  });
}

export function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}
