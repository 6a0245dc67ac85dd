/**
 * Narrowing helpers for upstream JSON payloads.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** First element of `record[key]` when it is a non-empty array of objects */
export function firstRecord(record: JsonRecord, key: string): JsonRecord | undefined {
  const list = record[key];
  if (!Array.isArray(list) || list.length === 0) return undefined;
  const first: unknown = list[0];
  return isRecord(first) ? first : undefined;
}

/** Records in `record[key]`, skipping non-object entries */
export function recordList(record: JsonRecord, key: string): JsonRecord[] {
  const list = record[key];
  if (!Array.isArray(list)) return [];
  return list.filter(isRecord);
}

/** Finite number, or a numeric string, else undefined */
export function numberField(record: JsonRecord, key: string): number | undefined {
  const value = record[key];
  if (typeof value === "number") return Number.isFinite(value) ? value : undefined;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Non-empty string, else undefined */
export function stringField(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}
