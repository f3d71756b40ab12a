import { UpstreamRecord } from "./types";

/**
 * Where the record list sat in an upstream listing payload. The listing API
 * answers with `{data: [...]}` or `{data: {list: [...]}}` depending on the
 * endpoint version, and older responses put `list` at the top level.
 */
export type RecordListShape =
  | { kind: "flat"; records: UpstreamRecord[] }
  | { kind: "nested"; records: UpstreamRecord[] }
  | { kind: "list"; records: UpstreamRecord[] }
  | { kind: "unrecognized"; records: [] };

export function isPlainObject(value: unknown): value is UpstreamRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function decodeRecordList(payload: unknown): RecordListShape {
  if (!isPlainObject(payload)) return { kind: "unrecognized", records: [] };

  const data = payload.data;
  if (Array.isArray(data)) {
    return { kind: "flat", records: data.filter(isPlainObject) };
  }
  if (isPlainObject(data) && Array.isArray(data.list)) {
    return { kind: "nested", records: data.list.filter(isPlainObject) };
  }
  if (data === undefined && Array.isArray(payload.list)) {
    return { kind: "list", records: payload.list.filter(isPlainObject) };
  }
  return { kind: "unrecognized", records: [] };
}

/** String form of a tag field; non-scalar or missing values yield undefined. */
export function tagValue(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

export function numberField(record: UpstreamRecord, key: string): number {
  const value = record[key];
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) return Number(value);
  return 0;
}

export function stringField(record: UpstreamRecord, key: string, fallback = "Unknown"): string {
  return tagValue(record[key]) ?? fallback;
}

export function stringListField(record: UpstreamRecord, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is string => typeof item === "string");
}
