import type { CleaningConfig } from "../config";
import type { RawMenuRecord, RawValue } from "../types";

// Reads a column, falling back to its configured alias when the column is absent.
export function readColumn(record: RawMenuRecord, column: string, cfg: CleaningConfig): RawValue {
  if (column in record) return record[column] ?? null;
  const alias = cfg.sourceAliases[column];
  if (alias && alias in record) return record[alias] ?? null;
  return null;
}

export function toText(value: RawValue | undefined): string | null {
  if (value == null) return null;
  if (typeof value === "string") return value;
  return String(value);
}

export function toInt(value: RawValue | undefined): number | null {
  if (value == null || typeof value === "boolean") return null;
  if (typeof value === "number") return Number.isInteger(value) ? value : null;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(n) ? n : null;
}

export function readText(record: RawMenuRecord, column: string, cfg: CleaningConfig): string | null {
  return toText(readColumn(record, column, cfg));
}

// Keeps scalar cells; nested values (JSON columns) are read as their JSON text.
export function asRawRecord(row: unknown): RawMenuRecord | null {
  if (typeof row !== "object" || row === null || Array.isArray(row)) return null;
  const record: RawMenuRecord = {};
  for (const [key, value] of Object.entries(row)) {
    record[key] = toRawValue(value);
  }
  return record;
}

function toRawValue(value: unknown): RawValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return JSON.stringify(value) ?? null;
}
