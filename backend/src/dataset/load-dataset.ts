import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import { asRawRecord } from "../menu-cleaning/columns";
import type { RawMenuRecord } from "../menu-cleaning";

export function loadDataset(datasetPath: string): RawMenuRecord[] {
  const label = path.basename(datasetPath);
  const ext = path.extname(datasetPath).toLowerCase();
  if (ext !== ".csv" && ext !== ".json") {
    throw new Error(`Unsupported dataset format: ${label}`);
  }

  const raw = fs.readFileSync(datasetPath, "utf8");
  return ext === ".csv" ? parseCsvDataset(raw, label) : parseJsonDataset(raw, label);
}

// Empty cells become null; every other cell stays text, the engine decides types.
export function parseCsvDataset(csv: string, label = "dataset.csv"): RawMenuRecord[] {
  const parsed = Papa.parse<Record<string, string>>(csv, {
    header: true,
    skipEmptyLines: true,
    dynamicTyping: false,
  });

  const fatal = parsed.errors.find((error) => error.type !== "FieldMismatch");
  if (fatal) {
    throw new Error(`Invalid dataset: ${label} (row ${fatal.row ?? "?"}: ${fatal.message})`);
  }

  return parsed.data.map((row) => {
    const record: RawMenuRecord = {};
    for (const [key, value] of Object.entries(row)) {
      record[key] = value === "" || value === undefined ? null : value;
    }
    return record;
  });
}

export function parseJsonDataset(json: string, label = "dataset.json"): RawMenuRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid dataset: ${label} (${message})`);
  }

  const rows = Array.isArray(parsed) ? parsed : recordsOf(parsed);
  if (!rows) throw new Error(`Invalid dataset: ${label}`);

  return rows.map((row, index) => {
    const record = asRawRecord(row);
    if (!record) throw new Error(`Invalid dataset: ${label} (record #${index} is not an object)`);
    return record;
  });
}

function recordsOf(value: unknown): unknown[] | null {
  if (typeof value !== "object" || value === null || !("records" in value)) return null;
  return Array.isArray(value.records) ? value.records : null;
}
