import fs from "node:fs";
import path from "node:path";
import { CURRENCY_CODES, isCurrencyCode, isVenueCategory } from "@menu-refinery/shared";
import currencySymbolData from "../../data/currency-symbols.json";
import venueMappingData from "../../data/venue-mapping.json";
import { StructuralError } from "./errors";
import type {
  CurrencyCode,
  MappingEntry,
  MappingTable,
  MappingTables,
  VenueCategory,
} from "./types";

export const VENUE_TABLE_FILE = "venue-mapping.json";
export const CURRENCY_TABLE_FILE = "currency-symbols.json";

class ReadonlyMappingTable<T extends string> implements MappingTable<T> {
  private readonly map: ReadonlyMap<string, T | null>;
  private readonly ordered: readonly MappingEntry<T>[];

  constructor(readonly name: string, entries: MappingEntry<T>[]) {
    this.ordered = entries.map((entry) => ({ ...entry }));
    this.map = new Map(entries.map((entry) => [entry.raw_value, entry.standard_value]));
  }

  get size(): number {
    return this.map.size;
  }

  has(raw: string): boolean {
    return this.map.has(raw);
  }

  get(raw: string): { found: true; value: T | null } | { found: false } {
    if (!this.map.has(raw)) return { found: false };
    return { found: true, value: this.map.get(raw) ?? null };
  }

  entries(): MappingEntry<T>[] {
    return this.ordered.map((entry) => ({ ...entry }));
  }
}

/**
 * Validates raw JSON data and freezes it into a lookup table. Duplicate raw
 * values and targets outside the closed set are structural errors.
 */
export function buildMappingTable<T extends string>(
  name: string,
  data: unknown,
  isTarget: (value: unknown) => value is T
): MappingTable<T> {
  if (!Array.isArray(data)) {
    throw new StructuralError("MAPPING_TABLE_INVALID", `${name}: expected an array of entries`);
  }

  const seen = new Set<string>();
  const entries: MappingEntry<T>[] = [];

  data.forEach((item: unknown, index: number) => {
    if (!isPlainObject(item)) {
      throw new StructuralError("MAPPING_TABLE_INVALID", `${name}[${index}]: not an object`);
    }
    const raw = item.raw_value;
    const target = item.standard_value ?? null;
    if (typeof raw !== "string" || raw === "") {
      throw new StructuralError("MAPPING_TABLE_INVALID", `${name}[${index}]: raw_value must be a non-empty string`);
    }
    if (seen.has(raw)) {
      throw new StructuralError("MAPPING_TABLE_INVALID", `${name}: duplicate raw_value "${raw}"`);
    }
    if (target !== null && !isTarget(target)) {
      throw new StructuralError(
        "MAPPING_TABLE_INVALID",
        `${name}: "${raw}" maps to unknown value "${String(target)}"`
      );
    }
    seen.add(raw);
    entries.push({ raw_value: raw, standard_value: target });
  });

  return new ReadonlyMappingTable(name, entries);
}

export function buildVenueTable(data: unknown): MappingTable<VenueCategory> {
  return buildMappingTable("venue", data, isVenueCategory);
}

// ISO codes map to themselves unless the data says otherwise.
export function buildCurrencyTable(data: unknown): MappingTable<CurrencyCode> {
  const base = buildMappingTable("currency", data, isCurrencyCode);
  const entries = base.entries();
  for (const code of CURRENCY_CODES) {
    if (!base.has(code)) entries.push({ raw_value: code, standard_value: code });
  }
  return new ReadonlyMappingTable("currency", entries);
}

export function defaultMappingTables(): MappingTables {
  return {
    venue: buildVenueTable(venueMappingData),
    currency: buildCurrencyTable(currencySymbolData),
  };
}

export function loadMappingTablesFromDir(dir: string): MappingTables {
  return {
    venue: buildVenueTable(readTableFile(path.join(dir, VENUE_TABLE_FILE))),
    currency: buildCurrencyTable(readTableFile(path.join(dir, CURRENCY_TABLE_FILE))),
  };
}

function readTableFile(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new StructuralError("MAPPING_TABLE_MISSING", filePath);
  }
  const raw = fs.readFileSync(filePath, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new StructuralError("MAPPING_TABLE_INVALID", `${path.basename(filePath)}: ${message}`);
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
