import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { CURRENCY_CODES, isCurrencyCode } from "@menu-refinery/shared";
import { StructuralError } from "../../src/menu-cleaning/errors";
import {
  buildCurrencyTable,
  buildVenueTable,
  defaultMappingTables,
  loadMappingTablesFromDir,
} from "../../src/menu-cleaning/mapping-tables";

function structuralCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof StructuralError) return error.code;
    throw error;
  }
  return null;
}

describe("default mapping tables", () => {
  const tables = defaultMappingTables();

  it("maps venue abbreviations to categories", () => {
    expect(tables.venue.get("COM")).toEqual({ found: true, value: "COMMERCIAL" });
    expect(tables.venue.get("GOV'T")).toEqual({ found: true, value: "GOVERNMENT" });
    expect(tables.venue.get("NULL")).toEqual({ found: true, value: null });
    expect(tables.venue.get("XYZ")).toEqual({ found: false });
  });

  it("maps symbols and the codes themselves", () => {
    expect(tables.currency.get("Fr")).toEqual({ found: true, value: "FRF" });
    expect(tables.currency.get("S/.")).toEqual({ found: true, value: "PEN" });
    expect(tables.currency.get("FRF")).toEqual({ found: true, value: "FRF" });
    expect(tables.currency.get("Rs")).toEqual({ found: false });
  });

  it("adds an identity entry for every currency code", () => {
    for (const code of CURRENCY_CODES) {
      expect(tables.currency.get(code)).toEqual({ found: true, value: code });
    }
    expect(tables.currency.size).toBe(32 + CURRENCY_CODES.length);
  });

  it("only targets codes of the closed set", () => {
    const targets = tables.currency.entries().map((entry) => entry.standard_value);
    expect(targets.every((value) => isCurrencyCode(value))).toBe(true);
  });
});

describe("table validation", () => {
  it("rejects duplicate raw values", () => {
    const data = [
      { raw_value: "COM", standard_value: "COMMERCIAL" },
      { raw_value: "COM", standard_value: "SOCIAL" },
    ];
    expect(structuralCode(() => buildVenueTable(data))).toBe("MAPPING_TABLE_INVALID");
  });

  it("rejects targets outside the closed set", () => {
    const data = [{ raw_value: "HOTEL", standard_value: "HOSPITALITY" }];
    expect(structuralCode(() => buildVenueTable(data))).toBe("MAPPING_TABLE_INVALID");
    expect(structuralCode(() => buildCurrencyTable([{ raw_value: "Rs", standard_value: "INR" }]))).toBe(
      "MAPPING_TABLE_INVALID",
    );
  });

  it("rejects data that is not a list of entries", () => {
    expect(structuralCode(() => buildVenueTable({}))).toBe("MAPPING_TABLE_INVALID");
    expect(structuralCode(() => buildVenueTable([{ raw_value: "", standard_value: "SOCIAL" }]))).toBe(
      "MAPPING_TABLE_INVALID",
    );
  });

  it("lets a table override a code's identity entry", () => {
    const table = buildCurrencyTable([{ raw_value: "EUR", standard_value: "DEM" }]);
    expect(table.get("EUR")).toEqual({ found: true, value: "DEM" });
    expect(table.size).toBe(CURRENCY_CODES.length);
  });
});

describe("loadMappingTablesFromDir", () => {
  const dirs: string[] = [];
  const tempDir = () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "menu-tables-"));
    dirs.push(dir);
    return dir;
  };

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads both tables from a directory", () => {
    const dir = tempDir();
    fs.writeFileSync(
      path.join(dir, "venue-mapping.json"),
      JSON.stringify([{ raw_value: "CLUB", standard_value: "SOCIAL" }]),
    );
    fs.writeFileSync(
      path.join(dir, "currency-symbols.json"),
      JSON.stringify([{ raw_value: "Rs", standard_value: null }]),
    );

    const tables = loadMappingTablesFromDir(dir);
    expect(tables.venue.get("CLUB")).toEqual({ found: true, value: "SOCIAL" });
    expect(tables.venue.get("COM")).toEqual({ found: false });
    expect(tables.currency.get("Rs")).toEqual({ found: true, value: null });
  });

  it("fails on a missing table file", () => {
    expect(structuralCode(() => loadMappingTablesFromDir(tempDir()))).toBe("MAPPING_TABLE_MISSING");
  });

  it("fails on a table file that is not JSON", () => {
    const dir = tempDir();
    fs.writeFileSync(path.join(dir, "venue-mapping.json"), "{ not json");
    expect(structuralCode(() => loadMappingTablesFromDir(dir))).toBe("MAPPING_TABLE_INVALID");
  });
});
