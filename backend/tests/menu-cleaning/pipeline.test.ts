import { describe, expect, it } from "vitest";
import { CURRENCY_CODES, VENUE_CATEGORIES } from "@menu-refinery/shared";
import { emptyAuditReport, formatUnmappedEvents } from "../../src/menu-cleaning/audit";
import { StructuralError } from "../../src/menu-cleaning/errors";
import { clean, type CleanOptions } from "../../src/menu-cleaning/pipeline";
import type { CleanedMenuRecord, RawMenuRecord, RawValue } from "../../src/menu-cleaning/types";

const OPTIONS: CleanOptions = { cfgOverride: { runDate: "2024-06-30" } };

function rawMenu(id: RawValue, overrides: RawMenuRecord = {}): RawMenuRecord {
  return {
    id,
    name: null,
    sponsor: null,
    location: null,
    date: null,
    place: null,
    event: null,
    venue: null,
    occasion: null,
    currency: "Dollars",
    currency_symbol: "$",
    call_number: null,
    physical_description: null,
    page_count: null,
    dish_count: null,
    status: "complete",
    notes: null,
    ...overrides,
  };
}

function sampleMenus(): RawMenuRecord[] {
  return [
    rawMenu(1, {
      location: '"The Dakota"',
      venue: "COM",
      date: "1900-04-15",
      currency: null,
      currency_symbol: "Fr",
    }),
    rawMenu(2, {
      name: "[Restaurant name and/or location not given]",
      sponsor: "REPUBLICAN HOUSE",
      venue: "XYZ",
      date: "2928-01-01",
      place: "unknown",
      occasion: "25NTH ANNIVERSARY",
      call_number: "*wotm",
    }),
    rawMenu(3, {
      venue: "soc",
      date: "04/15/1900",
      event: "[Christman Dinner?]",
      place: "[New York, ny?]",
      occasion: "[st. patrick's day]",
      call_number: "1900-2268_wotm",
      page_count: "4",
    }),
    rawMenu(4, { currency_symbol: "Rs" }),
  ];
}

function structuralCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    if (error instanceof StructuralError) return error.code;
    throw error;
  }
  return null;
}

const withoutWotm = ({ is_wotm: _isWotm, ...rest }: CleanedMenuRecord) => rest;

describe("clean", () => {
  it("cleans every column of every record", () => {
    const { records } = clean(sampleMenus(), OPTIONS);

    expect(records[0]).toEqual({
      id: 1,
      name: "The Dakota",
      date: "1900-04-15",
      place: null,
      event: null,
      venue: "COMMERCIAL",
      occasion: null,
      currency: "Unknown",
      currency_code: "FRF",
      call_number_normalized: null,
      is_wotm: false,
      physical_description: null,
      page_count: null,
      dish_count: null,
      status: "complete",
      notes: null,
    });
    expect(records[1]).toMatchObject({
      id: 2,
      name: "REPUBLICAN HOUSE",
      date: null,
      place: null,
      venue: null,
      occasion: "25th Anniversary",
      currency_code: "USD",
      call_number_normalized: null,
      is_wotm: true,
    });
    expect(records[2]).toMatchObject({
      id: 3,
      name: null,
      date: "1900-04-15",
      place: "New York, NY",
      event: "CHRISTMAS DINNER",
      venue: "SOCIAL",
      occasion: "St. Patrick's Day",
      call_number_normalized: "1900-2268",
      is_wotm: true,
      page_count: 4,
    });
    expect(records[3]).toMatchObject({ id: 4, currency: "Dollars", currency_code: null });
  });

  it("keeps one record per input record, in input order", () => {
    const { records } = clean(sampleMenus(), OPTIONS);
    expect(records.map((record) => record.id)).toEqual([1, 2, 3, 4]);
  });

  it("audits fallbacks and unmapped values", () => {
    const { audit } = clean(sampleMenus(), OPTIONS);

    expect(audit.venue).toEqual({ total: 4, nulled: 2, fallback_count: 1, unmapped_values: { XYZ: 1 } });
    expect(audit.currency_code).toEqual({ total: 4, nulled: 1, fallback_count: 1, unmapped_values: { Rs: 1 } });
    expect(audit.date).toEqual({ total: 4, nulled: 2, fallback_count: 1, unmapped_values: {} });
    expect(audit.name).toEqual({ total: 4, nulled: 2, fallback_count: 1, unmapped_values: {} });
    expect(audit.currency).toEqual({ total: 4, nulled: 0, fallback_count: 1, unmapped_values: {} });
    expect(audit.place).toEqual({ total: 4, nulled: 3, fallback_count: 1, unmapped_values: {} });
    expect(audit.call_number_normalized).toEqual({ total: 4, nulled: 3, fallback_count: 1, unmapped_values: {} });
    expect(formatUnmappedEvents(audit)).toEqual([
      "unmapped venue value: XYZ (count=1)",
      "unmapped currency symbol value: Rs (count=1)",
    ]);
  });

  it("summarizes the cleaned table", () => {
    const { summary } = clean(sampleMenus(), OPTIONS);
    expect(summary).toEqual({
      totalRows: 4,
      uniqueIds: 4,
      missingNames: 2,
      missingDates: 2,
      earliestDate: "1900-04-15",
      latestDate: "1900-04-15",
    });
  });

  it("only writes venues and currency codes from the closed sets", () => {
    const { records } = clean(sampleMenus(), OPTIONS);
    const venues: ReadonlyArray<string | null> = [...VENUE_CATEGORIES, null];
    const codes: ReadonlyArray<string | null> = [...CURRENCY_CODES, null];
    for (const record of records) {
      expect(venues).toContain(record.venue);
      expect(codes).toContain(record.currency_code);
    }
  });

  it("keeps dates between the minimum date and the run date", () => {
    const { records } = clean(sampleMenus(), OPTIONS);
    for (const record of records) {
      if (record.date === null) continue;
      expect(record.date >= "1840-01-01" && record.date <= "2024-06-30").toBe(true);
    }
  });

  it("gives the same output when run on its own output", () => {
    const first = clean(sampleMenus(), OPTIONS);
    const second = clean(
      first.records.map((record) => ({ ...record })),
      OPTIONS,
    );
    expect(second.records.map(withoutWotm)).toEqual(first.records.map(withoutWotm));
  });

  it("does not modify its input", () => {
    const input = sampleMenus();
    const before = structuredClone(input);
    clean(input, OPTIONS);
    expect(input).toEqual(before);
  });

  it("never throws on odd cell types", () => {
    const odd = rawMenu(9, {
      name: 42,
      date: 19000101,
      place: true,
      event: 0,
      venue: 3.5,
      occasion: false,
      currency: 7,
      currency_symbol: 1,
      call_number: 123,
    });
    const { records } = clean([odd], OPTIONS);
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ id: 9, name: "42", date: null, venue: null, call_number_normalized: "123" });
  });

  it("counts unmapped symbols named like object properties", () => {
    const { audit } = clean(
      [rawMenu(1, { currency_symbol: "constructor" }), rawMenu(2, { currency_symbol: "__proto__" })],
      OPTIONS,
    );
    expect(Object.entries(audit.currency_code.unmapped_values)).toEqual([
      ["constructor", 1],
      ["__proto__", 1],
    ]);
  });

  it("returns an empty result for empty input", () => {
    const result = clean([], OPTIONS);
    expect(result.records).toEqual([]);
    expect(result.audit).toEqual(emptyAuditReport());
    expect(result.summary.totalRows).toBe(0);
  });

  it("gives the same result for any shard size", () => {
    const whole = clean(sampleMenus(), { ...OPTIONS, debug: true });
    const sharded = clean(sampleMenus(), {
      cfgOverride: { runDate: "2024-06-30", shardSize: 1 },
      debug: true,
    });

    expect(sharded.records).toEqual(whole.records);
    expect(sharded.audit).toEqual(whole.audit);
    expect(whole.debug).toMatchObject({ shardCount: 1, shardSize: 2000, runDate: "2024-06-30" });
    expect(sharded.debug).toMatchObject({ shardCount: 4, shardSize: 1 });
  });

  it("records the stages it passed through", () => {
    const { debug } = clean(sampleMenus(), { ...OPTIONS, debug: true });
    expect(debug?.stages.map((transition) => transition.stage)).toEqual(["load", "transform", "emit", "done"]);
    expect(clean(sampleMenus(), OPTIONS).debug).toBeUndefined();
  });
});

function structuralError(fn: () => unknown): StructuralError {
  try {
    fn();
  } catch (error) {
    if (error instanceof StructuralError) return error;
    throw error;
  }
  throw new Error("expected a StructuralError");
}

describe("structural errors", () => {
  it("keeps the date bound when the run date is malformed", () => {
    const error = structuralError(() =>
      clean([rawMenu(1, { date: "2928-01-01" })], { cfgOverride: { runDate: "tomorrow" } }),
    );
    expect(error.code).toBe("CONFIG_INVALID");
  });

  it("never drops records because of a bad shard size", () => {
    const error = structuralError(() =>
      clean([rawMenu(1), rawMenu(2)], { cfgOverride: { runDate: "2024-06-30", shardSize: Number("x") } }),
    );
    expect(error.code).toBe("CONFIG_INVALID");
  });

  it("reports the stages of a failed run on the error", () => {
    const error = structuralError(() => clean([rawMenu(1), rawMenu(1)], OPTIONS));
    expect(error.code).toBe("DUPLICATE_ID");
    expect(error.stages.map((transition) => transition.stage)).toEqual(["load", "failed"]);
  });


  it("fails when a required column is absent from every record", () => {
    const noVenue = Object.fromEntries(Object.entries(rawMenu(1)).filter(([key]) => key !== "venue"));
    expect(structuralCode(() => clean([noVenue], OPTIONS))).toBe("MISSING_COLUMN");
  });

  it("accepts a column that only some records carry", () => {
    const noVenue = Object.fromEntries(Object.entries(rawMenu(2)).filter(([key]) => key !== "venue"));
    const { records } = clean([rawMenu(1, { venue: "COM" }), noVenue], OPTIONS);
    expect(records.map((record) => record.venue)).toEqual(["COMMERCIAL", null]);
  });

  it("fails on ids that are not integers", () => {
    expect(structuralCode(() => clean([rawMenu("abc")], OPTIONS))).toBe("INVALID_ID");
    expect(structuralCode(() => clean([rawMenu(null)], OPTIONS))).toBe("INVALID_ID");
  });

  it("fails on duplicate ids", () => {
    expect(structuralCode(() => clean([rawMenu(1), rawMenu("1")], OPTIONS))).toBe("DUPLICATE_ID");
  });

  it("reads string ids as integers", () => {
    expect(clean([rawMenu("17")], OPTIONS).records[0]?.id).toBe(17);
  });
});
