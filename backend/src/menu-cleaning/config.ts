import { format } from "date-fns";
import { isIsoDay } from "./dates";
import { StructuralError } from "./errors";

export type RegexRule = {
  id: string;
  pattern: string;
  flags: string;
  replacement: string;
};

export type StateAbbreviation = {
  // Lower-case suffix as it appears after the last comma.
  suffix: string;
  code: string;
};

export type NameSource = "location" | "name" | "sponsor";

export type UnmappedCurrencyPolicy = "null" | "passthrough";

export type CleaningConfig = {
  // date-fns patterns, tried in order.
  dateFormats: string[];
  minDate: string;
  // YYYY-MM-DD; upper bound for dates, inclusive.
  runDate: string;
  placeholderPatterns: string[];
  ocrRules: RegexRule[];
  eventTypoRules: RegexRule[];
  stateAbbreviations: StateAbbreviation[];
  callNumber: {
    marker: string;
    separator: string;
  };
  nameConsolidationOrder: NameSource[];
  currencyDefault: string;
  unmappedCurrencyPolicy: UnmappedCurrencyPolicy;
  requiredColumns: string[];
  // Column → fallback column, read when the column itself is absent.
  sourceAliases: Record<string, string>;
  shardSize: number;
};

// Order is load-bearing: typo collapse runs before anniversary folding,
// and both before title-casing (which carries the possessive fix).
export const OCR_RULES: RegexRule[] = [
  { id: "digit-o-other", pattern: "0ther", flags: "g", replacement: "other" },
  { id: "digit-o-compl", pattern: "c0mpl", flags: "g", replacement: "compl" },
  { id: "annual-typo", pattern: "amnnual|annu al", flags: "g", replacement: "annual" },
  {
    id: "anniversary-repeat",
    pattern: "anniversary(?:esary|ersary)?",
    flags: "gi",
    replacement: "anniversary",
  },
  { id: "anniv-short", pattern: "aniv\\w*", flags: "gi", replacement: "anniv" },
];

export const DEFAULT_CONFIG: CleaningConfig = {
  dateFormats: ["yyyy-MM-dd", "MM/dd/yyyy"],
  minDate: "1840-01-01",
  runDate: "",
  placeholderPatterns: ["not given", "restaurant name and/or location not given"],
  ocrRules: OCR_RULES,
  eventTypoRules: [
    { id: "christmas", pattern: "CHRISTMAN", flags: "gi", replacement: "CHRISTMAS" },
  ],
  stateAbbreviations: [
    { suffix: "ny", code: "NY" },
    { suffix: "fla", code: "FL" },
    { suffix: "cal", code: "CA" },
    { suffix: "ca", code: "CA" },
    { suffix: "pa", code: "PA" },
    { suffix: "il", code: "IL" },
  ],
  callNumber: {
    marker: "wotm",
    separator: "_",
  },
  nameConsolidationOrder: ["location", "name", "sponsor"],
  currencyDefault: "Unknown",
  unmappedCurrencyPolicy: "null",
  requiredColumns: [
    "id",
    "name",
    "date",
    "place",
    "event",
    "venue",
    "occasion",
    "currency",
    "currency_symbol",
    "call_number",
  ],
  sourceAliases: {
    currency_symbol: "currency_code",
    call_number: "call_number_normalized",
  },
  shardSize: 2000,
};

/** Throws StructuralError("CONFIG_INVALID") for bad date bounds or shard size. */
export function resolveConfig(override?: Partial<CleaningConfig>): CleaningConfig {
  const base: CleaningConfig = { ...DEFAULT_CONFIG, runDate: todayISO() };
  if (!override) return assertValidConfig(base);

  return assertValidConfig({
    ...base,
    ...override,
    runDate: override.runDate || base.runDate,
    callNumber: { ...base.callNumber, ...(override.callNumber ?? {}) },
    sourceAliases: { ...base.sourceAliases, ...(override.sourceAliases ?? {}) },
  });
}

function assertValidConfig(cfg: CleaningConfig): CleaningConfig {
  if (!isIsoDay(cfg.minDate)) {
    throw new StructuralError("CONFIG_INVALID", `minDate "${cfg.minDate}" is not a YYYY-MM-DD date`);
  }
  if (!isIsoDay(cfg.runDate)) {
    throw new StructuralError("CONFIG_INVALID", `runDate "${cfg.runDate}" is not a YYYY-MM-DD date`);
  }
  if (cfg.minDate > cfg.runDate) {
    throw new StructuralError("CONFIG_INVALID", `minDate ${cfg.minDate} is after runDate ${cfg.runDate}`);
  }
  if (!Number.isSafeInteger(cfg.shardSize) || cfg.shardSize < 1) {
    throw new StructuralError("CONFIG_INVALID", `shardSize ${cfg.shardSize} is not a positive integer`);
  }
  return cfg;
}

export function todayISO(): string {
  return format(new Date(), "yyyy-MM-dd");
}

export function compileRule(rule: RegexRule): RegExp {
  return new RegExp(rule.pattern, rule.flags);
}

/*
Test notes
- resolveConfig: runDate defaults to today, nested callNumber merged per key
- OCR_RULES: order pinned in normalize.test.ts
- DEFAULT_CONFIG.runDate stays empty; only resolveConfig fills it
- CONFIG_INVALID: malformed dates, minDate after runDate, non-positive shardSize
*/
