import { stripBracketedNoise } from "../normalize";
import type { CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

export function cleanCurrency(record: RawMenuRecord, ctx: CleaningContext): FieldOutcome<string> {
  const raw = readText(record, "currency", ctx.cfg);
  if (raw != null && raw.trim() !== "") return { value: raw, events: [] };
  return {
    value: ctx.cfg.currencyDefault,
    events: [{ field: "currency", kind: "fallback", code: "CURRENCY_DEFAULTED" }],
  };
}

/**
 * Symbol → ISO code. Unmapped symbols are null under the default policy and
 * kept as-is under "passthrough"; both are reported as unmapped.
 */
export function cleanCurrencyCode(
  record: RawMenuRecord,
  ctx: CleaningContext
): FieldOutcome<string | null> {
  const symbol = stripBracketedNoise(readText(record, "currency_symbol", ctx.cfg));
  if (symbol == null) return { value: null, events: [] };

  const hit = ctx.tables.currency.get(symbol);
  if (hit.found) return { value: hit.value, events: [] };

  return {
    value: ctx.cfg.unmappedCurrencyPolicy === "passthrough" ? symbol : null,
    events: [
      { field: "currency_code", kind: "unmapped", code: "CURRENCY_SYMBOL_UNMAPPED", raw: symbol },
    ],
  };
}
