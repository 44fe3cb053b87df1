import { parseDateMulti } from "../dates";
import type { CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

export function cleanDate(record: RawMenuRecord, ctx: CleaningContext): FieldOutcome<string | null> {
  const raw = readText(record, "date", ctx.cfg);
  if (raw == null || raw.trim() === "") return { value: null, events: [] };

  const { dateFormats, minDate, runDate } = ctx.cfg;
  const parsed = parseDateMulti(raw, dateFormats, minDate, runDate);
  if (parsed.ok) return { value: parsed.value, events: [] };

  return {
    value: null,
    events: [
      {
        field: "date",
        kind: "fallback",
        code: parsed.reason === "out_of_range" ? "DATE_OUT_OF_RANGE" : "DATE_UNPARSEABLE",
        raw,
      },
    ],
  };
}
