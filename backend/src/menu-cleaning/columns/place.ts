import type { StateAbbreviation } from "../config";
import { escapeRegExp } from "../normalize";
import type { CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

export function stripPlaceNoise(raw: string | null): string | null {
  if (raw == null) return null;
  const out = raw
    .replace(/[[\]()"“”]+/g, "")
    .replace(/\?/g, "")
    .replace(/\s{2,}/g, " ")
    .trim()
    .replace(/[;.,]+$/, "")
    .trim();
  return out || null;
}

// Exact suffix after the last comma: "Albany, ny" -> "Albany, NY".
export function canonicalizeStateSuffix(place: string, abbreviations: StateAbbreviation[]): string {
  for (const { suffix, code } of abbreviations) {
    const pattern = new RegExp(`,\\s*${escapeRegExp(suffix)}$`, "i");
    if (pattern.test(place)) return place.replace(pattern, `, ${code}`);
  }
  return place;
}

export function cleanPlace(record: RawMenuRecord, ctx: CleaningContext): FieldOutcome<string | null> {
  const stripped = stripPlaceNoise(readText(record, "place", ctx.cfg));
  if (stripped == null) return { value: null, events: [] };

  if (stripped.toLowerCase() === "unknown") {
    return {
      value: null,
      events: [{ field: "place", kind: "fallback", code: "PLACE_UNKNOWN", raw: stripped }],
    };
  }

  return { value: canonicalizeStateSuffix(stripped, ctx.cfg.stateAbbreviations), events: [] };
}
