import { stripBracketedNoise, uppercaseFold } from "../normalize";
import type { CleaningContext, FieldOutcome, RawMenuRecord, VenueCategory } from "../types";
import { readText } from "./values";

// Lookup key: noise stripped, no dots or commas, no spaces around ";", upper case.
export function venueKey(raw: string | null): string | null {
  const stripped = stripBracketedNoise(raw);
  if (stripped == null) return null;
  const key = uppercaseFold(stripped.replace(/[.,]+/g, "").replace(/\s*;\s*/g, ";"))?.trim();
  return key || null;
}

// Closed-world lookup: anything the table does not know becomes null.
export function cleanVenue(
  record: RawMenuRecord,
  ctx: CleaningContext
): FieldOutcome<VenueCategory | null> {
  const key = venueKey(readText(record, "venue", ctx.cfg));
  if (key == null) return { value: null, events: [] };

  const hit = ctx.tables.venue.get(key);
  if (hit.found) return { value: hit.value, events: [] };

  return {
    value: null,
    events: [{ field: "venue", kind: "unmapped", code: "VENUE_UNMAPPED", raw: key }],
  };
}
