import { applyRegexRules, stripBracketedNoise, uppercaseFold } from "../normalize";
import type { CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

export function cleanEvent(record: RawMenuRecord, ctx: CleaningContext): FieldOutcome<string | null> {
  const upper = uppercaseFold(stripBracketedNoise(readText(record, "event", ctx.cfg)));
  if (upper == null) return { value: null, events: [] };
  return { value: applyRegexRules(upper, ctx.cfg.eventTypoRules), events: [] };
}
