import type { NameSource } from "../config";
import {
  moveTrailingArticle,
  placeholderToNull,
  stripBracketedNoise,
  stripWrappingQuotes,
  uppercaseFold,
} from "../normalize";
import type { AuditEvent, CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

type Candidate = {
  source: NameSource;
  value: string | null;
  placeholder: boolean;
};

/**
 * location, name and sponsor carry the same information (or nothing) in the
 * raw export. The first non-empty candidate in `nameConsolidationOrder` wins.
 * Reads the raw columns only, so it never depends on which columns an earlier
 * step dropped.
 */
export function consolidateName(
  record: RawMenuRecord,
  ctx: CleaningContext
): FieldOutcome<string | null> {
  const candidates = ctx.cfg.nameConsolidationOrder.map((source) =>
    cleanNameCandidate(source, readText(record, source, ctx.cfg), ctx.cfg.placeholderPatterns)
  );

  const events: AuditEvent[] = [];
  const placeholder = candidates.find((item) => item.placeholder);
  if (placeholder) {
    events.push({ field: "name", kind: "fallback", code: "NAME_PLACEHOLDER", raw: placeholder.source });
  }

  const winner = candidates.find((item) => item.value !== null);
  return { value: winner?.value ?? null, events };
}

export function cleanNameCandidate(
  source: NameSource,
  raw: string | null,
  placeholderPatterns: string[]
): Candidate {
  if (raw == null || raw.trim() === "") return { source, value: null, placeholder: false };

  const kept = placeholderToNull(raw, placeholderPatterns);
  if (kept == null) return { source, value: null, placeholder: true };

  const unquoted = stripWrappingQuotes(kept);
  switch (source) {
    case "location":
      return { source, value: moveTrailingArticle(unquoted, "The"), placeholder: false };
    case "sponsor":
      return {
        source,
        value: moveTrailingArticle(uppercaseFold(stripBracketedNoise(unquoted)), "THE"),
        placeholder: false,
      };
    default:
      return { source, value: unquoted, placeholder: false };
  }
}
