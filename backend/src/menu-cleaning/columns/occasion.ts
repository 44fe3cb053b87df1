import { collapseWhitespace, ocrCorrect, titleCaseFix } from "../normalize";
import type { CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

const NTH_ORDINAL = /(\d+)nth\b/gi;

export function normalizeOccasion(raw: string | null, ctx: CleaningContext): string | null {
  if (raw == null) return null;

  const corrected = titleCaseFix(ocrCorrect(raw.toLowerCase(), ctx.cfg.ocrRules));
  if (corrected == null) return null;

  const spaced = corrected
    .replace(/[[\]"()]+/g, "")
    .replace(/\?+/g, "")
    .replace(/\s+,/g, ",")
    .replace(/,\s*/g, ", ")
    .trim()
    .replace(/[,;]+$/, "")
    .replace(NTH_ORDINAL, "$1th");

  const out = collapseWhitespace(spaced);
  return out || null;
}

export function cleanOccasion(record: RawMenuRecord, ctx: CleaningContext): FieldOutcome<string | null> {
  return { value: normalizeOccasion(readText(record, "occasion", ctx.cfg), ctx), events: [] };
}
