import { escapeRegExp } from "../normalize";
import type { CleaningContext, FieldOutcome, RawMenuRecord } from "../types";
import { readText } from "./values";

export type CallNumberParts = {
  normalized: string | null;
  isWotm: boolean;
};

export function splitCallNumber(raw: string | null, marker: string, separator: string): CallNumberParts {
  if (raw == null || raw.trim() === "") return { normalized: null, isWotm: false };

  const escapedMarker = escapeRegExp(marker);
  const isWotm = new RegExp(escapedMarker, "i").test(raw);
  if (new RegExp(`^[*\\s]*${escapedMarker}$`, "i").test(raw.trim())) {
    return { normalized: null, isWotm };
  }

  const suffix = new RegExp(`${escapeRegExp(separator)}${escapedMarker}$`, "i");
  const normalized = raw.trim().replace(suffix, "");
  return { normalized: normalized || null, isWotm };
}

export function cleanCallNumber(
  record: RawMenuRecord,
  ctx: CleaningContext
): FieldOutcome<CallNumberParts> {
  const raw = readText(record, "call_number", ctx.cfg);
  const { marker, separator } = ctx.cfg.callNumber;
  const parts = splitCallNumber(raw, marker, separator);

  if (raw != null && parts.isWotm && parts.normalized == null) {
    return {
      value: parts,
      events: [
        { field: "call_number_normalized", kind: "fallback", code: "CALL_NUMBER_MARKER_ONLY", raw },
      ],
    };
  }
  return { value: parts, events: [] };
}
