import { format, isValid, parse } from "date-fns";

export type DateParseFailure = "unparseable" | "out_of_range";

export type DateParseResult =
  | { ok: true; value: string }
  | { ok: false; reason: DateParseFailure };

const ISO_DAY = "yyyy-MM-dd";
// Only used to fill fields a pattern leaves out; every configured pattern has all three.
const REFERENCE_DATE = new Date(2000, 0, 1);

/**
 * Tries each date-fns pattern in order and returns the first parse that is a
 * real calendar date inside [minDate, maxDate] (both YYYY-MM-DD, inclusive).
 * Formats are never guessed: "01/02/1900" is read only as the configured
 * patterns read it.
 */
export function parseDateMulti(
  input: string | null | undefined,
  formats: string[],
  minDate: string,
  maxDate: string
): DateParseResult {
  const text = input?.trim();
  if (!text) return { ok: false, reason: "unparseable" };

  let parsedOutOfRange = false;
  for (const pattern of formats) {
    const iso = parseStrict(text, pattern);
    if (!iso) continue;
    if (iso < minDate || iso > maxDate) {
      parsedOutOfRange = true;
      continue;
    }
    return { ok: true, value: iso };
  }

  return { ok: false, reason: parsedOutOfRange ? "out_of_range" : "unparseable" };
}

// Exactly YYYY-MM-DD and a real calendar day; bounds are compared as strings.
export function isIsoDay(value: string): boolean {
  const parsed = parse(value, ISO_DAY, REFERENCE_DATE);
  return isValid(parsed) && toIsoDay(parsed) === value;
}

export function toIsoDay(date: Date): string {
  return format(date, ISO_DAY);
}

function parseStrict(text: string, pattern: string): string | null {
  const parsed = parse(text, pattern, REFERENCE_DATE);
  if (!isValid(parsed)) return null;
  const year = parsed.getFullYear();
  // yyyy also accepts 1-3 digit years ("190-01-01"); those are never real menu dates.
  if (year < 1000 || year > 9999) return null;
  return toIsoDay(parsed);
}
