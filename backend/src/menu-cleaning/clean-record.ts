import {
  cleanCallNumber,
  cleanCurrency,
  cleanCurrencyCode,
  cleanDate,
  cleanEvent,
  cleanOccasion,
  cleanPlace,
  cleanVenue,
  consolidateName,
  readColumn,
  toInt,
  toText,
} from "./columns";
import type {
  AuditEvent,
  CleanedRecordResult,
  CleaningContext,
  FieldOutcome,
  RawMenuRecord,
} from "./types";

/**
 * Pure: builds a new cleaned record from a raw one. The raw record is never
 * written to, and sponsor/location only feed the name consolidation.
 * `id` must already be validated by the load stage.
 */
export function cleanRecord(raw: RawMenuRecord, id: number, ctx: CleaningContext): CleanedRecordResult {
  const events: AuditEvent[] = [];
  const take = <T>(outcome: FieldOutcome<T>): T => {
    events.push(...outcome.events);
    return outcome.value;
  };

  const callNumber = take(cleanCallNumber(raw, ctx));

  return {
    record: {
      id,
      name: take(consolidateName(raw, ctx)),
      date: take(cleanDate(raw, ctx)),
      place: take(cleanPlace(raw, ctx)),
      event: take(cleanEvent(raw, ctx)),
      venue: take(cleanVenue(raw, ctx)),
      occasion: take(cleanOccasion(raw, ctx)),
      currency: take(cleanCurrency(raw, ctx)),
      currency_code: take(cleanCurrencyCode(raw, ctx)),
      call_number_normalized: callNumber.normalized,
      is_wotm: callNumber.isWotm,
      physical_description: toText(readColumn(raw, "physical_description", ctx.cfg)),
      page_count: toInt(readColumn(raw, "page_count", ctx.cfg)),
      dish_count: toInt(readColumn(raw, "dish_count", ctx.cfg)),
      status: toText(readColumn(raw, "status", ctx.cfg)),
      notes: toText(readColumn(raw, "notes", ctx.cfg)),
    },
    events,
  };
}
