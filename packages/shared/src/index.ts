/**
 * @menu-refinery/shared – contract of the cleaned menu table.
 *
 * Imported by the cleaning engine and by anything that reads its output.
 */

// Domain: records
export type {
  RawValue,
  RawMenuRecord,
  CleanedMenuRecord,
  AuditedField,
} from "./domain/menu";

// Domain: controlled vocabularies
export type { VenueCategory, CurrencyCode } from "./domain/vocabulary";
export {
  VENUE_CATEGORIES,
  CURRENCY_CODES,
  isVenueCategory,
  isCurrencyCode,
} from "./domain/vocabulary";

// API: audit
export type { FieldAudit, AuditReport, QualitySummary } from "./api/audit";
