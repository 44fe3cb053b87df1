/**
 * Menu record shapes before and after cleaning.
 *
 * Column names stay snake_case: they are the column names of the
 * persisted table.
 */

import type { VenueCategory } from "./vocabulary";

/** A single raw cell as it comes out of the CSV export or the raw table. */
export type RawValue = string | number | boolean | null;

/**
 * Raw menu row. Loosely typed on purpose: every column may be missing,
 * empty or hold the wrong type.
 */
export type RawMenuRecord = Record<string, RawValue | undefined>;

/** One row of the cleaned menu table. */
export interface CleanedMenuRecord {
  /** Primary key, copied unchanged from the raw row. */
  id: number;
  /** Consolidated from location, name and sponsor (first non-empty wins). */
  name: string | null;
  /** Calendar date as YYYY-MM-DD, between 1840-01-01 and the run date. */
  date: string | null;
  place: string | null;
  /** Uppercase, without brackets, quotes and question marks. */
  event: string | null;
  venue: VenueCategory | null;
  /** Title case with OCR corrections applied. */
  occasion: string | null;
  /** Raw currency name; missing values become "Unknown". */
  currency: string;
  /**
   * ISO 4217 code. With the default policy always one of CURRENCY_CODES
   * or null; with the pass-through policy an unmapped raw symbol is kept.
   */
  currency_code: string | null;
  /** Call number without the "_wotm" collection suffix. */
  call_number_normalized: string | null;
  /** True if the raw call number carried the collection marker. */
  is_wotm: boolean;
  physical_description: string | null;
  page_count: number | null;
  dish_count: number | null;
  status: string | null;
  notes: string | null;
}

/** Columns that the audit report tracks. */
export type AuditedField =
  | "name"
  | "date"
  | "place"
  | "event"
  | "venue"
  | "occasion"
  | "currency"
  | "currency_code"
  | "call_number_normalized";
