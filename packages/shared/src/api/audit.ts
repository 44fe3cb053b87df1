/**
 * Audit report shapes produced by a cleaning run.
 *
 * Counters are plain sums, so partial reports of independent shards can be
 * merged in any order.
 */

import type { AuditedField } from "../domain/menu";

export interface FieldAudit {
  /** Records seen. */
  total: number;
  /** Records whose cleaned value is null. */
  nulled: number;
  /** Records that fell back to a default (null, "Unknown", pass-through). */
  fallback_count: number;
  /** Raw lookup key → occurrences, for values missing from a mapping table. */
  unmapped_values: Record<string, number>;
}

export type AuditReport = Record<AuditedField, FieldAudit>;

/** Row counts and date range of the cleaned table. */
export interface QualitySummary {
  totalRows: number;
  uniqueIds: number;
  missingNames: number;
  missingDates: number;
  /** YYYY-MM-DD, null when no record has a date. */
  earliestDate: string | null;
  latestDate: string | null;
}
