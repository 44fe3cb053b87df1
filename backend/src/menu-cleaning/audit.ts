import type {
  AuditEvent,
  AuditReport,
  AuditedField,
  CleanedMenuRecord,
  FieldAudit,
  QualitySummary,
} from "./types";

export const AUDITED_FIELDS: AuditedField[] = [
  "name",
  "date",
  "place",
  "event",
  "venue",
  "occasion",
  "currency",
  "currency_code",
  "call_number_normalized",
];

const UNMAPPED_LABELS: Partial<Record<AuditedField, string>> = {
  venue: "venue",
  currency_code: "currency symbol",
};

export function emptyAuditReport(): AuditReport {
  return {
    name: emptyFieldAudit(),
    date: emptyFieldAudit(),
    place: emptyFieldAudit(),
    event: emptyFieldAudit(),
    venue: emptyFieldAudit(),
    occasion: emptyFieldAudit(),
    currency: emptyFieldAudit(),
    currency_code: emptyFieldAudit(),
    call_number_normalized: emptyFieldAudit(),
  };
}

export function recordAudit(
  report: AuditReport,
  record: CleanedMenuRecord,
  events: AuditEvent[]
): void {
  const fallbackFields = new Set<AuditedField>();

  for (const field of AUDITED_FIELDS) {
    const entry = report[field];
    entry.total += 1;
    if (record[field] === null) entry.nulled += 1;
  }

  for (const event of events) {
    fallbackFields.add(event.field);
    if (event.kind === "unmapped" && event.raw !== undefined) {
      addCount(report[event.field].unmapped_values, event.raw, 1);
    }
  }

  for (const field of fallbackFields) {
    report[field].fallback_count += 1;
  }
}

// Counter sums only; merge order does not matter.
export function mergeAuditReports(reports: AuditReport[]): AuditReport {
  const merged = emptyAuditReport();
  for (const report of reports) {
    for (const field of AUDITED_FIELDS) {
      mergeFieldAudit(merged[field], report[field]);
    }
  }
  return merged;
}

export function formatUnmappedEvents(report: AuditReport): string[] {
  const lines: string[] = [];
  for (const field of AUDITED_FIELDS) {
    const label = UNMAPPED_LABELS[field] ?? field;
    const values = Object.entries(report[field].unmapped_values).sort(
      ([a, countA], [b, countB]) => countB - countA || a.localeCompare(b)
    );
    for (const [raw, count] of values) {
      lines.push(`unmapped ${label} value: ${raw} (count=${count})`);
    }
  }
  return lines;
}

export function summarizeQuality(records: CleanedMenuRecord[]): QualitySummary {
  const ids = new Set<number>();
  let missingNames = 0;
  let missingDates = 0;
  let earliestDate: string | null = null;
  let latestDate: string | null = null;

  for (const record of records) {
    ids.add(record.id);
    if (record.name === null) missingNames += 1;
    if (record.date === null) {
      missingDates += 1;
      continue;
    }
    if (earliestDate === null || record.date < earliestDate) earliestDate = record.date;
    if (latestDate === null || record.date > latestDate) latestDate = record.date;
  }

  return {
    totalRows: records.length,
    uniqueIds: ids.size,
    missingNames,
    missingDates,
    earliestDate,
    latestDate,
  };
}

function emptyFieldAudit(): FieldAudit {
  return { total: 0, nulled: 0, fallback_count: 0, unmapped_values: {} };
}

function mergeFieldAudit(target: FieldAudit, source: FieldAudit): void {
  target.total += source.total;
  target.nulled += source.nulled;
  target.fallback_count += source.fallback_count;
  for (const [raw, count] of Object.entries(source.unmapped_values)) {
    addCount(target.unmapped_values, raw, count);
  }
}

// Keys are raw data, so "constructor" or "__proto__" must count like any other key.
function addCount(values: Record<string, number>, key: string, count: number): void {
  const current = Object.hasOwn(values, key) ? values[key] : 0;
  Object.defineProperty(values, key, {
    value: current + count,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}
