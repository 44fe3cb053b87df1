import type {
  AuditedField,
  AuditReport,
  CleanedMenuRecord,
  CurrencyCode,
  FieldAudit,
  QualitySummary,
  RawMenuRecord,
  RawValue,
  VenueCategory,
} from "@menu-refinery/shared";
import type { CleaningConfig } from "./config";

export type {
  AuditedField,
  AuditReport,
  CleanedMenuRecord,
  CurrencyCode,
  FieldAudit,
  QualitySummary,
  RawMenuRecord,
  RawValue,
  VenueCategory,
};

export type AuditEventKind = "fallback" | "unmapped";

export type AuditCode =
  | "NAME_PLACEHOLDER"
  | "DATE_UNPARSEABLE"
  | "DATE_OUT_OF_RANGE"
  | "VENUE_UNMAPPED"
  | "CURRENCY_DEFAULTED"
  | "CURRENCY_SYMBOL_UNMAPPED"
  | "CALL_NUMBER_MARKER_ONLY"
  | "PLACE_UNKNOWN";

export interface AuditEvent {
  field: AuditedField;
  kind: AuditEventKind;
  code: AuditCode;
  // Lookup key for unmapped events, raw text for fallbacks.
  raw?: string;
}

export interface FieldOutcome<T> {
  value: T;
  events: AuditEvent[];
}

export interface MappingEntry<T extends string> {
  raw_value: string;
  standard_value: T | null;
}

/** Read-only dictionary built from mapping entries; `get` distinguishes "mapped to null" from "missing". */
export interface MappingTable<T extends string> {
  readonly name: string;
  readonly size: number;
  has(raw: string): boolean;
  get(raw: string): { found: true; value: T | null } | { found: false };
  entries(): MappingEntry<T>[];
}

export interface MappingTables {
  venue: MappingTable<VenueCategory>;
  currency: MappingTable<CurrencyCode>;
}

/** Everything a column transformer may read besides the record itself. */
export interface CleaningContext {
  cfg: CleaningConfig;
  tables: MappingTables;
}

export type ColumnTransformer<T> = (record: RawMenuRecord, ctx: CleaningContext) => FieldOutcome<T>;

export type PipelineStage = "load" | "transform" | "emit" | "done" | "failed";

export interface StageTransition {
  stage: PipelineStage;
  at: string;
  records: number;
}

export interface CleanedRecordResult {
  record: CleanedMenuRecord;
  events: AuditEvent[];
}

export interface CleanResult {
  records: CleanedMenuRecord[];
  audit: AuditReport;
  summary: QualitySummary;
}

export interface CleaningDebug {
  stages: StageTransition[];
  shardCount: number;
  shardSize: number;
  runDate: string;
}

/** Persistence boundary for raw input and cleaned output. */
export interface MenuRepository {
  loadRawRecords(): Promise<RawMenuRecord[]>;
  saveCleanedRecords(records: CleanedMenuRecord[]): Promise<void>;
  saveAudit(runId: string, audit: AuditReport, summary: QualitySummary): Promise<void>;
}
