// Pipeline
export { clean, cleanShard, runCleaning, validateStructure } from "./pipeline";
export type { CleanOptions, CleaningRun } from "./pipeline";

// Types
export type {
  AuditCode,
  AuditEvent,
  AuditEventKind,
  AuditReport,
  AuditedField,
  CleanResult,
  CleanedMenuRecord,
  CleanedRecordResult,
  CleaningContext,
  CleaningDebug,
  ColumnTransformer,
  CurrencyCode,
  FieldAudit,
  FieldOutcome,
  MappingEntry,
  MappingTable,
  MappingTables,
  MenuRepository,
  PipelineStage,
  QualitySummary,
  RawMenuRecord,
  RawValue,
  StageTransition,
  VenueCategory,
} from "./types";

// Config
export { DEFAULT_CONFIG, resolveConfig, OCR_RULES, todayISO } from "./config";
export type {
  CleaningConfig,
  NameSource,
  RegexRule,
  StateAbbreviation,
  UnmappedCurrencyPolicy,
} from "./config";

// Errors
export { StructuralError, isStructuralError } from "./errors";
export type { StructuralErrorCode } from "./errors";

// Primitives
export {
  applyRegexRules,
  collapseWhitespace,
  moveTrailingArticle,
  ocrCorrect,
  placeholderToNull,
  stripBracketedNoise,
  stripWrappingQuotes,
  titleCaseFix,
  uppercaseFold,
} from "./normalize";
export { parseDateMulti } from "./dates";
export type { DateParseResult, DateParseFailure } from "./dates";

// Mapping tables
export {
  buildMappingTable,
  buildVenueTable,
  buildCurrencyTable,
  defaultMappingTables,
  loadMappingTablesFromDir,
} from "./mapping-tables";

// Column transformers
export {
  consolidateName,
  cleanDate,
  cleanEvent,
  cleanVenue,
  cleanOccasion,
  cleanCurrency,
  cleanCurrencyCode,
  cleanCallNumber,
  cleanPlace,
  splitCallNumber,
  venueKey,
} from "./columns";
export { cleanRecord } from "./clean-record";

// Audit
export {
  AUDITED_FIELDS,
  emptyAuditReport,
  formatUnmappedEvents,
  mergeAuditReports,
  recordAudit,
  summarizeQuality,
} from "./audit";

// Persistence
export {
  SupabaseMenuRepository,
  DEFAULT_MENU_TABLES,
  toAuditRows,
  toRunRow,
  wrapSupabaseClient,
} from "./persistence";
export type { AuditRow, MenuTables, RunRow, SupabaseLike } from "./persistence";
