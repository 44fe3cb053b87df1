import crypto from "node:crypto";
import {
  emptyAuditReport,
  formatUnmappedEvents,
  mergeAuditReports,
  recordAudit,
  summarizeQuality,
} from "./audit";
import { cleanRecord } from "./clean-record";
import { toInt } from "./columns";
import { resolveConfig, type CleaningConfig } from "./config";
import { StructuralError, isStructuralError } from "./errors";
import { defaultMappingTables } from "./mapping-tables";
import type {
  AuditReport,
  CleanedMenuRecord,
  CleanResult,
  CleaningContext,
  CleaningDebug,
  MappingTables,
  MenuRepository,
  PipelineStage,
  RawMenuRecord,
  StageTransition,
} from "./types";

export type CleanOptions = {
  cfgOverride?: Partial<CleaningConfig>;
  tables?: MappingTables;
  debug?: boolean;
};

export type CleaningRun = {
  runId: string;
  createdAtISO: string;
  result: CleanResult & { debug?: CleaningDebug };
};

type Shard = {
  records: CleanedMenuRecord[];
  audit: AuditReport;
};

/**
 * load -> transform -> emit. Structural defects throw StructuralError before
 * any record is transformed; content defects never throw. Output has exactly
 * one record per input record, in input order.
 */
export function clean(
  rawRecords: RawMenuRecord[],
  options?: CleanOptions
): CleanResult & { debug?: CleaningDebug } {
  const stages: StageTransition[] = [];
  const enter = (stage: PipelineStage, records: number) => {
    stages.push({ stage, at: new Date().toISOString(), records });
  };

  enter("load", rawRecords.length);
  const { cfg, ids, ctx } = loadStage(rawRecords, options, (error) => {
    enter("failed", 0);
    if (isStructuralError(error)) error.stages = stages.map((transition) => ({ ...transition }));
    debugLog("load failed", { error: error instanceof Error ? error.message : String(error) });
  });

  enter("transform", rawRecords.length);
  const { shardSize } = cfg;
  const shards: Shard[] = [];
  for (let start = 0; start < rawRecords.length; start += shardSize) {
    const end = Math.min(start + shardSize, rawRecords.length);
    shards.push(cleanShard(rawRecords.slice(start, end), ids.slice(start, end), ctx));
  }

  enter("emit", rawRecords.length);
  const records = shards.flatMap((shard) => shard.records);
  const audit = shards.length > 0 ? mergeAuditReports(shards.map((shard) => shard.audit)) : emptyAuditReport();
  const summary = summarizeQuality(records);

  for (const line of formatUnmappedEvents(audit)) debugLog(line);
  enter("done", records.length);

  const result: CleanResult & { debug?: CleaningDebug } = { records, audit, summary };
  if (options?.debug) {
    result.debug = {
      stages,
      shardCount: shards.length,
      shardSize,
      runDate: cfg.runDate,
    };
  }
  return result;
}

// Config, mapping tables and record structure; nothing is transformed yet.
function loadStage(
  rawRecords: RawMenuRecord[],
  options: CleanOptions | undefined,
  onFailure: (error: unknown) => void
): { cfg: CleaningConfig; ids: number[]; ctx: CleaningContext } {
  try {
    const cfg = resolveConfig(options?.cfgOverride);
    const ctx: CleaningContext = { cfg, tables: options?.tables ?? defaultMappingTables() };
    return { cfg, ids: validateStructure(rawRecords, cfg), ctx };
  } catch (error) {
    onFailure(error);
    throw error;
  }
}

export function cleanShard(rawRecords: RawMenuRecord[], ids: number[], ctx: CleaningContext): Shard {
  const audit = emptyAuditReport();
  const records = rawRecords.map((raw, index) => {
    const { record, events } = cleanRecord(raw, ids[index], ctx);
    recordAudit(audit, record, events);
    return record;
  });
  return { records, audit };
}

/** Returns the validated ids, in record order. */
export function validateStructure(rawRecords: RawMenuRecord[], cfg: CleaningConfig): number[] {
  if (rawRecords.length === 0) return [];

  for (const column of cfg.requiredColumns) {
    const alias = cfg.sourceAliases[column];
    const present = rawRecords.some(
      (record) => column in record || (alias !== undefined && alias in record)
    );
    if (!present) {
      throw new StructuralError("MISSING_COLUMN", `column "${column}" is absent from every record`);
    }
  }

  const seen = new Set<number>();
  return rawRecords.map((record, index) => {
    const id = toInt(record.id ?? null);
    if (id === null) {
      throw new StructuralError("INVALID_ID", `record #${index} has no integer id (${String(record.id)})`);
    }
    if (seen.has(id)) {
      throw new StructuralError("DUPLICATE_ID", `id ${id} occurs more than once`);
    }
    seen.add(id);
    return id;
  });
}

/** Loads from the repository, cleans, and writes records and audit back. */
export async function runCleaning(
  repo: MenuRepository,
  options?: CleanOptions & { runId?: string }
): Promise<CleaningRun> {
  const runId = options?.runId ?? crypto.randomUUID();
  const createdAtISO = new Date().toISOString();

  const raw = await repo.loadRawRecords();
  const result = clean(raw, options);

  await repo.saveCleanedRecords(result.records);
  await repo.saveAudit(runId, result.audit, result.summary);

  return { runId, createdAtISO, result };
}

function debugLog(message: string, details?: Record<string, unknown>) {
  if (process.env.CLEAN_DEBUG !== "1") return;
  if (details) console.warn("[menu-cleaning]", message, details);
  else console.warn("[menu-cleaning]", message);
}
