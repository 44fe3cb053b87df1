import type { SupabaseClient } from "@supabase/supabase-js";
import { AUDITED_FIELDS } from "./audit";
import { asRawRecord } from "./columns";
import type {
  AuditReport,
  AuditedField,
  CleanedMenuRecord,
  MenuRepository,
  QualitySummary,
  RawMenuRecord,
} from "./types";

type QueryResult = { data: unknown[] | null; error: { message: string } | null };
type MutationResult = { error: { message: string } | null };

export type SupabaseLike = {
  from(table: string): {
    select(columns: string): {
      order(column: string, options: { ascending: boolean }): {
        range(from: number, to: number): PromiseLike<QueryResult>;
      };
    };
    upsert(
      rows: Record<string, unknown>[],
      options: { onConflict: string }
    ): PromiseLike<MutationResult>;
    insert(rows: Record<string, unknown>[]): PromiseLike<MutationResult>;
  };
};

export type MenuTables = {
  raw: string;
  clean: string;
  audit: string;
  runs: string;
};

export const DEFAULT_MENU_TABLES: MenuTables = {
  raw: "menus_raw",
  clean: "menus_clean",
  audit: "menu_cleaning_audit",
  runs: "menu_cleaning_runs",
};

export type AuditRow = {
  run_id: string;
  field: AuditedField;
  total: number;
  nulled: number;
  fallback_count: number;
  unmapped_values: Record<string, number>;
  created_at: string;
};

export type RunRow = {
  run_id: string;
  total_rows: number;
  unique_ids: number;
  missing_names: number;
  missing_dates: number;
  earliest_date: string | null;
  latest_date: string | null;
  created_at: string;
};

export function toAuditRows(runId: string, audit: AuditReport, createdAt: string): AuditRow[] {
  return AUDITED_FIELDS.map((field) => ({
    run_id: runId,
    field,
    total: audit[field].total,
    nulled: audit[field].nulled,
    fallback_count: audit[field].fallback_count,
    unmapped_values: { ...audit[field].unmapped_values },
    created_at: createdAt,
  }));
}

export function toRunRow(runId: string, summary: QualitySummary, createdAt: string): RunRow {
  return {
    run_id: runId,
    total_rows: summary.totalRows,
    unique_ids: summary.uniqueIds,
    missing_names: summary.missingNames,
    missing_dates: summary.missingDates,
    earliest_date: summary.earliestDate,
    latest_date: summary.latestDate,
    created_at: createdAt,
  };
}

export class SupabaseMenuRepository implements MenuRepository {
  constructor(
    private readonly client: SupabaseLike,
    private readonly tables: MenuTables = DEFAULT_MENU_TABLES,
    private readonly pageSize = 1000,
    private readonly chunkSize = 500
  ) {}

  async loadRawRecords(): Promise<RawMenuRecord[]> {
    const rows: RawMenuRecord[] = [];
    let from = 0;

    while (true) {
      const { data, error } = await this.client
        .from(this.tables.raw)
        .select("*")
        .order("id", { ascending: true })
        .range(from, from + this.pageSize - 1);
      if (error) throw new Error(`Load raw menus failed: ${error.message}`);
      if (!data || data.length === 0) break;

      data.forEach((row, index) => {
        const record = asRawRecord(row);
        if (!record) throw new Error(`Load raw menus failed: row ${from + index} is not an object`);
        rows.push(record);
      });

      if (data.length < this.pageSize) break;
      from += this.pageSize;
    }

    return rows;
  }

  async saveCleanedRecords(records: CleanedMenuRecord[]): Promise<void> {
    for (let start = 0; start < records.length; start += this.chunkSize) {
      const chunk = records.slice(start, start + this.chunkSize).map((record) => ({ ...record }));
      const { error } = await this.client
        .from(this.tables.clean)
        .upsert(chunk, { onConflict: "id" });
      if (error) throw new Error(`Upsert cleaned menus failed: ${error.message}`);
    }
  }

  async saveAudit(runId: string, audit: AuditReport, summary: QualitySummary): Promise<void> {
    const createdAt = new Date().toISOString();

    const runResult = await this.client.from(this.tables.runs).insert([toRunRow(runId, summary, createdAt)]);
    if (runResult.error) throw new Error(`Insert cleaning run failed: ${runResult.error.message}`);

    const auditResult = await this.client.from(this.tables.audit).insert(toAuditRows(runId, audit, createdAt));
    if (auditResult.error) throw new Error(`Insert cleaning audit failed: ${auditResult.error.message}`);
  }
}

export function wrapSupabaseClient(client: SupabaseClient): SupabaseLike {
  return {
    from(table: string) {
      return {
        select: (columns: string) => ({
          order: (column: string, options: { ascending: boolean }) => ({
            range: (from: number, to: number) =>
              client.from(table).select(columns).order(column, options).range(from, to),
          }),
        }),
        upsert: (rows: Record<string, unknown>[], options: { onConflict: string }) =>
          client.from(table).upsert(rows, options),
        insert: (rows: Record<string, unknown>[]) => client.from(table).insert(rows),
      };
    },
  };
}
