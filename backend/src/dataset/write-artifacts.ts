import fs from "node:fs";
import path from "node:path";
import Papa from "papaparse";
import type {
  AuditReport,
  CleanedMenuRecord,
  CleaningDebug,
  QualitySummary,
} from "../menu-cleaning";

export const ARTIFACT_FILES = ["cleaned.json", "cleaned.csv", "audit.json", "summary.json"];

export const CLEANED_COLUMNS: (keyof CleanedMenuRecord)[] = [
  "id",
  "name",
  "date",
  "place",
  "event",
  "venue",
  "occasion",
  "currency",
  "currency_code",
  "call_number_normalized",
  "is_wotm",
  "physical_description",
  "page_count",
  "dish_count",
  "status",
  "notes",
];

export type ArtifactInput = {
  runId: string;
  createdAtISO: string;
  datasetPath: string;
  records: CleanedMenuRecord[];
  audit: AuditReport;
  summary: QualitySummary;
  unmapped: string[];
  debug?: CleaningDebug;
};

export function writeArtifacts(outDir: string, input: ArtifactInput): string[] {
  prepareOutDir(outDir);
  return [
    writeJson(outDir, "cleaned.json", input.records),
    writeCleanedCsv(outDir, input.records),
    writeJson(outDir, "audit.json", {
      runId: input.runId,
      createdAtISO: input.createdAtISO,
      audit: input.audit,
      unmapped: input.unmapped,
      debug: input.debug,
    }),
    writeJson(outDir, "summary.json", {
      runId: input.runId,
      datasetPath: input.datasetPath,
      summary: input.summary,
    }),
  ];
}

export function toCleanedCsv(records: CleanedMenuRecord[]): string {
  return Papa.unparse(
    {
      fields: CLEANED_COLUMNS,
      data: records.map((record) => CLEANED_COLUMNS.map((column) => record[column] ?? "")),
    },
    { newline: "\n" }
  );
}

function writeCleanedCsv(outDir: string, records: CleanedMenuRecord[]): string {
  const outputPath = path.join(outDir, "cleaned.csv");
  fs.writeFileSync(outputPath, toCleanedCsv(records), "utf8");
  return outputPath;
}

function writeJson(outDir: string, name: string, value: unknown): string {
  const outputPath = path.join(outDir, name);
  fs.writeFileSync(outputPath, JSON.stringify(value, null, 2), "utf8");
  return outputPath;
}

function prepareOutDir(outDir: string): void {
  fs.mkdirSync(outDir, { recursive: true });

  for (const name of ARTIFACT_FILES) {
    const filePath = path.join(outDir, name);
    if (fs.existsSync(filePath)) fs.unlinkSync(filePath);
  }
}
