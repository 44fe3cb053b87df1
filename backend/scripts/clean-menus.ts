// How to run:
// npm run menus:clean -- --input <dataset.csv|dataset.json> [--out <dir>] [--tables <dir>] [--run-date YYYY-MM-DD]

import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import {
  clean,
  formatUnmappedEvents,
  loadMappingTablesFromDir,
  type CleaningConfig,
} from "../src/menu-cleaning";
import { loadDataset } from "../src/dataset/load-dataset";
import { writeArtifacts } from "../src/dataset/write-artifacts";

dotenv.config({ path: ".env.local" });
dotenv.config();

const DEFAULT_OUT = "out/latest";

async function main() {
  const args = process.argv.slice(2);
  const inputArg = readArg(args, "--input");
  if (!inputArg) {
    console.log(
      "Usage: npm run menus:clean -- --input <dataset.csv|dataset.json> [--out <dir>] [--tables <dir>] [--run-date YYYY-MM-DD]"
    );
    process.exit(1);
  }

  const datasetPath = path.resolve(inputArg);
  const outDir = path.resolve(readArg(args, "--out") ?? DEFAULT_OUT);
  const tablesArg = readArg(args, "--tables");
  const runDate = readArg(args, "--run-date") ?? process.env.CLEAN_RUN_DATE;

  if (!fs.existsSync(datasetPath)) {
    throw new Error(`Dataset not found: ${datasetPath}`);
  }

  const cfgOverride: Partial<CleaningConfig> = runDate ? { runDate } : {};
  const tables = tablesArg ? loadMappingTablesFromDir(path.resolve(tablesArg)) : undefined;

  const records = loadDataset(datasetPath);
  const result = clean(records, { cfgOverride, tables, debug: true });
  const unmapped = formatUnmappedEvents(result.audit);

  const written = writeArtifacts(outDir, {
    runId: crypto.randomUUID(),
    createdAtISO: new Date().toISOString(),
    datasetPath,
    records: result.records,
    audit: result.audit,
    summary: result.summary,
    unmapped,
    debug: result.debug,
  });

  console.log(`[menus:clean] dataset=${datasetPath}`);
  console.log(`[menus:clean] records in=${records.length} out=${result.records.length}`);
  console.log(
    `[menus:clean] missing names=${result.summary.missingNames} dates=${result.summary.missingDates} range=${result.summary.earliestDate ?? "-"}..${result.summary.latestDate ?? "-"}`
  );
  for (const line of unmapped) console.log(`[menus:clean] ${line}`);
  for (const file of written) console.log(`[menus:clean] wrote ${file}`);
}

function readArg(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  return args[idx + 1];
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
