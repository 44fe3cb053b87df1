// How to run:
// SUPABASE_URL=... SUPABASE_SERVICE_ROLE_KEY=... npm run menus:clean:live
// Optional: CLEAN_RUN_DATE=YYYY-MM-DD, CLEAN_DEBUG=1

import { createClient } from "@supabase/supabase-js";
import dotenv from "dotenv";
import {
  SupabaseMenuRepository,
  formatUnmappedEvents,
  runCleaning,
  wrapSupabaseClient,
} from "../src/menu-cleaning";

dotenv.config({ path: ".env.local" });
dotenv.config();

const SUPABASE_URL = requireEnv(process.env.SUPABASE_URL, "SUPABASE_URL");
const SUPABASE_SERVICE_ROLE_KEY = requireEnv(
  process.env.SUPABASE_SERVICE_ROLE_KEY,
  "SUPABASE_SERVICE_ROLE_KEY"
);
const RUN_DATE = process.env.CLEAN_RUN_DATE;

const supabase = createClient(SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY, {
  auth: { persistSession: false, autoRefreshToken: false },
});

async function main() {
  const repo = new SupabaseMenuRepository(wrapSupabaseClient(supabase));
  const run = await runCleaning(repo, {
    cfgOverride: RUN_DATE ? { runDate: RUN_DATE } : undefined,
  });

  const { summary, audit } = run.result;
  console.log(`[menus:clean:live] run_id=${run.runId}`);
  console.log(`[menus:clean:live] records=${summary.totalRows} unique_ids=${summary.uniqueIds}`);
  console.log(
    `[menus:clean:live] missing names=${summary.missingNames} dates=${summary.missingDates}`
  );
  for (const line of formatUnmappedEvents(audit)) console.log(`[menus:clean:live] ${line}`);
}

function requireEnv(value: string | undefined, name: string): string {
  if (!value) {
    console.error(`Missing ${name} in env.`);
    process.exit(1);
  }
  return value;
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
