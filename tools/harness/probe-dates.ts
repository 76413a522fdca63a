/*
  Sales report harness
  - Fetches the DAILY SUMMARY SALES report for each of the last N days
  - Prints one line per date with the parsed units or the unavailability reason
  Usage:
    npx tsx tools/harness/probe-dates.ts --days 10
    npx tsx tools/harness/probe-dates.ts --from 2026-10-01 --days 5
*/

import "dotenv/config";

import { createConfiguredLogger, loadConfig, requireAppStoreConfig } from "../../src/config/config";
import { addDays, isDateKey, todayUtc } from "../../src/domain/dates";
import { createTokenSigner } from "../../src/integrations/appstore/appstore.sdk";
import { createSalesReportClient } from "../../src/integrations/appstore/sales-report.repo";

interface Args {
  days: number;
  from?: string;
}

function parseArgs(): Args {
  const out: Args = { days: 10 };
  const argv = process.argv.slice(2);
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === "--days") out.days = Number(argv[++i]);
    else if (a === "--from") out.from = argv[++i];
  }
  return out;
}

async function run() {
  const args = parseArgs();
  if (!Number.isInteger(args.days) || args.days < 1) throw new Error("--days must be a positive integer");
  if (args.from && !isDateKey(args.from)) throw new Error("--from must be YYYY-MM-DD");

  const cfg = loadConfig();
  const logger = createConfiguredLogger(cfg);
  const creds = requireAppStoreConfig(cfg);
  const client = createSalesReportClient({
    signer: createTokenSigner(creds),
    vendorNumber: creds.vendorNumber,
    baseUrl: cfg.appStore.baseUrl,
    timeoutMs: cfg.appStore.timeoutMs,
    logger,
  });

  const start = args.from ?? addDays(todayUtc(), -1);
  console.log(`[harness] probing ${args.days} day(s) back from ${start}`);
  let found = 0;
  for (let i = 0; i < args.days; i++) {
    const date = addDays(start, -i);
    const result = await client.fetchReport(date);
    if (result.kind === "parsed") {
      found++;
      console.log(`[harness] ${date} units=${result.units}`);
    } else {
      console.log(`[harness] ${date} unavailable (${result.reason})`);
    }
  }
  console.log(`[harness] done. available=${found} missing=${args.days - found}`);
}

run().catch((e: unknown) => {
  console.error("[harness] fatal:", e instanceof Error ? e.message : e);
  process.exitCode = 1;
});
