/*
  Build the App Store units summary and post it to Discord.
  Actions:
    1) Resolve the anchor date (fixed lag or backward probing)
    2) Sum units for the 24h / 7d / 30d windows ending at the anchor
    3) POST the formatted message to the webhook

  Requirements (.env):
    - APPSTORE_ISSUER_ID, APPSTORE_KEY_ID, APPSTORE_PRIVATE_KEY, APPSTORE_VENDOR_NUMBER
    - DISCORD_WEBHOOK_URL (not needed with --dry-run)

  Usage:
    npm run summary [-- --dry-run] [-- --force]
*/

import "dotenv/config";

import { createConfiguredLogger, loadConfig } from "../../src/config/config";
import { runUnitsSummary } from "../../src/services/units-summary.service";

async function main() {
  const dryRun = process.argv.includes("--dry-run");
  const force = process.argv.includes("--force");
  const config = loadConfig();
  const logger = createConfiguredLogger(config);
  logger.info("[units-summary:cli] starting", { dryRun, force });

  const result = await runUnitsSummary({ dryRun, force, config, logger });

  if (dryRun) {
    console.log(result.message);
    return;
  }
  if (result.skipped) {
    console.log(`Skipped: ${result.skipped}`);
    return;
  }
  console.log(`Summary delivered=${result.delivered} anchor=${result.anchorDate ?? "UNKNOWN"}`);
  if (!result.delivered) process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error("[units-summary:cli] error:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
