/*
  Check that APPSTORE_VENDOR_NUMBER is visible to the configured API key.
  Usage:
    npm run appstore:verify-vendor
*/

import "dotenv/config";

import { createConfiguredLogger, loadConfig, requireAppStoreConfig } from "../../src/config/config";
import { createTokenSigner } from "../../src/integrations/appstore/appstore.sdk";
import { verifyVendor } from "../../src/integrations/appstore/vendors.repo";

async function main() {
  const cfg = loadConfig();
  const logger = createConfiguredLogger(cfg);
  const creds = requireAppStoreConfig(cfg);
  const check = await verifyVendor({
    signer: createTokenSigner(creds),
    vendorNumber: creds.vendorNumber,
    baseUrl: cfg.appStore.baseUrl,
    timeoutMs: cfg.appStore.timeoutMs,
    logger,
  });

  switch (check.kind) {
    case "verified":
      console.log(`[vendor] ${check.vendorNumber} is accessible`);
      return;
    case "missing":
      console.log(`[vendor] ${check.vendorNumber} not found; available: ${check.available.join(", ") || "(none)"}`);
      break;
    case "forbidden":
      console.log("[vendor] forbidden: the key lacks access to sales reports");
      break;
    case "failed":
      console.log(`[vendor] verification failed: ${check.message}`);
      break;
  }
  process.exitCode = 1;
}

main().catch((err: unknown) => {
  console.error("[vendor] error:", err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
