import {
  AppConfig,
  createConfiguredLogger,
  loadConfig,
  requireAppStoreConfig,
  requireDiscordConfig,
} from "../config/config";
import { Logger } from "../config/logger";
import { todayUtc } from "../domain/dates";
import { errorMessage } from "../domain/errors";
import { Clock, DateKey, FetchReportFn, Summary } from "../domain/types";
import { createTokenSigner } from "../integrations/appstore/appstore.sdk";
import { createSalesReportClient } from "../integrations/appstore/sales-report.repo";
import { createWebhookNotifier, NotifyFn } from "../integrations/discord/webhook.sdk";
import { createDynamoLedger, deliveryKey, DeliveryLedger } from "../integrations/idempotency/ledger.repo";
import { createAnchorResolver } from "./anchor.service";
import { createReportCache } from "./report-cache.service";
import { buildSummary, formatSummaryMessage } from "./summary.service";

export interface UnitsSummaryDependencies {
  fetchReport?: FetchReportFn;
  notify?: NotifyFn;
  // null disables the ledger even when a table is configured
  ledger?: DeliveryLedger | null;
  now?: Clock;
}

export interface UnitsSummaryOptions {
  dryRun?: boolean;
  force?: boolean;
  config?: AppConfig;
  logger?: Logger;
  dependencies?: UnitsSummaryDependencies;
}

export interface UnitsSummaryResult {
  anchorDate: DateKey | null;
  totals: Summary["totals"];
  message: string;
  delivered: boolean;
  dryRun: boolean;
  skipped?: "already_delivered";
  reportsFetched: number;
}

export async function runUnitsSummary(options: UnitsSummaryOptions = {}): Promise<UnitsSummaryResult> {
  const { dryRun = false, force = false, dependencies = {} } = options;
  const cfg = options.config ?? loadConfig();
  const logger = options.logger ?? createConfiguredLogger(cfg);
  const now = dependencies.now ?? (() => new Date());

  // Configuration faults surface here, before any request goes out
  const creds = requireAppStoreConfig(cfg);
  const discord = dryRun ? null : requireDiscordConfig(cfg);

  // The key depends only on vendor and run date, so a duplicate run stops before any report request
  let ledger: DeliveryLedger | null = null;
  if (discord) ledger = dependencies.ledger !== undefined ? dependencies.ledger : createDynamoLedger(cfg.dynamo);
  const key = deliveryKey(creds.vendorNumber, todayUtc(now()));
  if (ledger && !force) {
    try {
      if (await ledger.hasDelivered(key)) {
        logger.info("[units-summary] already delivered today; skipping", { key });
        return {
          anchorDate: null,
          totals: { "24h": null, "7d": null, "30d": null },
          message: "",
          delivered: false,
          dryRun: false,
          skipped: "already_delivered",
          reportsFetched: 0,
        };
      }
    } catch (err) {
      logger.error("[units-summary] ledger lookup failed; delivering anyway", { key, message: errorMessage(err) });
    }
  }

  const fetchReport =
    dependencies.fetchReport ??
    createSalesReportClient({
      signer: createTokenSigner(creds),
      vendorNumber: creds.vendorNumber,
      baseUrl: cfg.appStore.baseUrl,
      timeoutMs: cfg.appStore.timeoutMs,
      logger,
    }).fetchReport;
  const cache = createReportCache(fetchReport);

  const resolver = createAnchorResolver({
    lagDays: cfg.appStore.lagDays,
    autoProbe: cfg.appStore.autoProbe,
    maxProbeDays: cfg.appStore.maxProbeDays,
    fetchReport: cache.fetchReport,
    now,
    logger,
  });
  logger.info("[units-summary] resolving anchor", { strategy: resolver.strategy, lagDays: cfg.appStore.lagDays });
  const anchorDate = await resolver.resolve();
  if (!anchorDate) logger.warn("[units-summary] anchor date not found; totals will be N/A");

  const summary = await buildSummary({ anchorDate, fetchReport: cache.fetchReport, logger });
  const message = formatSummaryMessage(summary, now());
  const base = { anchorDate, totals: summary.totals, message, reportsFetched: cache.size() };
  logger.info("[units-summary] summary built", { anchorDate, totals: summary.totals, reportsFetched: cache.size() });

  if (!discord) {
    logger.info("[units-summary] dry-run: skipping delivery", { message });
    return { ...base, delivered: false, dryRun: true };
  }

  const notify =
    dependencies.notify ??
    createWebhookNotifier({
      webhookUrl: discord.webhookUrl,
      username: cfg.discord.username,
      timeoutMs: cfg.discord.timeoutMs,
      logger,
    }).send;

  const delivered = await notify(message);
  if (!delivered) {
    logger.error("[units-summary] failed to send Discord message");
    return { ...base, delivered: false, dryRun: false };
  }
  logger.info("[units-summary] Discord message sent", { anchorDate });

  if (ledger) {
    try {
      const first = await ledger.markDelivered(key);
      if (!first) logger.warn("[units-summary] delivery already recorded by another run", { key });
    } catch (err) {
      logger.error("[units-summary] ledger write failed", { key, message: errorMessage(err) });
    }
  }

  return { ...base, delivered: true, dryRun: false };
}

/** Whether a run did what it was asked: delivered, previewed, or skipped as a duplicate. */
export function runSucceeded(result: UnitsSummaryResult): boolean {
  return result.delivered || result.dryRun || result.skipped !== undefined;
}

export default runUnitsSummary;
