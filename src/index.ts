export { runUnitsSummary } from "./services/units-summary.service";
export type { UnitsSummaryOptions, UnitsSummaryResult, UnitsSummaryDependencies } from "./services/units-summary.service";
export { createAnchorResolver, fixedLagAnchor, probingAnchor } from "./services/anchor.service";
export type { AnchorResolver, AnchorOptions } from "./services/anchor.service";
export { aggregateUnits } from "./services/aggregate.service";
export { buildSummary, formatSummaryMessage, SUMMARY_PERIODS } from "./services/summary.service";
export { createReportCache } from "./services/report-cache.service";
export { createTokenSigner } from "./integrations/appstore/appstore.sdk";
export { createSalesReportClient } from "./integrations/appstore/sales-report.repo";
export { verifyVendor } from "./integrations/appstore/vendors.repo";
export { createWebhookNotifier } from "./integrations/discord/webhook.sdk";
export { parseUnitsFromTsv, decodeReportContent } from "./adapters/sales-report.adapter";
export { windowDates } from "./domain/dates";
export { createConfiguredLogger, loadConfig } from "./config/config";
export { createLogger } from "./config/logger";
export type { Logger } from "./config/logger";
export * from "./domain/types";
export * from "./domain/errors";

export { runUnitsSummary as default } from "./services/units-summary.service";
