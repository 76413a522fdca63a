import { Logger, noopLogger } from "../config/logger";
import { DateKey, FetchReportFn, PeriodLabel, Summary, SummaryPeriod } from "../domain/types";
import { aggregateUnits } from "./aggregate.service";

export const SUMMARY_PERIODS: readonly SummaryPeriod[] = [
  { label: "24h", days: 1 },
  { label: "7d", days: 7 },
  { label: "30d", days: 30 },
];

export const SUMMARY_TITLE = ":iphone: App Store Download Units Summary";

export interface BuildSummaryRequest {
  anchorDate: DateKey | null;
  fetchReport: FetchReportFn;
  logger?: Logger;
}

/** Every period is computed against the same anchor. */
export async function buildSummary(req: BuildSummaryRequest): Promise<Summary> {
  const { anchorDate, fetchReport, logger = noopLogger } = req;
  const totals: Record<PeriodLabel, number | null> = { "24h": null, "7d": null, "30d": null };
  if (!anchorDate) return { anchorDate: null, totals };

  for (const period of SUMMARY_PERIODS) {
    totals[period.label] = await aggregateUnits({ anchorDate, windowDays: period.days, fetchReport, logger });
    logger.debug("summary:period", { label: period.label, days: period.days, total: totals[period.label] });
  }
  return { anchorDate, totals };
}

function formatTimestamp(now: Date): string {
  const iso = now.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

export function formatSummaryMessage(summary: Summary, now: Date = new Date()): string {
  const lines = [SUMMARY_TITLE];
  lines.push(
    summary.anchorDate
      ? `Data through: ${summary.anchorDate} (UTC)`
      : "Data through: UNKNOWN (anchor date not found)"
  );
  for (const period of SUMMARY_PERIODS) {
    const value = summary.totals[period.label];
    lines.push(`• Period ${period.label}: ${value === null ? "N/A" : String(value)}`);
  }
  lines.push(`Timestamp: ${formatTimestamp(now)}`);
  return lines.join("\n");
}
