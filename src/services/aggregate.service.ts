import { Logger, noopLogger } from "../config/logger";
import { windowDates } from "../domain/dates";
import { DateKey, FetchReportFn } from "../domain/types";

export interface AggregateRequest {
  anchorDate: DateKey;
  windowDays: number;
  fetchReport: FetchReportFn;
  logger?: Logger;
}

/**
 * Best-effort sum of units over the window ending at the anchor. Missing
 * days are left out of the sum; null only when no day had data.
 */
export async function aggregateUnits(req: AggregateRequest): Promise<number | null> {
  const { anchorDate, windowDays, fetchReport, logger = noopLogger } = req;
  const dates = windowDates(anchorDate, windowDays);

  const found: number[] = [];
  const missing: DateKey[] = [];
  for (const date of dates) {
    const result = await fetchReport(date);
    if (result.kind === "parsed") found.push(result.units);
    else missing.push(date);
  }

  if (missing.length) {
    logger.debug("aggregate:partial", { anchorDate, windowDays, available: found.length, missing });
  }
  if (found.length === 0) return null;
  return found.reduce((acc, n) => acc + n, 0);
}

export default aggregateUnits;
