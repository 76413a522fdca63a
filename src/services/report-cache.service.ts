import { DateKey, FetchReportFn, ReportResult } from "../domain/types";

export interface ReportCache {
  fetchReport: FetchReportFn;
  size(): number;
}

/**
 * Memoizes per-date fetches for a single run, so the winning probe and the
 * overlapping 1/7/30-day windows hit the API once per date. Create a new
 * cache for every run.
 */
export function createReportCache(fetchReport: FetchReportFn): ReportCache {
  const entries = new Map<DateKey, Promise<ReportResult>>();
  return {
    fetchReport(date) {
      let pending = entries.get(date);
      if (!pending) {
        pending = fetchReport(date);
        entries.set(date, pending);
      }
      return pending;
    },
    size: () => entries.size,
  };
}
