import { Logger, noopLogger } from "../config/logger";
import { addDays, todayUtc } from "../domain/dates";
import { Clock, DateKey, FetchReportFn, UnavailableReason } from "../domain/types";

export interface AnchorResolver {
  readonly strategy: "fixed-lag" | "probing";
  resolve(): Promise<DateKey | null>;
}

export interface AnchorOptions {
  lagDays?: number;
  autoProbe?: boolean;
  // Extra days searched beyond the lag-based candidate
  maxProbeDays?: number;
  fetchReport: FetchReportFn;
  now?: Clock;
  logger?: Logger;
}

export function baseCandidate(lagDays: number, now: Date): DateKey {
  return addDays(todayUtc(now), -lagDays);
}

export function fixedLagAnchor(lagDays: number, now: Clock = () => new Date()): AnchorResolver {
  return {
    strategy: "fixed-lag",
    async resolve() {
      return baseCandidate(lagDays, now());
    },
  };
}

export function probingAnchor(options: AnchorOptions): AnchorResolver {
  const { lagDays = 1, maxProbeDays = 5, fetchReport, now = () => new Date(), logger = noopLogger } = options;
  return {
    strategy: "probing",
    async resolve() {
      const base = baseCandidate(lagDays, now());
      const misses: Partial<Record<UnavailableReason, number>> = {};
      for (let offset = 0; offset <= maxProbeDays; offset++) {
        const candidate = addDays(base, -offset);
        const result = await fetchReport(candidate);
        if (result.kind === "parsed") {
          logger.info("anchor:probe:found", { date: candidate, offset });
          return candidate;
        }
        misses[result.reason] = (misses[result.reason] ?? 0) + 1;
        logger.debug("anchor:probe:miss", { date: candidate, offset, reason: result.reason });
      }
      // Absent either way; the reason counts tell API faults from "no data yet"
      logger.warn("anchor:probe:exhausted", { base, maxProbeDays, misses });
      return null;
    },
  };
}

/** Picks the strategy once, at construction time. */
export function createAnchorResolver(options: AnchorOptions): AnchorResolver {
  const { lagDays = 1, autoProbe = true } = options;
  return autoProbe ? probingAnchor(options) : fixedLagAnchor(lagDays, options.now);
}
