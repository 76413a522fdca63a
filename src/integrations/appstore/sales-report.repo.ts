import { decodeReportContent, extractReportContent, parseUnitsFromTsv } from "../../adapters/sales-report.adapter";
import { Logger, noopLogger } from "../../config/logger";
import { ApiError, errorMessage } from "../../domain/errors";
import { DateKey, ReportRequest, ReportResult } from "../../domain/types";
import { FetchLike } from "../http";
import { appStoreGet, TokenSigner } from "./appstore.sdk";

export const SALES_REPORTS_PATH = "/v1/salesReports";

export interface SalesReportClientOptions {
  signer: TokenSigner;
  vendorNumber: string;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface SalesReportClient {
  fetchReport(date: DateKey): Promise<ReportResult>;
}

export function buildReportRequest(reportDate: DateKey, vendorNumber: string): ReportRequest {
  return {
    reportDate,
    frequency: "DAILY",
    reportSubType: "SUMMARY",
    reportType: "SALES",
    vendorNumber,
    version: "1_0",
  };
}

export function toQuery(req: ReportRequest): Record<string, string> {
  return {
    "filter[frequency]": req.frequency,
    "filter[reportDate]": req.reportDate,
    "filter[reportSubType]": req.reportSubType,
    "filter[reportType]": req.reportType,
    "filter[vendorNumber]": req.vendorNumber,
    "filter[version]": req.version,
  };
}

export function createSalesReportClient(options: SalesReportClientOptions): SalesReportClient {
  const { signer, vendorNumber, baseUrl, timeoutMs = 30_000, fetchImpl, logger = noopLogger } = options;

  async function fetchReport(date: DateKey): Promise<ReportResult> {
    const query = toQuery(buildReportRequest(date, vendorNumber));
    try {
      const parsed = await appStoreGet({
        baseUrl,
        path: SALES_REPORTS_PATH,
        query,
        signer,
        timeoutMs,
        fetchImpl,
        operation: "salesReports",
      });
      if (!parsed.ok) {
        logger.warn("report:fetch:invalid_json", { date, message: parsed.message });
        return { kind: "unavailable", date, reason: "empty_payload" };
      }

      const content = extractReportContent(parsed.value);
      if (!content) {
        logger.info("report:fetch:empty_payload", { date });
        return { kind: "unavailable", date, reason: "empty_payload" };
      }

      const units = parseUnitsFromTsv(decodeReportContent(content, logger));
      if (units === null) {
        logger.warn("report:parse:no_units_column", { date });
        return { kind: "unavailable", date, reason: "unparseable" };
      }
      logger.debug("report:fetch:parsed", { date, units });
      return { kind: "parsed", date, units };
    } catch (err) {
      if (err instanceof ApiError) {
        if (err.statusCode === 404) {
          logger.info("report:fetch:not_found", { date });
          return { kind: "unavailable", date, reason: "not_found" };
        }
        logger.error("report:fetch:http_error", { date, status: err.statusCode, body: err.responseBody });
        return { kind: "unavailable", date, reason: "http_error" };
      }
      logger.error("report:fetch:transport_error", { date, message: errorMessage(err) });
      return { kind: "unavailable", date, reason: "transport_error" };
    }
  }

  return { fetchReport };
}

export default createSalesReportClient;
