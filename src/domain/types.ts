export type DateKey = string; // YYYY-MM-DD, UTC calendar date

export interface ReportRequest {
  reportDate: DateKey;
  frequency: "DAILY";
  reportSubType: "SUMMARY";
  reportType: "SALES";
  vendorNumber: string;
  version: "1_0";
}

export type UnavailableReason =
  | "not_found" // 404, report not published yet
  | "empty_payload"
  | "unparseable" // no Units column in the header
  | "http_error"
  | "transport_error";

export type ReportResult =
  | { kind: "parsed"; date: DateKey; units: number }
  | { kind: "unavailable"; date: DateKey; reason: UnavailableReason };

export type FetchReportFn = (date: DateKey) => Promise<ReportResult>;

export type PeriodLabel = "24h" | "7d" | "30d";

export interface SummaryPeriod {
  label: PeriodLabel;
  days: number;
}

export interface Summary {
  anchorDate: DateKey | null;
  totals: Record<PeriodLabel, number | null>;
}

export type VendorCheck =
  | { kind: "verified"; vendorNumber: string }
  | { kind: "missing"; vendorNumber: string; available: string[] }
  | { kind: "forbidden" }
  | { kind: "failed"; message: string };

export type Clock = () => Date;
