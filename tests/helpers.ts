import { generateKeyPairSync } from "node:crypto";
import type { Logger } from "../src/config/logger";
import type { DateKey, FetchReportFn, ReportResult } from "../src/domain/types";
import type { FetchLike, HttpRequestInit, HttpResponseLike } from "../src/integrations/http";

export { noopLogger } from "../src/config/logger";

export interface LogEntry {
  level: keyof Logger;
  msg: string;
  ctx?: Record<string, unknown>;
}

export function captureLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const push = (level: keyof Logger) => (msg: string, ctx?: Record<string, unknown>) => {
    entries.push({ level, msg, ctx });
  };
  return {
    entries,
    logger: { debug: push("debug"), info: push("info"), warn: push("warn"), error: push("error") },
  };
}

export function fakeResponse(status: number, body: unknown = ""): HttpResponseLike {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return {
    ok: status >= 200 && status < 300,
    status,
    text: async () => text,
  };
}

export interface RecordedRequest {
  url: string;
  init?: HttpRequestInit;
}

export function recordingFetch(
  respond: (url: string, init?: HttpRequestInit) => HttpResponseLike | Promise<HttpResponseLike>
): { fetchImpl: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  return {
    requests,
    fetchImpl: async (url, init) => {
      requests.push({ url, init });
      return respond(url, init);
    },
  };
}

export function reportEnvelope(contentB64: string): unknown {
  return { data: [{ type: "salesReports", attributes: { reportContent: contentB64 } }] };
}

/** fetchReport backed by a date → units table; other dates are not_found. */
export function tableFetchReport(units: Record<DateKey, number>): { fetchReport: FetchReportFn; calls: DateKey[] } {
  const calls: DateKey[] = [];
  return {
    calls,
    fetchReport: async (date): Promise<ReportResult> => {
      calls.push(date);
      const value = units[date];
      return value === undefined
        ? { kind: "unavailable", date, reason: "not_found" }
        : { kind: "parsed", date, units: value };
    },
  };
}

export function testKeyPair(): { privateKey: string; publicKey: string } {
  const { privateKey, publicKey } = generateKeyPairSync("ec", { namedCurve: "prime256v1" });
  return {
    privateKey: privateKey.export({ type: "pkcs8", format: "pem" }).toString(),
    publicKey: publicKey.export({ type: "spki", format: "pem" }).toString(),
  };
}

export const fixedNow = (iso: string) => () => new Date(iso);
