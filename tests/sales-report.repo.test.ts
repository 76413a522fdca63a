import { test } from "node:test";
import assert from "node:assert/strict";
import zlib from "node:zlib";
import { createSalesReportClient, SALES_REPORTS_PATH } from "../src/integrations/appstore/sales-report.repo";
import type { TokenSigner } from "../src/integrations/appstore/appstore.sdk";
import type { HttpRequestInit, HttpResponseLike } from "../src/integrations/http";
import { captureLogger, fakeResponse, recordingFetch, reportEnvelope } from "./helpers";

const BASE_URL = "https://api.example.test";
const TSV = "Provider\tSKU\tUnits\nA\t1\t42\nA\t2\t8\n";

function countingSigner(): TokenSigner & { count: () => number } {
  let n = 0;
  return { sign: () => `token-${++n}`, count: () => n };
}

function clientFor(respond: (url: string, init?: HttpRequestInit) => HttpResponseLike | Promise<HttpResponseLike>) {
  const { fetchImpl, requests } = recordingFetch(respond);
  const { logger, entries } = captureLogger();
  const signer = countingSigner();
  const client = createSalesReportClient({
    signer,
    vendorNumber: "85000000",
    baseUrl: BASE_URL,
    timeoutMs: 5000,
    fetchImpl,
    logger,
  });
  return { client, requests, entries, signer };
}

test("requests the daily sales summary with all six filters and a bearer token", async () => {
  const { client, requests } = clientFor(() =>
    fakeResponse(200, reportEnvelope(Buffer.from(TSV).toString("base64")))
  );
  await client.fetchReport("2026-10-15");

  assert.equal(requests.length, 1);
  const url = new URL(requests[0].url);
  assert.equal(url.origin + url.pathname, BASE_URL + SALES_REPORTS_PATH);
  assert.deepEqual(Object.fromEntries(url.searchParams), {
    "filter[frequency]": "DAILY",
    "filter[reportDate]": "2026-10-15",
    "filter[reportSubType]": "SUMMARY",
    "filter[reportType]": "SALES",
    "filter[vendorNumber]": "85000000",
    "filter[version]": "1_0",
  });
  assert.equal(requests[0].init?.method, "GET");
  assert.equal(requests[0].init?.headers?.Authorization, "Bearer token-1");
  assert.ok(requests[0].init?.signal);
});

test("signs a fresh token for every request", async () => {
  const { client, requests, signer } = clientFor(() => fakeResponse(404));
  await client.fetchReport("2026-10-15");
  await client.fetchReport("2026-10-14");
  assert.equal(signer.count(), 2);
  assert.deepEqual(
    requests.map((r) => r.init?.headers?.Authorization),
    ["Bearer token-1", "Bearer token-2"]
  );
});

test("parses a plain base64 report", async () => {
  const { client } = clientFor(() => fakeResponse(200, reportEnvelope(Buffer.from(TSV).toString("base64"))));
  assert.deepEqual(await client.fetchReport("2026-10-15"), { kind: "parsed", date: "2026-10-15", units: 50 });
});

test("parses a gzip-compressed report", async () => {
  const gz = zlib.gzipSync(Buffer.from(TSV));
  const { client } = clientFor(() => fakeResponse(200, reportEnvelope(gz.toString("base64"))));
  assert.deepEqual(await client.fetchReport("2026-10-15"), { kind: "parsed", date: "2026-10-15", units: 50 });
});

test("a 404 is not_found and logged at info", async () => {
  const { client, entries } = clientFor(() => fakeResponse(404, "not here"));
  assert.deepEqual(await client.fetchReport("2026-10-17"), {
    kind: "unavailable",
    date: "2026-10-17",
    reason: "not_found",
  });
  assert.deepEqual(entries, [{ level: "info", msg: "report:fetch:not_found", ctx: { date: "2026-10-17" } }]);
});

test("other HTTP errors are http_error and logged at error", async () => {
  const { client, entries } = clientFor(() => fakeResponse(500, "boom"));
  assert.deepEqual(await client.fetchReport("2026-10-17"), {
    kind: "unavailable",
    date: "2026-10-17",
    reason: "http_error",
  });
  assert.deepEqual(entries, [
    { level: "error", msg: "report:fetch:http_error", ctx: { date: "2026-10-17", status: 500, body: "boom" } },
  ]);
});

test("an empty items array is empty_payload and does not throw", async () => {
  const { client } = clientFor(() => fakeResponse(200, { data: [] }));
  assert.deepEqual(await client.fetchReport("2026-10-16"), {
    kind: "unavailable",
    date: "2026-10-16",
    reason: "empty_payload",
  });
});

test("a missing reportContent or non-JSON body is empty_payload", async () => {
  const missing = clientFor(() => fakeResponse(200, { data: [{ attributes: {} }] }));
  assert.equal((await missing.client.fetchReport("2026-10-16")).kind, "unavailable");

  const html = clientFor(() => fakeResponse(200, "<html></html>"));
  const result = await html.client.fetchReport("2026-10-16");
  assert.deepEqual(result, { kind: "unavailable", date: "2026-10-16", reason: "empty_payload" });
  assert.equal(html.entries[0].msg, "report:fetch:invalid_json");
});

test("a report without a Units column is unparseable", async () => {
  const content = Buffer.from("Provider\tSKU\nA\t1\n").toString("base64");
  const { client } = clientFor(() => fakeResponse(200, reportEnvelope(content)));
  assert.deepEqual(await client.fetchReport("2026-10-16"), {
    kind: "unavailable",
    date: "2026-10-16",
    reason: "unparseable",
  });
});

test("a report with the column but no usable rows is parsed as zero", async () => {
  const content = Buffer.from("Provider\tUnits\nA\tx\n").toString("base64");
  const { client } = clientFor(() => fakeResponse(200, reportEnvelope(content)));
  assert.deepEqual(await client.fetchReport("2026-10-16"), { kind: "parsed", date: "2026-10-16", units: 0 });
});

test("transport faults become transport_error instead of rejecting", async () => {
  const { client, entries } = clientFor(() => {
    throw new Error("socket hang up");
  });
  assert.deepEqual(await client.fetchReport("2026-10-16"), {
    kind: "unavailable",
    date: "2026-10-16",
    reason: "transport_error",
  });
  assert.deepEqual(entries, [
    { level: "error", msg: "report:fetch:transport_error", ctx: { date: "2026-10-16", message: "socket hang up" } },
  ]);
});
