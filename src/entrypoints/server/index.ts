import "dotenv/config";

import { createServer, ServerResponse } from "http";
import { createConfiguredLogger, loadConfig } from "../../config/config";
import { errorMessage } from "../../domain/errors";
import { runSucceeded, runUnitsSummaryWorkflow } from "../../workflows/units-summary/orchestrator";

const config = loadConfig();
const logger = createConfiguredLogger(config);

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("Content-Type", "application/json");
  res.setHeader("Content-Length", Buffer.byteLength(json));
  res.end(json);
}

function flag(params: URLSearchParams, name: string): boolean {
  const v = params.get(name);
  return v === "1" || v === "true";
}

const server = createServer((req, res) => {
  const url = new URL(req.url || "/", "http://localhost");
  const method = req.method || "GET";

  if (method === "GET" && url.pathname === "/health") {
    return sendJson(res, 200, { ok: true });
  }
  if (method !== "POST" || url.pathname !== "/run") {
    return sendJson(res, 404, { error: "Not Found" });
  }

  runUnitsSummaryWorkflow({
    dryRun: flag(url.searchParams, "dryRun"),
    force: flag(url.searchParams, "force"),
    config,
    logger,
  })
    .then((result) => {
      const ok = runSucceeded(result);
      sendJson(res, ok ? 200 : 502, { ok, result });
    })
    .catch((err: unknown) => {
      const message = errorMessage(err);
      logger.error("server:run:error", { message });
      sendJson(res, 500, { ok: false, error: message });
    });
});

const port = Number(process.env.PORT || 3000);
server.listen(port, () => {
  // eslint-disable-next-line no-console
  console.log(`dev server listening on http://localhost:${port}`);
});
