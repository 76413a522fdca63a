import "dotenv/config";

import { createConfiguredLogger, loadConfig } from "../../../config/config";
import { ConfigError, errorMessage } from "../../../domain/errors";
import { runSucceeded, runUnitsSummaryWorkflow } from "../orchestrator";

// Covers both API Gateway proxy events and EventBridge scheduled events (no body)
interface InvocationEventLike {
  headers?: Record<string, string | undefined>;
  body?: string | null;
}

interface APIGatewayProxyResultLike {
  statusCode: number;
  headers?: Record<string, string>;
  body: string;
}

interface RunFlags {
  dryRun: boolean;
  force: boolean;
}

function json(statusCode: number, body: unknown): APIGatewayProxyResultLike {
  return {
    statusCode,
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  };
}

export function parseRunFlags(body: string | null | undefined): RunFlags | null {
  const flags: RunFlags = { dryRun: false, force: false };
  if (!body) return flags;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return null;
  }
  if (parsed && typeof parsed === "object") {
    if ("dryRun" in parsed) flags.dryRun = Boolean(parsed.dryRun);
    if ("force" in parsed) flags.force = Boolean(parsed.force);
  }
  return flags;
}

export async function handler(event: InvocationEventLike = {}): Promise<APIGatewayProxyResultLike> {
  const flags = parseRunFlags(event.body);
  if (!flags) return json(400, { ok: false, error: "Invalid JSON body" });

  const config = loadConfig();
  const logger = createConfiguredLogger(config);
  try {
    const result = await runUnitsSummaryWorkflow({ ...flags, config, logger });
    const ok = runSucceeded(result);
    // A failed webhook is reported, not retried
    return json(ok ? 200 : 502, { ok, result });
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error("lambda:config_error", { missing: err.missing });
      return json(500, { ok: false, error: err.message, missing: err.missing });
    }
    const message = errorMessage(err);
    logger.error("lambda:run:error", { message });
    return json(500, { ok: false, error: message });
  }
}

export default handler;
