import { Logger, noopLogger } from "../../config/logger";
import { errorMessage } from "../../domain/errors";
import { defaultFetch, FetchLike, readBodyExcerpt, timeoutSignal } from "../http";

export interface WebhookNotifierOptions {
  webhookUrl: string;
  username?: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export interface WebhookPayload {
  content: string;
  username?: string;
}

export type NotifyFn = (content: string, username?: string) => Promise<boolean>;

export interface WebhookNotifier {
  send: NotifyFn;
}

export function createWebhookNotifier(options: WebhookNotifierOptions): WebhookNotifier {
  const { webhookUrl, timeoutMs = 15_000, fetchImpl = defaultFetch, logger = noopLogger } = options;

  async function send(content: string, username: string | undefined = options.username): Promise<boolean> {
    const payload: WebhookPayload = { content };
    if (username) payload.username = username;
    try {
      const res = await fetchImpl(webhookUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: timeoutSignal(timeoutMs),
      });
      if (res.status >= 400) {
        logger.error("discord:webhook:http_error", { status: res.status, body: await readBodyExcerpt(res) });
        return false;
      }
      return true;
    } catch (err) {
      logger.error("discord:webhook:error", { message: errorMessage(err) });
      return false;
    }
  }

  return { send };
}

export default createWebhookNotifier;
