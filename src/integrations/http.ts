// Narrow view of the global fetch so integrations can be driven by in-process fakes

export interface HttpRequestInit {
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  statusText?: string;
  text(): Promise<string>;
}

export type FetchLike = (url: string, init?: HttpRequestInit) => Promise<HttpResponseLike>;

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export function timeoutSignal(timeoutMs: number): AbortSignal {
  return AbortSignal.timeout(timeoutMs);
}

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; message: string };

export function parseJsonBody(text: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, message: err instanceof Error ? err.message : String(err) };
  }
}

export async function readBodyExcerpt(res: HttpResponseLike, max = 500): Promise<string> {
  const txt = await res.text().catch(() => "<no body>");
  return txt.length > max ? `${txt.slice(0, max)}…` : txt;
}
