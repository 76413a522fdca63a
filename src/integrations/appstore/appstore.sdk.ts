import jwt from "jsonwebtoken";
import { ApiError } from "../../domain/errors";
import { defaultFetch, FetchLike, JsonParseResult, parseJsonBody, readBodyExcerpt, timeoutSignal } from "../http";

export const APPSTORE_AUDIENCE = "appstoreconnect-v1";
// The API rejects tokens living longer than 20 minutes
export const TOKEN_TTL_SECONDS = 15 * 60;

export interface AppStoreAuthConfig {
  issuerId: string;
  keyId: string;
  privateKey: string;
}

export interface TokenSigner {
  sign(): string;
}

/**
 * Accepts a PEM key as stored in env files: real newlines, literal `\n`
 * escapes, a single-line PEM, or the bare base64 PKCS#8 body.
 */
export function normalizePrivateKey(raw: string): string {
  const unescaped = raw.replace(/\\n/g, "\n").trim();
  const match = /-----BEGIN ([A-Z ]+)-----([\s\S]*?)-----END \1-----/.exec(unescaped);
  const label = match ? match[1] : "PRIVATE KEY";
  const body = (match ? match[2] : unescaped).replace(/\s+/g, "");
  const lines = body.match(/.{1,64}/g) ?? [];
  return [`-----BEGIN ${label}-----`, ...lines, `-----END ${label}-----`].join("\n");
}

/**
 * Creates the ES256 signer for App Store Connect. Every call to `sign()`
 * issues a new token; callers sign once per request and never reuse one.
 */
export function createTokenSigner(auth: AppStoreAuthConfig, clock: () => number = Date.now): TokenSigner {
  const key = normalizePrivateKey(auth.privateKey);
  return {
    sign() {
      const now = Math.floor(clock() / 1000);
      return jwt.sign(
        { iss: auth.issuerId, exp: now + TOKEN_TTL_SECONDS, aud: APPSTORE_AUDIENCE },
        key,
        { algorithm: "ES256", keyid: auth.keyId, noTimestamp: true, header: { alg: "ES256", typ: "JWT" } }
      );
    },
  };
}

export interface AppStoreRequest {
  baseUrl: string;
  path: string;
  query?: Record<string, string>;
  signer: TokenSigner;
  timeoutMs: number;
  operation: string;
  fetchImpl?: FetchLike;
}

export function buildUrl(baseUrl: string, path: string, query?: Record<string, string>): string {
  const qs = query ? new URLSearchParams(query).toString() : "";
  return `${baseUrl}${path}${qs ? `?${qs}` : ""}`;
}

/**
 * Authenticated GET. Throws ApiError on a non-2xx status; a body that is not
 * JSON resolves to `{ ok: false }` rather than throwing.
 */
export async function appStoreGet(req: AppStoreRequest): Promise<JsonParseResult> {
  const fetchImpl = req.fetchImpl ?? defaultFetch;
  const res = await fetchImpl(buildUrl(req.baseUrl, req.path, req.query), {
    method: "GET",
    headers: { Authorization: `Bearer ${req.signer.sign()}` },
    signal: timeoutSignal(req.timeoutMs),
  });
  if (!res.ok) {
    throw new ApiError("appstore", req.operation, res.status, { responseBody: await readBodyExcerpt(res) });
  }
  return parseJsonBody(await res.text());
}
