import { Logger, noopLogger } from "../../config/logger";
import { ApiError, errorMessage } from "../../domain/errors";
import { VendorCheck } from "../../domain/types";
import { FetchLike } from "../http";
import { appStoreGet, TokenSigner } from "./appstore.sdk";

export const VENDORS_PATH = "/v1/vendors";

export interface VerifyVendorOptions {
  signer: TokenSigner;
  vendorNumber: string;
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

export function extractVendorNumbers(body: unknown): string[] {
  if (typeof body !== "object" || body === null || !("data" in body) || !Array.isArray(body.data)) return [];
  const out: string[] = [];
  for (const item of body.data) {
    const attrs: unknown = typeof item === "object" && item !== null && "attributes" in item ? item.attributes : null;
    if (typeof attrs !== "object" || attrs === null || !("vendorNumber" in attrs)) continue;
    const vendor = attrs.vendorNumber;
    if (typeof vendor === "string" && vendor) out.push(vendor);
    else if (typeof vendor === "number") out.push(String(vendor));
  }
  return out;
}

/** Confirms the configured vendor number is among those the key can access. */
export async function verifyVendor(options: VerifyVendorOptions): Promise<VendorCheck> {
  const { signer, vendorNumber, baseUrl, timeoutMs = 30_000, fetchImpl, logger = noopLogger } = options;
  try {
    const parsed = await appStoreGet({ baseUrl, path: VENDORS_PATH, signer, timeoutMs, fetchImpl, operation: "vendors" });
    if (!parsed.ok) {
      logger.error("vendor:verify:invalid_json", { message: parsed.message });
      return { kind: "failed", message: `Invalid JSON body: ${parsed.message}` };
    }
    const available = extractVendorNumbers(parsed.value);
    if (available.includes(vendorNumber)) {
      logger.info("vendor:verify:ok", { vendorNumber });
      return { kind: "verified", vendorNumber };
    }
    logger.warn("vendor:verify:missing", { vendorNumber, available });
    return { kind: "missing", vendorNumber, available };
  } catch (err) {
    if (err instanceof ApiError && err.statusCode === 403) {
      logger.error("vendor:verify:forbidden", { vendorNumber });
      return { kind: "forbidden" };
    }
    logger.error("vendor:verify:error", { message: errorMessage(err) });
    return { kind: "failed", message: errorMessage(err) };
  }
}

export default verifyVendor;
