import zlib from "zlib";
import { Logger, noopLogger } from "../config/logger";
import { errorMessage } from "../domain/errors";

const UNITS_COLUMN = "Units";
const INTEGER = /^[+-]?\d+$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pulls `data[0].attributes.reportContent` out of a salesReports response.
 * Returns null for anything that does not carry a non-empty string there.
 */
export function extractReportContent(body: unknown): string | null {
  if (!isRecord(body)) return null;
  const items = body.data;
  if (!Array.isArray(items) || items.length === 0) return null;
  const first: unknown = items[0];
  if (!isRecord(first) || !isRecord(first.attributes)) return null;
  const content = first.attributes.reportContent;
  return typeof content === "string" && content.length > 0 ? content : null;
}

export function isGzip(bytes: Uint8Array): boolean {
  return bytes.length >= 2 && bytes[0] === 0x1f && bytes[1] === 0x8b;
}

export function decodeReportContent(contentB64: string, logger: Logger = noopLogger): string {
  let bytes: Buffer = Buffer.from(contentB64, "base64");
  if (isGzip(bytes)) {
    try {
      bytes = zlib.gunzipSync(bytes);
    } catch (err) {
      // Keep the undecompressed bytes; the parser decides if they are usable
      logger.warn("report:decode:gunzip_failed", { bytes: bytes.length, message: errorMessage(err) });
    }
  }
  // Invalid UTF-8 sequences become U+FFFD
  return bytes.toString("utf8");
}

function findUnitsColumn(header: string[]): number {
  const exact = header.indexOf(UNITS_COLUMN);
  if (exact >= 0) return exact;
  return header.findIndex((h) => h.toLowerCase() === UNITS_COLUMN.toLowerCase());
}

/**
 * Sums the Units column of a tab-separated sales summary.
 * null when there is no Units column; 0 when the column exists but no row
 * carries a usable integer.
 */
export function parseUnitsFromTsv(tsv: string): number | null {
  const lines = tsv.split(/\r\n|\r|\n/).filter((l) => l.trim().length > 0);
  if (lines.length === 0) return null;

  const unitsIdx = findUnitsColumn(lines[0].split("\t"));
  if (unitsIdx < 0) return null;

  let total = 0;
  for (const row of lines.slice(1)) {
    const cols = row.split("\t");
    if (cols.length <= unitsIdx) continue;
    const val = cols[unitsIdx].trim();
    if (!val || !INTEGER.test(val)) continue;
    total += Number.parseInt(val, 10);
  }
  // Refund rows are negative; a net-negative day counts as zero
  return Math.max(0, total);
}

export default parseUnitsFromTsv;
