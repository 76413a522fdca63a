import { ConfigError } from "../domain/errors";
import { createLogger, isLogLevel, Logger, LogLevel } from "./logger";

export const DEFAULT_APPSTORE_BASE_URL = "https://api.appstoreconnect.apple.com";

export interface AppConfig {
  appStore: {
    issuerId?: string;
    keyId?: string;
    privateKey?: string;
    vendorNumber?: string;
    baseUrl: string;
    timeoutMs: number;
    lagDays: number;
    autoProbe: boolean;
    maxProbeDays: number;
  };
  discord: {
    webhookUrl?: string;
    username?: string;
    timeoutMs: number;
  };
  dynamo: {
    tableName?: string;
    ttlDays?: number;
    region?: string;
    endpoint?: string;
  };
  logLevel: LogLevel;
  logDir?: string;
}

/** Credentials that must be present before the first App Store request. */
export interface AppStoreCredentials {
  issuerId: string;
  keyId: string;
  privateKey: string;
  vendorNumber: string;
}

type Env = Record<string, string | undefined>;

function str(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function nonNegative(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const n = Number(value);
  return Number.isFinite(n) && n >= 0 ? n : fallback;
}

function positive(value: string | undefined, fallback: number): number {
  const n = nonNegative(value, fallback);
  return n > 0 ? n : fallback;
}

function nonNegativeInt(value: string | undefined, fallback: number): number {
  const n = nonNegative(value, fallback);
  return Number.isInteger(n) ? n : fallback;
}

export function parseBool(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const v = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return fallback;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const debug = parseBool(env.APPSTORE_DEBUG, false);
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    appStore: {
      issuerId: str(env.APPSTORE_ISSUER_ID),
      keyId: str(env.APPSTORE_KEY_ID),
      privateKey: str(env.APPSTORE_PRIVATE_KEY),
      vendorNumber: str(env.APPSTORE_VENDOR_NUMBER),
      baseUrl: (str(env.APPSTORE_BASE_URL) ?? DEFAULT_APPSTORE_BASE_URL).replace(/\/+$/, ""),
      timeoutMs: positive(env.APPSTORE_TIMEOUT, 30) * 1000,
      lagDays: nonNegativeInt(env.APPSTORE_LAG_DAYS, 1),
      autoProbe: parseBool(env.APPSTORE_AUTO_PROBE, true),
      maxProbeDays: nonNegativeInt(env.APPSTORE_MAX_PROBE_DAYS, 5),
    },
    discord: {
      webhookUrl: str(env.DISCORD_WEBHOOK_URL),
      username: str(env.DISCORD_USERNAME),
      timeoutMs: positive(env.DISCORD_TIMEOUT, 15) * 1000,
    },
    dynamo: {
      tableName: str(env.DYNAMO_TABLE_NAME),
      ttlDays: env.DYNAMO_TTL_DAYS ? nonNegativeInt(env.DYNAMO_TTL_DAYS, 14) : undefined,
      region: str(env.DYNAMO_REGION),
      endpoint: str(env.DYNAMO_ENDPOINT),
    },
    // APPSTORE_DEBUG wins over LOG_LEVEL
    logLevel: debug ? "debug" : isLogLevel(level) ? level : "info",
    logDir: str(env.LOG_DIR),
  };
}

export function createConfiguredLogger(cfg: AppConfig): Logger {
  return createLogger(cfg.logLevel, { logDir: cfg.logDir });
}

export function requireAppStoreConfig(cfg: AppConfig): AppStoreCredentials {
  const { issuerId, keyId, privateKey, vendorNumber } = cfg.appStore;
  const missing: string[] = [];
  if (!issuerId) missing.push("APPSTORE_ISSUER_ID");
  if (!keyId) missing.push("APPSTORE_KEY_ID");
  if (!privateKey) missing.push("APPSTORE_PRIVATE_KEY");
  if (!vendorNumber) missing.push("APPSTORE_VENDOR_NUMBER");
  if (!issuerId || !keyId || !privateKey || !vendorNumber) throw new ConfigError(missing);
  return { issuerId, keyId, privateKey, vendorNumber };
}

export function requireDiscordConfig(cfg: AppConfig): { webhookUrl: string } {
  const webhookUrl = cfg.discord.webhookUrl;
  if (!webhookUrl) throw new ConfigError(["DISCORD_WEBHOOK_URL"]);
  return { webhookUrl };
}
