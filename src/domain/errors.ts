/**
 * Error types shared by the integrations. Fetch paths convert these into
 * `ReportResult` / `VendorCheck` values; only `ConfigError` is meant to
 * escape a run.
 */

export interface IntegrationErrorOptions {
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class IntegrationError extends Error {
  public readonly platform: string;
  public readonly operation: string;
  public readonly context?: Record<string, unknown>;
  public readonly originalError?: unknown;

  constructor(platform: string, operation: string, message: string, options: IntegrationErrorOptions = {}) {
    super(`[${platform}] ${operation}: ${message}`);
    this.name = "IntegrationError";
    this.platform = platform;
    this.operation = operation;
    this.context = options.context;
    this.originalError = options.cause;
  }
}

export class ApiError extends IntegrationError {
  public readonly statusCode: number;
  public readonly responseBody?: string;

  constructor(
    platform: string,
    operation: string,
    statusCode: number,
    options: IntegrationErrorOptions & { responseBody?: string } = {}
  ) {
    super(platform, operation, `HTTP ${statusCode}`, options);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.responseBody = options.responseBody;
  }
}

/** Missing or unusable configuration; raised before any network activity. */
export class ConfigError extends Error {
  public readonly missing: string[];

  constructor(missing: string[], message?: string) {
    super(message ?? `Missing required environment variable(s): ${missing.join(", ")}`);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
