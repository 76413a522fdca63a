import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug: (msg: string, ctx?: Record<string, unknown>) => void;
  info: (msg: string, ctx?: Record<string, unknown>) => void;
  warn: (msg: string, ctx?: Record<string, unknown>) => void;
  error: (msg: string, ctx?: Record<string, unknown>) => void;
}

export interface LoggerOptions {
  // Per-run log file directory; console only when unset
  logDir?: string;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((lvl) => lvl === value);
}

export function createLogger(level: LogLevel = "info", options: LoggerOptions = {}): Logger {
  const minIdx = LEVELS.indexOf(level);

  let fileStream: fs.WriteStream | null = null;
  if (options.logDir) {
    const runStamp = new Date().toISOString().replace(/[:.]/g, "-");
    fs.mkdirSync(options.logDir, { recursive: true });
    const filePath = path.join(options.logDir, `run-${runStamp}.log`);
    fileStream = fs.createWriteStream(filePath, { flags: "a" });
    fileStream.on("error", (err) => {
      console.error(`${new Date().toISOString()} [error] logger:file:disabled ${JSON.stringify({ filePath, message: err.message })}`);
      fileStream = null;
    });
  }

  function shouldLog(lvl: LogLevel): boolean {
    return LEVELS.indexOf(lvl) >= minIdx;
  }

  function log(lvl: LogLevel, msg: string, ctx?: Record<string, unknown>) {
    if (!shouldLog(lvl)) return;
    const payload = ctx ? ` ${JSON.stringify(ctx)}` : "";
    const ts = new Date().toISOString();
    const line = `${ts} [${lvl}] ${msg}${payload}`;
    // eslint-disable-next-line no-console
    console[lvl === "debug" ? "log" : lvl](line);
    if (fileStream) fileStream.write(line + "\n");
  }

  return {
    debug: (msg, ctx) => log("debug", msg, ctx),
    info: (msg, ctx) => log("info", msg, ctx),
    warn: (msg, ctx) => log("warn", msg, ctx),
    error: (msg, ctx) => log("error", msg, ctx),
  };
}

export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export default createLogger;
