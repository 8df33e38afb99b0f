export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.TOOLGRAPH_LOG_LEVEL;
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function shouldLog(level: Exclude<LogLevel, "silent">): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data)}`;
  }
  return base;
}

// Everything goes to stderr so that reports printed on stdout stay parseable.
export const log = {
  debug(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("debug")) console.error(formatMsg("debug", msg, data));
  },
  info(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("info")) console.error(formatMsg("info", msg, data));
  },
  warn(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("warn")) console.error(formatMsg("warn", msg, data));
  },
  error(msg: string, data?: Record<string, unknown>): void {
    if (shouldLog("error")) console.error(formatMsg("error", msg, data));
  },
};
