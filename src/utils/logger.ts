type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const COLORS = {
  debug: "\x1b[90m",
  info: "\x1b[36m",
  success: "\x1b[32m",
  warning: "\x1b[33m",
  error: "\x1b[31m",
} as const;

const RESET = "\x1b[0m";

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

const shouldLog = (level: LogLevel): boolean =>
  LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];

function describe(detail: unknown): string {
  if (detail === undefined) return "";
  if (detail instanceof Error) return ` ${detail.name}: ${detail.message}`;
  if (typeof detail === "string") return ` ${detail}`;
  try {
    return ` ${JSON.stringify(detail)}`;
  } catch {
    return ` ${String(detail)}`;
  }
}

function format(tag: keyof typeof COLORS, message: string, detail?: unknown): string {
  const label = tag.toUpperCase().padEnd(7);
  return `${COLORS[tag]}[${new Date().toISOString()}] ${label}${RESET} ${message}${describe(detail)}`;
}

export const logger = {
  debug(message: string, detail?: unknown): void {
    if (shouldLog("debug")) console.log(format("debug", message, detail));
  },
  info(message: string, detail?: unknown): void {
    if (shouldLog("info")) console.log(format("info", message, detail));
  },
  success(message: string, detail?: unknown): void {
    if (shouldLog("info")) console.log(format("success", message, detail));
  },
  warning(message: string, detail?: unknown): void {
    if (shouldLog("warn")) console.warn(format("warning", message, detail));
  },
  error(message: string, detail?: unknown): void {
    if (shouldLog("error")) console.error(format("error", message, detail));
  },
};

export default logger;
