type LogLevel = "debug" | "info" | "warn" | "error";

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function parseLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  const match = LEVELS.find((level) => level === normalized);
  if (match) {
    return match;
  }
  return normalized === "silent" ? "error" : "info";
}

let threshold: LogLevel = parseLevel(process.env.LOG_LEVEL);

export function setLogLevel(level: string | undefined): void {
  threshold = parseLevel(level);
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  const logger = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  if (context && Object.keys(context).length > 0) {
    logger(`[${level}] ${message}`, context);
    return;
  }
  logger(`[${level}] ${message}`);
};

export const logInfo: LoggerFn = (message, context) => emit("info", message, context);
export const logWarning: LoggerFn = (message, context) => emit("warn", message, context);
export const logError: LoggerFn = (message, context) => emit("error", message, context);
export const logDebug: LoggerFn = (message, context) => emit("debug", message, context);
