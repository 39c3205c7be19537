export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

let currentLevel: LogLevel = "info";

const order: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function setLogLevel(level: LogLevel) {
  currentLevel = level;
}

function shouldLog(level: LogLevel) {
  return order[level] >= order[currentLevel];
}

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

// Console logger that prefixes every line with a component tag, e.g. "[hub]".
export function createLogger(tag: string): Logger {
  const prefix = `[${tag}]`;
  return {
    debug(...args) {
      if (shouldLog("debug")) console.debug(prefix, ...args);
    },
    info(...args) {
      if (shouldLog("info")) console.info(prefix, ...args);
    },
    warn(...args) {
      if (shouldLog("warn")) console.warn(prefix, ...args);
    },
    error(...args) {
      if (shouldLog("error")) console.error(prefix, ...args);
    },
  };
}
