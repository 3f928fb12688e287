import { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel } from "@/lib/config";

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

// Console logger with a "[scope]" prefix
export function createLogger(scope: string, level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const min = LOG_LEVELS.indexOf(level);
  const on = (l: Exclude<LogLevel, "silent">) => LOG_LEVELS.indexOf(l) >= min;
  const tag = `[${scope}]`;
  return {
    debug: (...args) => {
      if (on("debug")) console.debug(tag, ...args);
    },
    info: (...args) => {
      if (on("info")) console.info(tag, ...args);
    },
    warn: (...args) => {
      if (on("warn")) console.warn(tag, ...args);
    },
    error: (...args) => {
      if (on("error")) console.error(tag, ...args);
    },
  };
}
