import { appConfig, type LogLevel } from "@/lib/config";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

export function createLogger(tag: string, level: LogLevel = appConfig.logLevel): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_RANK[candidate] >= LEVEL_RANK[level];
  return {
    debug: (...args) => {
      if (enabled("debug")) console.log(`[${tag}:debug]`, ...args);
    },
    info: (...args) => {
      if (enabled("info")) console.log(`[${tag}]`, ...args);
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(`[${tag}]`, ...args);
    },
    error: (...args) => {
      if (enabled("error")) console.error(`[${tag}]`, ...args);
    },
  };
}

export const logger = createLogger("csv-insight");
