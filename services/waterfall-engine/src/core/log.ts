export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
  debug(msg: string, meta?: Record<string, unknown>): void;
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= threshold;

  return {
    debug: (msg, meta) => {
      if (enabled("debug")) {
        console.debug(`[DEBUG] ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },
    info: (msg, meta) => {
      if (enabled("info")) {
        console.log(`[INFO] ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },
    warn: (msg, meta) => {
      if (enabled("warn")) {
        console.warn(`[WARN] ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },
    error: (msg, meta) => {
      if (enabled("error")) {
        console.error(`[ERROR] ${msg}`, meta ? JSON.stringify(meta) : "");
      }
    },
  };
}

export const silentLogger: Logger = createLogger("silent");
