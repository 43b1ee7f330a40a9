import type { LogLevel } from "@/lib/types";

type LogFields = Record<string, unknown>;

export interface Logger {
  debug: (msg: string, data?: LogFields) => void;
  info: (msg: string, data?: LogFields) => void;
  warn: (msg: string, data?: LogFields) => void;
  error: (msg: string, data?: LogFields) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

type WritableLevel = Exclude<LogLevel, "silent">;

function emit(level: WritableLevel, scope: string, msg: string, data?: LogFields) {
  const line = JSON.stringify({ level: level.toUpperCase(), scope, msg, ...data, ts: new Date().toISOString() });
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
}

/** JSON-line logger; one object per line so hosting log drains can parse it. */
export function createLogger(scope: string, minLevel: LogLevel = "info"): Logger {
  const threshold = LEVEL_RANK[minLevel];
  const write = (level: WritableLevel) => (msg: string, data?: LogFields) => {
    if (LEVEL_RANK[level] < threshold) return;
    emit(level, scope, msg, data);
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error")
  };
}
