/**
 * Structured logging utility
 *
 * Level threshold comes from LOG_LEVEL (debug | info | warn | error).
 * DEBUG=1 is kept as a shorthand for LOG_LEVEL=debug.
 */

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function threshold(): number {
  if (process.env.DEBUG) {
    return LEVEL_ORDER.debug;
  }
  const level = process.env.LOG_LEVEL?.toLowerCase();
  if (level === "debug" || level === "info" || level === "warn" || level === "error") {
    return LEVEL_ORDER[level];
  }
  return LEVEL_ORDER.info;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= threshold();
}

function formatMeta(meta?: Record<string, unknown>): string {
  return meta ? JSON.stringify(meta) : "";
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("debug")) {
      console.log(`[DEBUG] ${msg}`, formatMeta(meta));
    }
  },

  info: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("info")) {
      console.log(`[INFO] ${msg}`, formatMeta(meta));
    }
  },

  warn: (msg: string, meta?: Record<string, unknown>) => {
    if (enabled("warn")) {
      console.warn(`[WARN] ${msg}`, formatMeta(meta));
    }
  },

  error: (msg: string, error?: unknown) => {
    if (enabled("error")) {
      console.error(`[ERROR] ${msg}`, error ?? "");
    }
  },
};

/**
 * Normalize an unknown thrown value into a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
