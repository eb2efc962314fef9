/**
 * JSON-lines logger. One line per entry on stderr so that stdout stays free
 * for whatever the embedding program prints.
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

function getMinLevel(): LogLevel {
  const env = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(env) ? env : "info";
}

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  child(extra: Record<string, unknown>): Logger;
}

function emit(
  level: LogLevel,
  service: string,
  msg: string,
  minLevel: LogLevel | undefined,
  baseExtra: Record<string, unknown>,
  extra?: Record<string, unknown>
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel ?? getMinLevel()]) return;

  const line = JSON.stringify({
    level,
    service,
    msg,
    ts: new Date().toISOString(),
    ...baseExtra,
    ...extra,
  });
  process.stderr.write(`${line}\n`);
}

/**
 * Without `minLevel` the level is read from LOG_LEVEL on every entry
 * (default "info").
 */
export function createLogger(
  service: string,
  baseExtra: Record<string, unknown> = {},
  minLevel?: LogLevel
): Logger {
  return {
    debug(msg, extra) {
      emit("debug", service, msg, minLevel, baseExtra, extra);
    },
    info(msg, extra) {
      emit("info", service, msg, minLevel, baseExtra, extra);
    },
    warn(msg, extra) {
      emit("warn", service, msg, minLevel, baseExtra, extra);
    },
    error(msg, extra) {
      emit("error", service, msg, minLevel, baseExtra, extra);
    },
    child(extra) {
      return createLogger(service, { ...baseExtra, ...extra }, minLevel);
    },
  };
}

/** Drops everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
  child() {
    return silentLogger;
  },
};
