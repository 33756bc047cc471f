/**
 * TallyScan – Console logger
 *
 * Lines look like `[TallyScan][WARN][2025-09-29T14:05:00.000Z] message`.
 * Warnings and errors are always written; debug and info only in verbose mode.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type TallyScanLogger = Record<LogLevel, (message: string, ...args: unknown[]) => void>;

const PREFIX = "[TallyScan]";

const QUIET_LEVELS: ReadonlySet<LogLevel> = new Set<LogLevel>(["debug", "info"]);

const CONSOLE_METHOD = {
  debug: "log",
  info: "info",
  warn: "warn",
  error: "error",
} as const satisfies Record<LogLevel, keyof Console>;

function header(level: LogLevel): string {
  return `${PREFIX}[${level.toUpperCase()}][${new Date().toISOString()}]`;
}

function write(level: LogLevel, message: string, args: unknown[]): void {
  // eslint-disable-next-line no-console
  console[CONSOLE_METHOD[level]](`${header(level)} ${message}`, ...args);
}

/** @param verbose – also print debug and info lines */
export function createLogger(verbose: boolean = false): TallyScanLogger {
  const emit = (level: LogLevel) =>
    (message: string, ...args: unknown[]): void => {
      if (!verbose && QUIET_LEVELS.has(level)) return;
      write(level, message, args);
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
  };
}

const ignore = (): void => undefined;

/** Prints nothing */
export const silentLogger: TallyScanLogger = {
  debug: ignore,
  info: ignore,
  warn: ignore,
  error: ignore,
};

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
