/**
 * Colour-coded console logger.
 *
 * Every line carries a magenta `[clauselens]` prefix so service output is
 * easy to grep. Verbosity comes from CLAUSELENS_LOG_LEVEL
 * (debug | info | warn | error | silent, default info).
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const GRAY = "\x1b[90m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[clauselens]${RESET}`;

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function currentLogLevel(): LogLevel {
  const raw = process.env["CLAUSELENS_LOG_LEVEL"]?.trim().toLowerCase() ?? "";
  return isLogLevel(raw) ? raw : "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
}

export function devDebug(...args: unknown[]): void {
  if (!enabled("debug")) return;
  console.log(PREFIX, `${GRAY}DEBUG${RESET}`, ...args);
}

export function devLog(...args: unknown[]): void {
  if (!enabled("info")) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (!enabled("warn")) return;
  console.warn(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  if (!enabled("error")) return;
  console.error(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
