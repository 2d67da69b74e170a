/**
 * Console-backed logger.
 * - silent when NODE_ENV is "production"
 * - debug additionally needs BBCODE_DEBUG to be set
 * - a missing or throwing `console` never breaks a parse
 */

type ConsoleMethod = "debug" | "warn";

function callConsole(method: ConsoleMethod, args: unknown[]): void {
  if (typeof console === "undefined") return;
  if (typeof console[method] !== "function") return;
  try {
    console[method](...args);
  } catch {
    // logging must never fail the caller
  }
}

function isProduction(): boolean {
  return typeof process !== "undefined" && process.env.NODE_ENV === "production";
}

function debugEnabled(): boolean {
  return typeof process !== "undefined" && !!process.env.BBCODE_DEBUG;
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (isProduction() || !debugEnabled()) return;
    callConsole("debug", args);
  },

  warn: (...args: unknown[]) => {
    if (isProduction()) return;
    callConsole("warn", args);
  }
};
