/**
 * Stage logging. EXPOSURE_LOG_LEVEL (silent | warn | debug) overrides the default,
 * which is debug in development and silent when NODE_ENV=production.
 */

export type LogLevel = "silent" | "warn" | "debug";

export function logLevel(): LogLevel {
  const raw = process.env.EXPOSURE_LOG_LEVEL;
  if (raw === "silent" || raw === "warn" || raw === "debug") return raw;
  return process.env.NODE_ENV === "production" ? "silent" : "debug";
}

export const dlog = (...args: unknown[]) => {
  if (logLevel() === "debug") console.log(...args);
};

export const dwarn = (...args: unknown[]) => {
  if (logLevel() !== "silent") console.warn(...args);
};
