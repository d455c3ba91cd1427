/**
 * Logging integration.
 *
 * A single-line console logger and log-level parsing for config and env
 * values.
 */
import { Layer, Logger, LogLevel } from "effect";
import type { LogLevelName } from "@rungrad/core";
import { getConfig } from "@rungrad/autograd";

// ── Pretty logger ──────────────────────────────────────────────────────────

export function formatLogLine(date: Date, level: string, message: unknown): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  return `[${ts}] ${lvl} ${msg}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  console.log(formatLogLine(date, logLevel.label, message));
});

/**
 * Replace the default logger with `prettyLogger`, dropping messages below
 * `level`. The level defaults to the engine config's `logLevel`.
 */
export function loggerLayer(level: LogLevelName | LogLevel.LogLevel = getConfig().logLevel): Layer.Layer<never> {
  const min = typeof level === "string" ? parseLogLevel(level) : level;
  return Layer.merge(Logger.replace(Logger.defaultLogger, prettyLogger), Logger.minimumLogLevel(min));
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    default: return LogLevel.Info;
  }
}
