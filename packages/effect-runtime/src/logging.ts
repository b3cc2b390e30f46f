/**
 * Structured logging and tracing integration.
 *
 * A compact console logger for the CLI, log level parsing for `--log`, and
 * the layer that installs them.
 */
import { Layer, Logger, LogLevel } from "effect";
import type { LogLevelName } from "@scalargrad/core";

// ── Pretty logger ──────────────────────────────────────────────────────────

/** Render one log line: `[HH:MM:SS.mmm] LEVEL message`. */
export function formatLogLine(date: Date, level: LogLevel.LogLevel, message: unknown): string {
  const ts = date.toISOString().slice(11, 23);
  const lvl = level.label.toUpperCase().padEnd(5);
  const parts = Array.isArray(message) ? message : [message];
  const msg = parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
  return `[${ts}] ${lvl} ${msg}`;
}

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  console.log(formatLogLine(date, logLevel, message));
});

/** Replace the default logger with `prettyLogger` and set the minimum level. */
export function prettyLoggerLayer(level: LogLevel.LogLevel): Layer.Layer<never> {
  return Layer.merge(
    Logger.replace(Logger.defaultLogger, prettyLogger),
    Logger.minimumLogLevel(level),
  );
}

// ── Log level from string ──────────────────────────────────────────────────

export function parseLogLevel(level: string): LogLevel.LogLevel {
  switch (level.toLowerCase()) {
    case "debug": return LogLevel.Debug;
    case "info": return LogLevel.Info;
    case "warn":
    case "warning": return LogLevel.Warning;
    case "error": return LogLevel.Error;
    case "none": return LogLevel.None;
    default: return LogLevel.Info;
  }
}

export function isLogLevelName(level: string): level is LogLevelName {
  return level === "debug" || level === "info" || level === "warn" || level === "error" || level === "none";
}
