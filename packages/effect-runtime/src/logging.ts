/**
 * Structured logging and tracing integration.
 *
 * Provides a pretty console logger, an optional JSONL file sink,
 * and span helpers for tracing hot paths.
 */
import { appendFileSync } from "node:fs";
import { Effect, Layer, Logger, LogLevel } from "effect";

function renderMessage(message: unknown): string {
  const parts: unknown[] = Array.isArray(message) ? message : [message];
  return parts.map((m) => (typeof m === "string" ? m : JSON.stringify(m))).join(" ");
}

// ── Pretty logger ──────────────────────────────────────────────────────────

export const prettyLogger = Logger.make(({ logLevel, message, date }) => {
  const ts = date.toISOString().slice(11, 23);
  const lvl = logLevel.label.toUpperCase().padEnd(5);
  console.log(`[${ts}] ${lvl} ${renderMessage(message)}`);
});

// ── JSONL file logger ──────────────────────────────────────────────────────

export function fileLogger(path: string): Logger.Logger<unknown, void> {
  return Logger.make(({ logLevel, message, date }) => {
    const line = JSON.stringify({
      ts: date.toISOString(),
      level: logLevel.label,
      message: renderMessage(message),
    });
    appendFileSync(path, line + "\n", "utf-8");
  });
}

/** Console (and optionally file) logging at the given minimum level. */
export function loggingLayer(level: LogLevel.LogLevel, logFile?: string): Layer.Layer<never> {
  const pretty = Logger.replace(Logger.defaultLogger, prettyLogger);
  const withFile = logFile ? Layer.merge(pretty, Logger.add(fileLogger(logFile))) : pretty;
  return Layer.merge(withFile, Logger.minimumLogLevel(level));
}

// ── Span helpers ───────────────────────────────────────────────────────────

export function withSpan<A, E, R>(name: string, effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> {
  return Effect.withSpan(name)(effect);
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
