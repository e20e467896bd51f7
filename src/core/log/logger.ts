// src/core/log/logger.ts
// Leveled console logging with a [Scope] prefix

import type { LogLevel } from "../config/config";

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogSink = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export interface Logger {
  readonly scope: string;
  debug(message: string, detail?: Record<string, unknown>): void;
  info(message: string, detail?: Record<string, unknown>): void;
  warn(message: string, detail?: Record<string, unknown>): void;
  error(message: string, detail?: Record<string, unknown>): void;
  /** Report an engine invariant violation; always emitted unless silent. */
  fault(message: string, detail?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

const consoleSink: LogSink = {
  debug: (m) => console.debug(m),
  info: (m) => console.info(m),
  warn: (m) => console.warn(m),
  error: (m) => console.error(m),
};

function render(scope: string, message: string, detail?: Record<string, unknown>): string {
  if (!detail || Object.keys(detail).length === 0) {
    return `[${scope}] ${message}`;
  }
  const parts = Object.entries(detail).map(([k, v]) => `${k}=${typeof v === "string" ? v : JSON.stringify(v)}`);
  return `[${scope}] ${message} ${parts.join(" ")}`;
}

/**
 * Create a logger. Messages below `level` are dropped before formatting.
 */
export function createLogger(scope: string, level: LogLevel = "warn", sink: LogSink = consoleSink): Logger {
  const threshold = RANK[level];
  const emit = (at: Exclude<LogLevel, "silent">, message: string, detail?: Record<string, unknown>) => {
    if (RANK[at] < threshold) return;
    sink[at](render(scope, message, detail));
  };

  return {
    scope,
    debug: (m, d) => emit("debug", m, d),
    info: (m, d) => emit("info", m, d),
    warn: (m, d) => emit("warn", m, d),
    error: (m, d) => emit("error", m, d),
    fault: (m, d) => emit("error", `ENGINE FAULT: ${m}`, d),
    child: (sub) => createLogger(`${scope}:${sub}`, level, sink),
  };
}
