/**
 * Structured JSON logger with automatic trace context inclusion.
 *
 * Every log entry includes traceId and spanId from the active OTel span
 * (if any), enabling log→trace correlation in observability backends.
 */

import { trace } from "@opentelemetry/api"

export type LogLevel = "debug" | "info" | "warn" | "error"

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/** Maps a pino-style level name onto the four levels this logger emits. */
export function toLogLevel(value: string): LogLevel {
  switch (value) {
    case "trace":
    case "debug":
      return "debug"
    case "warn":
      return "warn"
    case "error":
    case "fatal":
      return "error"
    default:
      return "info"
  }
}

export interface TracingLoggerOptions {
  /** Minimum log level to emit. Defaults to "info". */
  level?: LogLevel
  /** Service name to include in every log line. */
  serviceName?: string
}

/** Minimal logging surface shared by background units and their tests. */
export interface Logger {
  debug(message: string, extra?: Record<string, unknown>): void
  info(message: string, extra?: Record<string, unknown>): void
  warn(message: string, extra?: Record<string, unknown>): void
  error(message: string, extra?: Record<string, unknown>): void
}

export class TracingLogger implements Logger {
  private readonly minLevel: number
  private readonly serviceName: string

  constructor(options?: TracingLoggerOptions) {
    this.minLevel = LOG_LEVEL_ORDER[options?.level ?? "info"]
    this.serviceName = options?.serviceName ?? "reelsmith"
  }

  /** A logger whose lines all carry `bindings`, e.g. a worker id. */
  child(bindings: Record<string, unknown>): Logger {
    return {
      debug: (message, extra) => this.log("debug", message, { ...bindings, ...extra }),
      info: (message, extra) => this.log("info", message, { ...bindings, ...extra }),
      warn: (message, extra) => this.log("warn", message, { ...bindings, ...extra }),
      error: (message, extra) => this.log("error", message, { ...bindings, ...extra }),
    }
  }

  debug(message: string, extra?: Record<string, unknown>): void {
    this.log("debug", message, extra)
  }

  info(message: string, extra?: Record<string, unknown>): void {
    this.log("info", message, extra)
  }

  warn(message: string, extra?: Record<string, unknown>): void {
    this.log("warn", message, extra)
  }

  error(message: string, extra?: Record<string, unknown>): void {
    this.log("error", message, extra)
  }

  private log(level: LogLevel, message: string, extra?: Record<string, unknown>): void {
    if (LOG_LEVEL_ORDER[level] < this.minLevel) return

    const entry: Record<string, unknown> = {
      level,
      time: new Date().toISOString(),
      service: this.serviceName,
      msg: message,
    }

    // Auto-inject trace context from active span
    const span = trace.getActiveSpan()
    if (span) {
      const ctx = span.spanContext()
      entry.traceId = ctx.traceId
      entry.spanId = ctx.spanId
    }

    if (extra) {
      Object.assign(entry, extra)
    }

    // Use stderr for error/warn to match unix conventions
    const out = level === "error" || level === "warn" ? process.stderr : process.stdout
    out.write(JSON.stringify(entry) + "\n")
  }
}
