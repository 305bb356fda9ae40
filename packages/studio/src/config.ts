/**
 * Configuration module: validates environment variables at startup.
 *
 * All config is sourced from process.env and validated eagerly.
 * Missing or invalid required values throw immediately so the process fails fast.
 */

import type { TracingConfig } from "@reelsmith/shared/tracing"

export interface PublishQueueConfig {
  /** Long-poll wait per receive call, in seconds. */
  waitTimeSeconds: number
  /** How long a received message stays hidden before redelivery. */
  visibilityTimeoutSeconds: number
  /** Largest delay the queue applies natively; later jobs are gated by the worker. */
  maxDelaySeconds: number
  /** Messages claimed per receive call. */
  batchSize: number
  /** Sleep between empty claim attempts during a long poll. */
  pollIntervalMs: number
}

export interface TwitterCredentials {
  apiKey: string
  apiSecret: string
  accessToken: string
  accessTokenSecret: string
}

export interface AiWriterConfig {
  apiKey: string
  model: string
}

export interface Config {
  /** PostgreSQL connection string (also the queue transport) */
  databaseUrl: string
  /** HTTP server port */
  port: number
  /** HTTP server host (bind address) */
  host: string
  /** Node environment (development, production, test) */
  nodeEnv: string
  /** Pino log level */
  logLevel: string
  /** Graphile Worker concurrency */
  workerConcurrency: number
  /** Fallback spacing between scheduled posts when no runtime setting exists */
  publishIntervalMinutes: number
  /** Largest accepted generation batch */
  maxGenerationBatch: number
  /** How many recent script payloads feed template recency */
  recentTemplateWindow: number
  /** Root directory for rendered artifacts */
  outputDir: string
  publishQueue: PublishQueueConfig
  /** Present only when all four credentials are set */
  twitter?: TwitterCredentials
  /** Present only when ANTHROPIC_API_KEY is set */
  aiWriter?: AiWriterConfig
  /** OpenTelemetry tracing configuration */
  tracing: TracingConfig
}

const DEFAULT_AI_MODEL = "claude-sonnet-4-5-20250929"

/**
 * Load and validate configuration from environment variables.
 * Throws if required values are missing or invalid.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const databaseUrl = env.DATABASE_URL
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is required")
  }

  const exporterType = env.OTEL_EXPORTER_TYPE ?? "otlp"
  if (exporterType !== "otlp" && exporterType !== "console" && exporterType !== "none") {
    throw new Error(
      `Invalid OTEL_EXPORTER_TYPE: ${exporterType}. Must be "otlp", "console", or "none".`,
    )
  }

  const publishIntervalMinutes = parseIntOr(env.PUBLISH_INTERVAL_MINUTES, 120)
  if (publishIntervalMinutes <= 0) {
    throw new Error(
      `Invalid PUBLISH_INTERVAL_MINUTES: ${String(env.PUBLISH_INTERVAL_MINUTES)}. Must be a positive integer.`,
    )
  }

  return {
    databaseUrl,
    port: parseIntOr(env.PORT, 4000),
    host: env.HOST ?? "0.0.0.0",
    nodeEnv: env.NODE_ENV ?? "development",
    logLevel: env.LOG_LEVEL ?? "info",
    workerConcurrency: parseIntOr(env.GRAPHILE_WORKER_CONCURRENCY, 5),
    publishIntervalMinutes,
    maxGenerationBatch: parseIntOr(env.MAX_GENERATION_BATCH, 30),
    recentTemplateWindow: parseIntOr(env.RECENT_TEMPLATE_WINDOW, 50),
    outputDir: env.OUTPUT_DIR ?? "./output",
    publishQueue: {
      waitTimeSeconds: parseIntOr(env.PUBLISH_QUEUE_WAIT_SECONDS, 20),
      visibilityTimeoutSeconds: parseIntOr(env.PUBLISH_QUEUE_VISIBILITY_TIMEOUT_SECONDS, 300),
      maxDelaySeconds: parseIntOr(env.PUBLISH_QUEUE_MAX_DELAY_SECONDS, 900),
      batchSize: parseIntOr(env.PUBLISH_QUEUE_BATCH_SIZE, 1),
      pollIntervalMs: parseIntOr(env.PUBLISH_QUEUE_POLL_INTERVAL_MS, 1000),
    },
    twitter: parseTwitterCredentials(env),
    aiWriter: env.ANTHROPIC_API_KEY
      ? { apiKey: env.ANTHROPIC_API_KEY, model: env.ANTHROPIC_MODEL ?? DEFAULT_AI_MODEL }
      : undefined,
    tracing: {
      enabled: env.OTEL_TRACING_ENABLED === "true",
      endpoint: env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://localhost:4318",
      sampleRate: parseFloatOr(env.OTEL_SAMPLE_RATE, 1.0),
      serviceName: env.OTEL_SERVICE_NAME ?? "reelsmith-studio",
      exporterType,
    },
  }
}

function parseIntOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseInt(value, 10)
  if (Number.isNaN(parsed)) return fallback
  return parsed
}

function parseFloatOr(value: string | undefined, fallback: number): number {
  if (value === undefined) return fallback
  const parsed = parseFloat(value)
  if (Number.isNaN(parsed)) return fallback
  return Math.max(0, Math.min(1, parsed))
}

function parseTwitterCredentials(
  env: Record<string, string | undefined>,
): TwitterCredentials | undefined {
  const apiKey = env.TWITTER_API_KEY
  const apiSecret = env.TWITTER_API_SECRET
  const accessToken = env.TWITTER_ACCESS_TOKEN
  const accessTokenSecret = env.TWITTER_ACCESS_TOKEN_SECRET
  if (!apiKey || !apiSecret || !accessToken || !accessTokenSecret) return undefined
  return { apiKey, apiSecret, accessToken, accessTokenSecret }
}
