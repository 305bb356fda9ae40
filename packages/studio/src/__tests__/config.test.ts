import { describe, expect, it } from "vitest"

import { loadConfig } from "../config.js"

const BASE = { DATABASE_URL: "postgres://localhost/test" }

describe("loadConfig", () => {
  it("throws if DATABASE_URL is missing", () => {
    expect(() => loadConfig({})).toThrow("DATABASE_URL is required")
  })

  it("returns defaults when only DATABASE_URL is set", () => {
    expect(loadConfig(BASE)).toEqual({
      databaseUrl: "postgres://localhost/test",
      port: 4000,
      host: "0.0.0.0",
      nodeEnv: "development",
      logLevel: "info",
      workerConcurrency: 5,
      publishIntervalMinutes: 120,
      maxGenerationBatch: 30,
      recentTemplateWindow: 50,
      outputDir: "./output",
      publishQueue: {
        waitTimeSeconds: 20,
        visibilityTimeoutSeconds: 300,
        maxDelaySeconds: 900,
        batchSize: 1,
        pollIntervalMs: 1000,
      },
      twitter: undefined,
      aiWriter: undefined,
      tracing: {
        enabled: false,
        endpoint: "http://localhost:4318",
        sampleRate: 1.0,
        serviceName: "reelsmith-studio",
        exporterType: "otlp",
      },
    })
  })

  it("overrides defaults from env", () => {
    const config = loadConfig({
      ...BASE,
      PORT: "3000",
      HOST: "127.0.0.1",
      LOG_LEVEL: "warn",
      PUBLISH_INTERVAL_MINUTES: "45",
      PUBLISH_QUEUE_VISIBILITY_TIMEOUT_SECONDS: "600",
      OUTPUT_DIR: "/var/reelsmith",
    })

    expect(config.port).toBe(3000)
    expect(config.host).toBe("127.0.0.1")
    expect(config.logLevel).toBe("warn")
    expect(config.publishIntervalMinutes).toBe(45)
    expect(config.publishQueue.visibilityTimeoutSeconds).toBe(600)
    expect(config.outputDir).toBe("/var/reelsmith")
  })

  it("falls back to defaults for unparseable integers", () => {
    const config = loadConfig({ ...BASE, PORT: "not-a-port", PUBLISH_INTERVAL_MINUTES: "soon" })
    expect(config.port).toBe(4000)
    expect(config.publishIntervalMinutes).toBe(120)
  })

  it("rejects a non-positive publish interval", () => {
    expect(() => loadConfig({ ...BASE, PUBLISH_INTERVAL_MINUTES: "0" })).toThrow(
      "Invalid PUBLISH_INTERVAL_MINUTES: 0. Must be a positive integer.",
    )
    expect(() => loadConfig({ ...BASE, PUBLISH_INTERVAL_MINUTES: "-5" })).toThrow(
      "Invalid PUBLISH_INTERVAL_MINUTES: -5",
    )
  })

  it("configures Twitter only when all four credentials are set", () => {
    const partial = loadConfig({
      ...BASE,
      TWITTER_API_KEY: "test-key",
      TWITTER_API_SECRET: "test-secret",
      TWITTER_ACCESS_TOKEN: "test-token",
    })
    expect(partial.twitter).toBeUndefined()

    const full = loadConfig({
      ...BASE,
      TWITTER_API_KEY: "test-key",
      TWITTER_API_SECRET: "test-secret",
      TWITTER_ACCESS_TOKEN: "test-token",
      TWITTER_ACCESS_TOKEN_SECRET: "test-token-secret",
    })
    expect(full.twitter).toEqual({
      apiKey: "test-key",
      apiSecret: "test-secret",
      accessToken: "test-token",
      accessTokenSecret: "test-token-secret",
    })
  })

  it("enables the AI writer when an API key is present", () => {
    const config = loadConfig({ ...BASE, ANTHROPIC_API_KEY: "test-secret" })
    expect(config.aiWriter).toEqual({
      apiKey: "test-secret",
      model: "claude-sonnet-4-5-20250929",
    })
  })

  it("clamps the sample rate and validates the exporter type", () => {
    expect(loadConfig({ ...BASE, OTEL_SAMPLE_RATE: "1.7" }).tracing.sampleRate).toBe(1)
    expect(loadConfig({ ...BASE, OTEL_SAMPLE_RATE: "-0.2" }).tracing.sampleRate).toBe(0)
    expect(() => loadConfig({ ...BASE, OTEL_EXPORTER_TYPE: "jaeger" })).toThrow(
      'Invalid OTEL_EXPORTER_TYPE: jaeger. Must be "otlp", "console", or "none".',
    )
  })
})
