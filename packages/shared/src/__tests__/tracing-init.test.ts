import { afterEach, describe, expect, it } from "vitest"

import {
  DEFAULT_TRACING_CONFIG,
  initTracing,
  resolveTracingConfig,
  shutdownTracing,
  traceExportUrl,
} from "../tracing/index.js"

describe("tracing initialization", () => {
  afterEach(async () => {
    await shutdownTracing()
  })

  it("defaults to the studio service with otlp export", () => {
    expect(DEFAULT_TRACING_CONFIG).toEqual({
      enabled: true,
      endpoint: "http://localhost:4318",
      sampleRate: 1.0,
      serviceName: "reelsmith-studio",
      exporterType: "otlp",
    })
  })

  it("does nothing when disabled", () => {
    expect(() => initTracing({ enabled: false })).not.toThrow()
  })

  it("does nothing when the exporter is none", () => {
    expect(() => initTracing({ exporterType: "none" })).not.toThrow()
  })

  it("shutdown without init resolves", async () => {
    await expect(shutdownTracing()).resolves.toBeUndefined()
  })

  describe("resolveTracingConfig", () => {
    it("returns the defaults when nothing is overridden", () => {
      expect(resolveTracingConfig()).toEqual(DEFAULT_TRACING_CONFIG)
    })

    it("returns null when disabled or not exporting", () => {
      expect(resolveTracingConfig({ enabled: false })).toBeNull()
      expect(resolveTracingConfig({ exporterType: "none" })).toBeNull()
    })

    it("clamps the sample rate into the unit range", () => {
      expect(resolveTracingConfig({ sampleRate: 2.5 })?.sampleRate).toBe(1)
      expect(resolveTracingConfig({ sampleRate: -0.3 })?.sampleRate).toBe(0)
      expect(resolveTracingConfig({ sampleRate: Number.NaN })?.sampleRate).toBe(1)
      expect(resolveTracingConfig({ sampleRate: 0.25 })?.sampleRate).toBe(0.25)
    })

    it("keeps the console exporter and service name overrides", () => {
      expect(resolveTracingConfig({ exporterType: "console", serviceName: "reelsmith-studio-publisher" })).toEqual({
        ...DEFAULT_TRACING_CONFIG,
        exporterType: "console",
        serviceName: "reelsmith-studio-publisher",
      })
    })
  })

  it("builds the trace export url with or without a trailing slash", () => {
    expect(traceExportUrl("http://collector:4318")).toBe("http://collector:4318/v1/traces")
    expect(traceExportUrl("http://collector:4318/")).toBe("http://collector:4318/v1/traces")
  })
})
