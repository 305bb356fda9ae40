/**
 * Process-wide OpenTelemetry setup for the studio and the publish worker.
 *
 * `initTracing` starts the SDK at most once per process and `shutdownTracing`
 * flushes it. With no SDK started every span is a no-op.
 */

import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http"
import { HttpInstrumentation } from "@opentelemetry/instrumentation-http"
import { resourceFromAttributes } from "@opentelemetry/resources"
import { NodeSDK } from "@opentelemetry/sdk-node"
import {
  AlwaysOnSampler,
  BatchSpanProcessor,
  ConsoleSpanExporter,
  ParentBasedSampler,
  type Sampler,
  SimpleSpanProcessor,
  type SpanProcessor,
  TraceIdRatioBasedSampler,
} from "@opentelemetry/sdk-trace-node"
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions"

export type TraceExporterType = "otlp" | "console" | "none"

export interface TracingConfig {
  enabled: boolean
  /** Collector base URL; spans go to `<endpoint>/v1/traces`. */
  endpoint: string
  /** Fraction of root traces kept, 0 to 1. */
  sampleRate: number
  serviceName: string
  exporterType: TraceExporterType
}

export const DEFAULT_TRACING_CONFIG: TracingConfig = {
  enabled: true,
  endpoint: "http://localhost:4318",
  sampleRate: 1.0,
  serviceName: "reelsmith-studio",
  exporterType: "otlp",
}

const SERVICE_VERSION = "0.1.0"
const HEALTH_PATHS = new Set(["/healthz", "/readyz"])

/** A tracing setup that exports somewhere. */
export type ActiveTracingConfig = TracingConfig & { exporterType: "otlp" | "console" }

/**
 * Merge overrides onto the defaults. Returns null when tracing is off,
 * and clamps the sample rate into [0, 1].
 */
export function resolveTracingConfig(overrides: Partial<TracingConfig> = {}): ActiveTracingConfig | null {
  const merged = { ...DEFAULT_TRACING_CONFIG, ...overrides }
  const { exporterType } = merged
  if (!merged.enabled || exporterType === "none") return null

  const rate = Number.isFinite(merged.sampleRate) ? merged.sampleRate : 1
  return { ...merged, exporterType, sampleRate: Math.min(1, Math.max(0, rate)) }
}

/** Trace endpoint for the OTLP HTTP exporter; tolerates a trailing slash. */
export function traceExportUrl(endpoint: string): string {
  return `${endpoint.replace(/\/+$/, "")}/v1/traces`
}

function samplerFor(sampleRate: number): Sampler {
  if (sampleRate >= 1) return new AlwaysOnSampler()
  // Child spans follow the decision taken for their root
  return new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(sampleRate) })
}

function processorFor(config: ActiveTracingConfig): SpanProcessor {
  if (config.exporterType === "console") {
    return new SimpleSpanProcessor(new ConsoleSpanExporter())
  }
  return new BatchSpanProcessor(new OTLPTraceExporter({ url: traceExportUrl(config.endpoint) }))
}

let sdk: NodeSDK | undefined

/** Start the SDK before the HTTP server or worker loop. Later calls are ignored. */
export function initTracing(overrides: Partial<TracingConfig> = {}): void {
  if (sdk) return
  const config = resolveTracingConfig(overrides)
  if (!config) return

  sdk = new NodeSDK({
    resource: resourceFromAttributes({
      [ATTR_SERVICE_NAME]: config.serviceName,
      [ATTR_SERVICE_VERSION]: SERVICE_VERSION,
    }),
    sampler: samplerFor(config.sampleRate),
    spanProcessors: [processorFor(config)],
    instrumentations: [
      new HttpInstrumentation({
        ignoreIncomingRequestHook: (req) => HEALTH_PATHS.has(req.url ?? ""),
      }),
    ],
  })
  sdk.start()
}

export async function shutdownTracing(): Promise<void> {
  const running = sdk
  sdk = undefined
  await running?.shutdown()
}

export type { Logger, LogLevel, TracingLoggerOptions } from "./logger.js"
export { TracingLogger, toLogLevel } from "./logger.js"
export type { TraceCarrier } from "./spans.js"
export {
  ReelsmithAttributes,
  extractTraceContext,
  injectTraceContext,
  setSpanAttributes,
  withExtractedContext,
  withSpan,
} from "./spans.js"
