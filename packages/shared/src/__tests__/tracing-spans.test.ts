import { SpanStatusCode, trace } from "@opentelemetry/api"
import { InMemorySpanExporter, NodeTracerProvider, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-node"
import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest"

import {
  ReelsmithAttributes,
  injectTraceContext,
  setSpanAttributes,
  withExtractedContext,
  withSpan,
} from "../tracing/spans.js"

const exporter = new InMemorySpanExporter()
const provider = new NodeTracerProvider({
  spanProcessors: [new SimpleSpanProcessor(exporter)],
})

beforeAll(() => {
  provider.register()
})

afterAll(async () => {
  await provider.shutdown()
})

beforeEach(() => {
  exporter.reset()
})

describe("withSpan", () => {
  it("returns the result and ends the span OK with its attributes", async () => {
    const result = await withSpan("test.operation", { [ReelsmithAttributes.CONTENT_ID]: 7 }, () =>
      Promise.resolve(42),
    )

    expect(result).toBe(42)
    const spans = exporter.getFinishedSpans()
    expect(spans).toHaveLength(1)
    expect(spans[0]?.name).toBe("test.operation")
    expect(spans[0]?.status.code).toBe(SpanStatusCode.OK)
    expect(spans[0]?.attributes["reelsmith.content.id"]).toBe(7)
  })

  it("records the exception and re-throws", async () => {
    await expect(
      withSpan("test.error", {}, () => Promise.reject(new Error("boom"))),
    ).rejects.toThrow("boom")

    const span = exporter.getFinishedSpans()[0]
    expect(span?.status.code).toBe(SpanStatusCode.ERROR)
    expect(span?.status.message).toBe("Error: boom")
    expect(span?.events.map((e) => e.name)).toEqual(["exception"])
  })
})

describe("setSpanAttributes", () => {
  it("annotates the active span", async () => {
    await withSpan("test.annotate", {}, () => {
      setSpanAttributes({ [ReelsmithAttributes.PLATFORM]: "twitter" })
      return Promise.resolve()
    })

    expect(exporter.getFinishedSpans()[0]?.attributes["reelsmith.publish.platform"]).toBe("twitter")
  })

  it("is a no-op without an active span", () => {
    expect(() => setSpanAttributes({ a: 1 })).not.toThrow()
  })
})

describe("trace context propagation", () => {
  it("continues the injecting span's trace inside the extracted context", async () => {
    let carrier: Record<string, string> = {}
    let parentTraceId = ""
    await withSpan("test.parent", {}, (span) => {
      parentTraceId = span.spanContext().traceId
      carrier = injectTraceContext()
      return Promise.resolve()
    })

    expect(carrier.traceparent).toMatch(/^00-[0-9a-f]{32}-[0-9a-f]{16}-0[01]$/)

    const childTraceId = await withExtractedContext(carrier, () =>
      withSpan("test.child", {}, (span) => Promise.resolve(span.spanContext().traceId)),
    )
    expect(childTraceId).toBe(parentTraceId)
    expect(trace.getActiveSpan()).toBeUndefined()
  })
})
