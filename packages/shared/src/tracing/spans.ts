/**
 * Span helpers around the OpenTelemetry API, with the attribute names
 * shared by the studio's HTTP handlers and background units.
 */

import {
  type Attributes,
  type Context,
  type Span,
  SpanStatusCode,
  context,
  propagation,
  trace,
} from "@opentelemetry/api"

// ──────────────────────────────────────────────────
// Semantic Attribute Constants
// ──────────────────────────────────────────────────

export const ReelsmithAttributes = {
  CONTENT_ID: "reelsmith.content.id",
  CONTENT_STATUS: "reelsmith.content.status",
  SCHEDULE_ID: "reelsmith.schedule.id",
  TEMPLATE_ID: "reelsmith.template.id",
  PLATFORM: "reelsmith.publish.platform",
  QUEUE_MESSAGE_ID: "reelsmith.queue.message_id",
  QUEUE_RECEIVE_COUNT: "reelsmith.queue.receive_count",
  PUBLISH_OUTCOME: "reelsmith.publish.outcome",
  ERROR_CATEGORY: "reelsmith.error.category",
} as const

const TRACER_NAME = "reelsmith"

// ──────────────────────────────────────────────────
// withSpan
// ──────────────────────────────────────────────────

/**
 * Run `fn` inside a new active span. The span ends OK on success; on error
 * it records the exception, ends with ERROR and the error is re-thrown.
 *
 * ```ts
 * await withSpan("reelsmith.publish.job", { [ReelsmithAttributes.CONTENT_ID]: id }, async (span) => {
 *   // ...
 * })
 * ```
 */
export async function withSpan<T>(
  name: string,
  attributes: Attributes,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  return trace.getTracer(TRACER_NAME).startActiveSpan(name, { attributes }, async (span) => {
    try {
      const result = await fn(span)
      span.setStatus({ code: SpanStatusCode.OK })
      return result
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: String(err) })
      if (err instanceof Error) {
        span.recordException(err)
      }
      throw err
    } finally {
      span.end()
    }
  })
}

// ──────────────────────────────────────────────────
// W3C Trace Context Propagation
// ──────────────────────────────────────────────────

export type TraceCarrier = Record<string, string>

/**
 * Serialize the active trace context, e.g. into a background job payload
 * so the job's spans join the request's trace.
 */
export function injectTraceContext(carrier: TraceCarrier = {}): TraceCarrier {
  propagation.inject(context.active(), carrier)
  return carrier
}

export function extractTraceContext(carrier: TraceCarrier): Context {
  return propagation.extract(context.active(), carrier)
}

/** Run `fn` with the carrier's context as the active one. */
export async function withExtractedContext<T>(carrier: TraceCarrier, fn: () => Promise<T>): Promise<T> {
  return context.with(extractTraceContext(carrier), fn)
}

/** Add attributes to the current active span, if there is one. */
export function setSpanAttributes(attributes: Attributes): void {
  trace.getActiveSpan()?.setAttributes(attributes)
}
