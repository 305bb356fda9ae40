import { describe, expect, it } from "vitest"

import { isContentStatus, isPlatform } from "../types/index.js"
import { PublishJobPayloadSchema, ScriptPayloadSchema } from "../types/schemas.js"

// ──────────────────────────────────────────────────
// Helper factories
// ──────────────────────────────────────────────────

function validJob(overrides: Record<string, unknown> = {}) {
  return {
    content_id: 12,
    schedule_id: 40,
    platform: "twitter",
    caption: "quick statics problem. go.",
    image_path: "output/diagrams/content_12.svg",
    scheduled_at: "2026-03-01T10:00:00.000Z",
    enqueued_at: "2026-03-01T08:00:00.000Z",
    ...overrides,
  }
}

function validScript(overrides: Record<string, unknown> = {}) {
  return {
    type: "problem",
    hook_text: "Can you find the beam reactions?",
    diagram_description: "Simply supported beam, 8m length.",
    content_steps: [{ text: "Find: Reaction forces", highlight: "reactions" }],
    answer_options: ["A: x", "B: y", "C: z", "D: w"],
    correct_answer: "B",
    explanation: "Sum moments about A.",
    cta_text: "Comment A, B, C, or D!",
    tweet_text: "pause and try this before scrolling",
    template_id: "beam_ss_two_loads",
    ...overrides,
  }
}

// ──────────────────────────────────────────────────
// PublishJobPayloadSchema
// ──────────────────────────────────────────────────

describe("PublishJobPayloadSchema", () => {
  it("accepts a full payload", () => {
    expect(PublishJobPayloadSchema.parse(validJob())).toEqual(validJob())
  })

  it("accepts a payload without schedule id and with a null time", () => {
    const result = PublishJobPayloadSchema.safeParse(validJob({ schedule_id: undefined, scheduled_at: null }))
    expect(result.success).toBe(true)
  })

  it("accepts ISO timestamps with an offset", () => {
    expect(PublishJobPayloadSchema.safeParse(validJob({ scheduled_at: "2026-03-01T10:00:00+02:00" })).success).toBe(
      true,
    )
  })

  it.each([
    ["non-integer content id", { content_id: 1.5 }],
    ["missing platform", { platform: "" }],
    ["missing image", { image_path: "" }],
    ["bad timestamp", { scheduled_at: "tomorrow" }],
    ["bad enqueue time", { enqueued_at: 17 }],
  ])("rejects %s", (_label, overrides) => {
    expect(PublishJobPayloadSchema.safeParse(validJob(overrides)).success).toBe(false)
  })
})

// ──────────────────────────────────────────────────
// ScriptPayloadSchema
// ──────────────────────────────────────────────────

describe("ScriptPayloadSchema", () => {
  it("accepts a quiz payload", () => {
    expect(ScriptPayloadSchema.safeParse(validScript()).success).toBe(true)
  })

  it("rejects an unknown type", () => {
    expect(ScriptPayloadSchema.safeParse(validScript({ type: "essay" })).success).toBe(false)
  })

  it("rejects an empty hook", () => {
    expect(ScriptPayloadSchema.safeParse(validScript({ hook_text: "" })).success).toBe(false)
  })
})

describe("vocabulary guards", () => {
  it("recognizes platforms", () => {
    expect(isPlatform("twitter")).toBe(true)
    expect(isPlatform("myspace")).toBe(false)
  })

  it("recognizes content statuses", () => {
    expect(isContentStatus("queued")).toBe(true)
    expect(isContentStatus("archived")).toBe(false)
  })
})
