import type { ContentStatus } from "@reelsmith/shared"
import { describe, expect, it } from "vitest"

import {
  assertValidTransition,
  InvalidTransitionError,
  isValidTransition,
  missingArtifact,
  VALID_TRANSITIONS,
} from "../content/state-machine.js"

const ALL: ContentStatus[] = ["draft", "generating", "ready", "queued", "published", "failed"]

describe("content state machine", () => {
  it("allows the forward path", () => {
    expect(isValidTransition("draft", "generating")).toBe(true)
    expect(isValidTransition("generating", "ready")).toBe(true)
    expect(isValidTransition("ready", "queued")).toBe(true)
    expect(isValidTransition("queued", "published")).toBe(true)
  })

  it("allows failure from every non-terminal state except published", () => {
    for (const from of ["draft", "generating", "ready", "queued"] as const) {
      expect(isValidTransition(from, "failed")).toBe(true)
    }
    expect(isValidTransition("published", "failed")).toBe(false)
  })

  it("treats failed as terminal", () => {
    for (const to of ALL) {
      expect(isValidTransition("failed", to)).toBe(false)
    }
  })

  it("allows re-publishing and repeated publish deliveries", () => {
    expect(isValidTransition("published", "queued")).toBe(true)
    expect(isValidTransition("published", "published")).toBe(true)
  })

  it("never moves backwards into generation", () => {
    for (const from of ALL) {
      expect(VALID_TRANSITIONS[from].includes("draft")).toBe(false)
    }
    expect(isValidTransition("ready", "generating")).toBe(false)
    expect(isValidTransition("queued", "ready")).toBe(false)
  })

  it("assertValidTransition throws with both states in the message", () => {
    expect(() => assertValidTransition("queued", "ready")).toThrow(InvalidTransitionError)
    expect(() => assertValidTransition("queued", "ready")).toThrow(
      "Invalid content transition: queued → ready",
    )
  })

  describe("missingArtifact", () => {
    it("requires a script and a diagram for ready", () => {
      expect(missingArtifact("ready", { script_text: null, diagram_path: null })).toBe("script")
      expect(missingArtifact("ready", { script_text: "s", diagram_path: null })).toBe("diagram")
      expect(missingArtifact("ready", { script_text: "s", diagram_path: "/d.png" })).toBeUndefined()
    })

    it("requires a diagram for published", () => {
      expect(missingArtifact("published", { script_text: "s", diagram_path: null })).toBe("diagram")
    })

    it("has no requirement for other targets", () => {
      expect(missingArtifact("failed", { script_text: null, diagram_path: null })).toBeUndefined()
      expect(missingArtifact("queued", { script_text: null, diagram_path: null })).toBeUndefined()
    })
  })
})
