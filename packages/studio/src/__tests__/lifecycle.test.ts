import { beforeEach, describe, expect, it } from "vitest"

import { ContentLifecycle } from "../content/lifecycle.js"
import { InvalidTransitionError } from "../content/state-machine.js"
import { NotFoundError } from "../errors.js"
import { createClock } from "./helpers/fakes.js"
import { createInMemoryStorage, type InMemoryStorage } from "./helpers/in-memory-store.js"

describe("ContentLifecycle", () => {
  let storage: InMemoryStorage
  let lifecycle: ContentLifecycle
  let contentId: number

  beforeEach(async () => {
    storage = createInMemoryStorage(createClock("2026-03-01T10:00:00Z").now)
    lifecycle = new ContentLifecycle(storage.contents)
    const topic = await storage.topics.findOrCreate({ name: "Caching", category: "engineering" })
    const content = await storage.contents.create({
      topic_id: topic.id,
      content_type: "problem",
      status: "generating",
    })
    contentId = content.id
  })

  it("moves to ready once script and diagram exist", async () => {
    storage.contents.seed(contentId, { script_text: "hook", diagram_path: "/d.png" })

    await expect(lifecycle.transition(contentId, "ready")).resolves.toBe(true)
    expect((await storage.contents.get(contentId))?.status).toBe("ready")
  })

  it("refuses ready without a diagram", async () => {
    storage.contents.seed(contentId, { script_text: "hook" })

    await expect(lifecycle.transition(contentId, "ready")).rejects.toThrow(
      "Invalid content transition: generating → ready (diagram missing)",
    )
    expect(storage.writes.contentStatus).toBe(0)
  })

  it("throws for transitions outside the table", async () => {
    await expect(lifecycle.transition(contentId, "queued")).rejects.toBeInstanceOf(
      InvalidTransitionError,
    )
  })

  it("throws NotFoundError for unknown content", async () => {
    await expect(lifecycle.transition(999, "ready")).rejects.toBeInstanceOf(NotFoundError)
  })

  it("stores the error message when failing", async () => {
    await lifecycle.transition(contentId, "failed", { error_message: "renderer crashed" })

    const content = await storage.contents.get(contentId)
    expect(content?.status).toBe("failed")
    expect(content?.error_message).toBe("renderer crashed")
  })

  describe("finalize", () => {
    it("is a no-op once the content has failed", async () => {
      await lifecycle.transition(contentId, "failed", { error_message: "first" })
      const writes = storage.writes.contentStatus

      await expect(
        lifecycle.finalize(contentId, "failed", { error_message: "second" }),
      ).resolves.toBe(false)
      expect(storage.writes.contentStatus).toBe(writes)
      expect((await storage.contents.get(contentId))?.error_message).toBe("first")
    })

    it("leaves published content untouched on a repeated publish", async () => {
      storage.contents.seed(contentId, { status: "published", diagram_path: "/d.png" })

      await expect(lifecycle.finalize(contentId, "published")).resolves.toBe(false)
      expect(storage.writes.contentStatus).toBe(0)
    })

    it("resolves false for missing content", async () => {
      await expect(lifecycle.finalize(404, "failed")).resolves.toBe(false)
    })
  })
})
