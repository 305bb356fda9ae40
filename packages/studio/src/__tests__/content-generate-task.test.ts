import type { JobHelpers } from "graphile-worker"
import { describe, expect, it, vi } from "vitest"

import type { GenerationJob } from "../generation/orchestrator.js"
import { createContentGenerateTask } from "../worker/tasks/content-generate.js"

function mockHelpers() {
  const logger = { info: vi.fn(), error: vi.fn() }
  return { helpers: { logger } as unknown as JobHelpers, logger }
}

describe("content_generate task", () => {
  it("runs the pipeline for a valid payload", async () => {
    const runPipeline = vi.fn<(job: GenerationJob) => Promise<string>>().mockResolvedValue("ready")
    const { helpers, logger } = mockHelpers()
    const task = createContentGenerateTask({ runPipeline })

    await task(
      { contentId: 4, topicName: "Beam Statics", category: "engineering", description: null },
      helpers,
    )

    expect(runPipeline).toHaveBeenCalledWith({
      contentId: 4,
      topicName: "Beam Statics",
      category: "engineering",
      description: null,
    })
    expect(logger.info).toHaveBeenCalledWith("content_generate: content 4 finished as ready")
  })

  it("runs under an extracted trace context", async () => {
    const runPipeline = vi.fn<(job: GenerationJob) => Promise<string>>().mockResolvedValue("failed")
    const { helpers } = mockHelpers()
    const task = createContentGenerateTask({ runPipeline })

    await task(
      {
        contentId: 5,
        topicName: "Caching",
        category: "systems",
        description: "LRU",
        traceContext: { traceparent: "00-0af7651916cd43dd8448eb211c80319c-b7ad6b7169203331-01" },
      },
      helpers,
    )

    expect(runPipeline).toHaveBeenCalledTimes(1)
  })

  it("throws on a malformed payload without running anything", async () => {
    const runPipeline = vi.fn<(job: GenerationJob) => Promise<string>>()
    const { helpers, logger } = mockHelpers()
    const task = createContentGenerateTask({ runPipeline })

    await expect(task({ contentId: "x" }, helpers)).rejects.toThrow(
      /^content_generate: malformed payload/,
    )
    expect(runPipeline).not.toHaveBeenCalled()
    expect(logger.error).toHaveBeenCalledTimes(1)
  })
})
