/**
 * Content generation task: "content_generate"
 *
 * Runs one generation pipeline. The pipeline persists its own failure, so
 * the task only throws on a malformed payload, which graphile-worker then
 * records as a failed job (jobs are enqueued with maxAttempts 1).
 */

import { withExtractedContext } from "@reelsmith/shared/tracing"
import type { JobHelpers, Task } from "graphile-worker"

import { type GenerationJob, GenerationJobSchema } from "../../generation/orchestrator.js"

export const CONTENT_GENERATE_TASK = "content_generate"

export interface ContentGenerateDeps {
  runPipeline(job: GenerationJob): Promise<string>
}

export function createContentGenerateTask(deps: ContentGenerateDeps): Task {
  return async (rawPayload: unknown, helpers: JobHelpers): Promise<void> => {
    const parsed = GenerationJobSchema.safeParse(rawPayload)
    if (!parsed.success) {
      helpers.logger.error(`content_generate: malformed payload: ${parsed.error.message}`)
      throw new Error(`content_generate: malformed payload: ${parsed.error.message}`)
    }

    const job = parsed.data
    const run = () => deps.runPipeline(job)
    const status = job.traceContext
      ? await withExtractedContext(job.traceContext, run)
      : await run()

    helpers.logger.info(`content_generate: content ${job.contentId} finished as ${status}`)
  }
}
