/**
 * Generation Orchestrator.
 *
 * Request side: find-or-create the topic, create the content row in
 * `generating`, hand the pipeline to a background scheduler and return.
 *
 * Background side (`runPipeline`):
 * 1. Read the recency list from the latest script payloads
 * 2. Synthesize a script (template pool, AI writer as fallback)
 * 3. Render the diagram
 * 4. Move the content to `ready`
 *
 * Any failure marks the content `failed` with the error text. Rows already
 * written (topic, content, a saved script) stay as they are.
 */

import type { ContentStatus, ContentType, ScriptPayload } from "@reelsmith/shared"
import { type Logger, ReelsmithAttributes, type TraceCarrier, withSpan } from "@reelsmith/shared/tracing"
import { z } from "zod"

import type { ContentLifecycle } from "../content/lifecycle.js"
import type { ContentRepository, TopicRepository } from "../content/repository.js"
import { CollaboratorError, errorMessage, NotFoundError, ValidationError } from "../errors.js"
import { classifyError } from "../worker/error-classifier.js"
import type { DiagramRenderer } from "./diagram-renderer.js"
import { buildScriptText, type ScriptSynthesizer } from "./script-synthesizer.js"

// ──────────────────────────────────────────────────
// Types
// ──────────────────────────────────────────────────

export interface GenerationRequest {
  topic_name: string
  category: string
  description?: string | null
  content_type: ContentType
}

export const GenerationJobSchema = z.object({
  contentId: z.number().int().positive(),
  topicName: z.string(),
  category: z.string(),
  description: z.string().nullable(),
  traceContext: z.record(z.string()).optional(),
})

export type GenerationJob = z.infer<typeof GenerationJobSchema>

/** Starts a pipeline without waiting for it. */
export interface GenerationScheduler {
  schedule(job: GenerationJob): Promise<void>
}

export interface SubmitResult {
  content_id: number
  status: "generating"
  message: string
}

export type BatchItemResult =
  | (SubmitResult & { accepted: true })
  | { accepted: false; topic_name: string; message: string }

export interface GenerationStatus {
  content_id: number
  status: ContentStatus
  has_script: boolean
  has_diagram: boolean
  has_audio: boolean
  has_video: boolean
  error_message: string | null
  script_data: Record<string, unknown> | null
}

export interface GenerationOrchestratorDeps {
  topics: TopicRepository
  contents: ContentRepository
  lifecycle: ContentLifecycle
  synthesizer: ScriptSynthesizer
  renderer: DiagramRenderer
  scheduler: GenerationScheduler
  logger: Logger
  /** How many recent payloads feed template recency. */
  recentTemplateWindow: number
  maxBatch: number
  /** Produces the carrier stored on each job; defaults to none. */
  captureTraceContext?: () => TraceCarrier
}

// ──────────────────────────────────────────────────
// Orchestrator
// ──────────────────────────────────────────────────

export class GenerationOrchestrator {
  constructor(private readonly deps: GenerationOrchestratorDeps) {}

  async submit(request: GenerationRequest): Promise<SubmitResult> {
    const topic = await this.deps.topics.findOrCreate({
      name: request.topic_name,
      category: request.category,
      description: request.description,
    })
    const content = await this.deps.contents.create({
      topic_id: topic.id,
      content_type: request.content_type,
      status: "generating",
    })

    try {
      await this.deps.scheduler.schedule({
        contentId: content.id,
        topicName: request.topic_name,
        category: request.category,
        description: request.description ?? null,
        traceContext: this.deps.captureTraceContext?.(),
      })
    } catch (err) {
      // Nothing will ever pick this row up again
      await this.markFailed(content.id, errorMessage(err))
      throw err
    }

    return {
      content_id: content.id,
      status: "generating",
      message: `Started generation for: ${request.topic_name}`,
    }
  }

  async submitBatch(requests: readonly GenerationRequest[]): Promise<BatchItemResult[]> {
    if (requests.length === 0) {
      throw new ValidationError("batch must contain at least one topic")
    }
    if (requests.length > this.deps.maxBatch) {
      throw new ValidationError(`Maximum ${this.deps.maxBatch} topics per batch`)
    }

    const results: BatchItemResult[] = []
    for (const request of requests) {
      try {
        results.push({ ...(await this.submit(request)), accepted: true })
      } catch (err) {
        this.deps.logger.error("Batch item rejected", {
          topic: request.topic_name,
          error: errorMessage(err),
        })
        results.push({ accepted: false, topic_name: request.topic_name, message: errorMessage(err) })
      }
    }
    return results
  }

  /** Never rejects: every outcome ends in `ready` or a persisted `failed`. */
  async runPipeline(job: GenerationJob): Promise<ContentStatus> {
    const { contents, lifecycle, synthesizer, logger: log } = this.deps

    return withSpan(
      "reelsmith.generation.pipeline",
      { [ReelsmithAttributes.CONTENT_ID]: job.contentId },
      async (span) => {
        try {
          const recentTemplateIds = await contents.recentTemplateIds(this.deps.recentTemplateWindow)
          const script = await synthesizer.synthesize({
            topic: job.topicName,
            category: job.category,
            description: job.description ?? "",
            recentTemplateIds,
          })
          span.setAttribute(ReelsmithAttributes.TEMPLATE_ID, script.template_id)
          await contents.saveScript(job.contentId, buildScriptText(script), script)

          const diagramPath = await this.render(script, job.topicName)
          await contents.saveDiagram(job.contentId, diagramPath)

          const advanced = await lifecycle.transition(job.contentId, "ready")
          if (!advanced) {
            log.warn("Content changed status during generation", { contentId: job.contentId })
          }
          log.info("Generation finished", {
            contentId: job.contentId,
            templateId: script.template_id,
            diagramPath,
          })
          span.setAttribute(ReelsmithAttributes.CONTENT_STATUS, "ready")
          return "ready"
        } catch (err) {
          const message = errorMessage(err)
          const classification = classifyError(err)
          span.setAttribute(ReelsmithAttributes.ERROR_CATEGORY, classification.category)
          span.setAttribute(ReelsmithAttributes.CONTENT_STATUS, "failed")
          log.error("Generation failed", {
            contentId: job.contentId,
            error: message,
            category: classification.category,
          })
          await this.markFailed(job.contentId, message)
          return "failed"
        }
      },
    )
  }

  async status(contentId: number): Promise<GenerationStatus> {
    const content = await this.deps.contents.get(contentId)
    if (!content) throw new NotFoundError("Content", contentId)
    return {
      content_id: content.id,
      status: content.status,
      has_script: content.script_text !== null,
      has_diagram: content.diagram_path !== null,
      has_audio: content.audio_path !== null,
      has_video: content.video_path !== null,
      error_message: content.error_message,
      script_data: content.script_data,
    }
  }

  private async render(script: ScriptPayload, topicName: string): Promise<string> {
    try {
      return await this.deps.renderer.renderFromDescription(
        script.hook_text || topicName,
        script.diagram_description,
        script.answer_options,
        script.correct_answer,
      )
    } catch (err) {
      throw new CollaboratorError("diagram-renderer", err)
    }
  }

  private async markFailed(contentId: number, message: string): Promise<void> {
    try {
      await this.deps.lifecycle.finalize(contentId, "failed", { error_message: message })
    } catch (err) {
      this.deps.logger.error("Could not record generation failure", {
        contentId,
        error: errorMessage(err),
      })
    }
  }
}
