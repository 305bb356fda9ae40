/**
 * Publish Worker: single-threaded polling loop per process.
 *
 * Per message:
 *   RECEIVED → not due: no write, no delete; the message reappears after
 *              the visibility timeout
 *            → due: PUBLISHING → PUBLISHED | FAILED, message deleted either way
 *
 * Failed publishes are terminal; recovery is a new queue operation.
 * Terminal updates are guarded on the status read, so a duplicate delivery
 * leaves the database as it was. Several processes can poll the same queue.
 */

import { setTimeout as sleep } from "node:timers/promises"

import type { PublishJobPayload } from "@reelsmith/shared"
import { type Logger, ReelsmithAttributes, withSpan } from "@reelsmith/shared/tracing"

import type { ContentLifecycle } from "../content/lifecycle.js"
import type { ScheduleRepository } from "../content/repository.js"
import type { Schedule } from "../db/types.js"
import { errorMessage } from "../errors.js"
import { classifyError } from "../worker/error-classifier.js"
import { PLATFORM_NAMES, type PublisherRegistry, type PublishResult } from "./publishers/registry.js"
import { parseQueueMessage, type PublishQueue, type QueueMessage } from "./queue.js"

export type JobOutcome = "not_due" | "published" | "failed" | "malformed"

export interface PublishWorkerOptions {
  batchSize: number
  waitTimeSeconds: number
  /** Must exceed the worst-case publish latency. */
  visibilityTimeoutSeconds: number
  /** Pause after a loop-level error before polling again. */
  errorBackoffMs?: number
}

export interface PublishWorkerDeps {
  queue: PublishQueue
  schedules: ScheduleRepository
  lifecycle: ContentLifecycle
  publishers: PublisherRegistry
  logger: Logger
  now: () => Date
  options: PublishWorkerOptions
}

const DEFAULT_ERROR_BACKOFF_MS = 5_000
const DRAIN_MARGIN_MS = 5_000

/** How long shutdown waits for the loop: one full publish plus a margin. */
export function drainDeadlineMs(options: Pick<PublishWorkerOptions, "visibilityTimeoutSeconds">): number {
  return options.visibilityTimeoutSeconds * 1000 + DRAIN_MARGIN_MS
}

export class PublishWorker {
  private stopping = false
  private readonly abort = new AbortController()
  private loop: Promise<void> | undefined

  constructor(private readonly deps: PublishWorkerDeps) {}

  get running(): boolean {
    return this.loop !== undefined && !this.stopping
  }

  /** Start polling in the background; `stop()` ends it. */
  start(): void {
    if (this.loop) return
    this.deps.logger.info("Publish worker started", {
      batchSize: this.deps.options.batchSize,
      visibilityTimeoutSeconds: this.deps.options.visibilityTimeoutSeconds,
    })
    this.loop = this.run()
  }

  /** Aborts the long-poll wait and resolves once the in-flight message is done. */
  async stop(): Promise<void> {
    this.stopping = true
    this.abort.abort()
    await this.loop
    this.deps.logger.info("Publish worker stopped")
  }

  /** One receive plus processing of what it returned. Never rejects. */
  async pollOnce(): Promise<JobOutcome[]> {
    const { queue, options, logger } = this.deps

    let messages: QueueMessage[]
    try {
      messages = await queue.receive({
        maxMessages: options.batchSize,
        waitTimeSeconds: options.waitTimeSeconds,
        visibilityTimeoutSeconds: options.visibilityTimeoutSeconds,
        signal: this.abort.signal,
      })
    } catch (err) {
      logger.error("Queue receive failed", { error: errorMessage(err) })
      await this.backoff()
      return []
    }

    const outcomes: JobOutcome[] = []
    for (const message of messages) {
      try {
        outcomes.push(await this.handle(message))
      } catch (err) {
        // Left undeleted: the message comes back after its visibility timeout
        logger.error("Error processing publish job", {
          messageId: message.id,
          error: errorMessage(err),
        })
        await this.backoff()
      }
    }
    return outcomes
  }

  async handle(message: QueueMessage): Promise<JobOutcome> {
    const { queue, logger } = this.deps

    const parsed = parseQueueMessage(message)
    if (!parsed.ok) {
      logger.error("Malformed publish job, discarding", {
        messageId: message.id,
        error: parsed.error,
      })
      await queue.delete(message.receiptHandle)
      return "malformed"
    }
    const job = parsed.payload

    return withSpan(
      "reelsmith.publish.job",
      {
        [ReelsmithAttributes.CONTENT_ID]: job.content_id,
        [ReelsmithAttributes.PLATFORM]: job.platform,
        [ReelsmithAttributes.QUEUE_MESSAGE_ID]: message.id,
        [ReelsmithAttributes.QUEUE_RECEIVE_COUNT]: message.receiveCount,
      },
      async (span) => {
        const outcome = await this.process(job)
        span.setAttribute(ReelsmithAttributes.PUBLISH_OUTCOME, outcome)
        if (outcome !== "not_due") {
          await queue.delete(message.receiptHandle)
        }
        return outcome
      },
    )
  }

  private async process(job: PublishJobPayload): Promise<JobOutcome> {
    const { publishers, logger, now } = this.deps

    if (job.scheduled_at !== null) {
      const scheduledAt = new Date(job.scheduled_at)
      const current = now()
      if (scheduledAt > current) {
        logger.info("Publish job not due yet, leaving it on the queue", {
          contentId: job.content_id,
          scheduledAt: job.scheduled_at,
          secondsUntilDue: Math.round((scheduledAt.getTime() - current.getTime()) / 1000),
        })
        return "not_due"
      }
    }

    const publisher = publishers.get(job.platform)
    if (!publisher) {
      logger.warn("Unsupported platform", { contentId: job.content_id, platform: job.platform })
      await this.finalizeFailure(job, `Unsupported platform: ${job.platform}`)
      return "failed"
    }
    if (!publisher.isConfigured()) {
      const message = `${PLATFORM_NAMES[publisher.platform]} is not configured`
      logger.warn(message, { contentId: job.content_id })
      await this.finalizeFailure(job, message)
      return "failed"
    }

    logger.info("Publishing content", { contentId: job.content_id, platform: job.platform })
    let result: PublishResult
    try {
      result = await publisher.postImage(job.image_path, job.caption)
    } catch (err) {
      const message = errorMessage(err)
      const classification = classifyError(err)
      logger.error("Publish failed", {
        contentId: job.content_id,
        platform: job.platform,
        error: message,
        category: classification.category,
      })
      await this.finalizeFailure(job, message)
      return "failed"
    }

    await this.finalizeSuccess(job, result)
    logger.info("Published", { contentId: job.content_id, url: result.url })
    return "published"
  }

  private async finalizeSuccess(job: PublishJobPayload, result: PublishResult): Promise<void> {
    await this.deps.lifecycle.finalize(job.content_id, "published")
    const schedule = await this.targetSchedule(job)
    if (schedule) {
      await this.deps.schedules.markPublished(schedule.id, result.postId, this.deps.now())
    }
  }

  private async finalizeFailure(job: PublishJobPayload, message: string): Promise<void> {
    await this.deps.lifecycle.finalize(job.content_id, "failed", { error_message: message })
    const schedule = await this.targetSchedule(job)
    if (schedule) {
      await this.deps.schedules.markFailed(schedule.id, message)
    }
  }

  /** The payload's schedule record, else the newest pending one for the content. */
  private async targetSchedule(job: PublishJobPayload): Promise<Schedule | undefined> {
    if (job.schedule_id !== undefined) {
      return this.deps.schedules.get(job.schedule_id)
    }
    return this.deps.schedules.latestPendingForContent(job.content_id)
  }

  private async run(): Promise<void> {
    while (!this.stopping) {
      await this.pollOnce()
    }
  }

  private async backoff(): Promise<void> {
    if (this.stopping) return
    try {
      await sleep(this.deps.options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS, undefined, {
        signal: this.abort.signal,
      })
    } catch (err) {
      if (!(err instanceof Error && err.name === "AbortError")) throw err
    }
  }
}
