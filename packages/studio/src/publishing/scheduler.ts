/**
 * Queue operations: turn READY content into pending schedule records plus
 * publish jobs on the queue.
 *
 * Per item, in order: create the PENDING schedule, enqueue the job (its
 * payload names that schedule), move the content to QUEUED.
 */

import { isPlatform, type Platform, type PublishJobPayload } from "@reelsmith/shared"
import { type Logger, ReelsmithAttributes, withSpan } from "@reelsmith/shared/tracing"

import type { ContentLifecycle } from "../content/lifecycle.js"
import type { ContentRepository, ScheduleRepository } from "../content/repository.js"
import type { Content } from "../db/types.js"
import { errorMessage, ValidationError } from "../errors.js"
import { buildCaption } from "./caption.js"
import { loadPublishable } from "./gate.js"
import { deliveryDelaySeconds, type SchedulePlanner } from "./planner.js"
import type { PublishQueue } from "./queue.js"

export interface QueueContentInput {
  contentId: number
  platform?: string
  scheduledAt?: Date
  caption?: string | null
}

export interface QueuedItem {
  content_id: number
  schedule_id: number
  scheduled_at: string
  message_id: string
}

export interface QueueAllResult {
  queued_count: number
  items: QueuedItem[]
}

export interface PublishSchedulerDeps {
  contents: ContentRepository
  schedules: ScheduleRepository
  lifecycle: ContentLifecycle
  queue: PublishQueue
  planner: SchedulePlanner
  logger: Logger
  now: () => Date
  /** Largest delay the queue applies natively. */
  maxDelaySeconds: number
}

export class PublishScheduler {
  constructor(private readonly deps: PublishSchedulerDeps) {}

  async queueContent(input: QueueContentInput): Promise<QueuedItem> {
    const { content, diagramPath, platform } = await loadPublishable(
      this.deps.contents,
      input.contentId,
      input.platform ?? "twitter",
    )
    const scheduledAt = await this.deps.planner.plan(input.scheduledAt)
    return this.enqueue(content, diagramPath, platform, scheduledAt, input.caption)
  }

  /** Every READY item with a diagram, oldest first, on consecutive slots. */
  async queueAllReady(options: { platform?: string } = {}): Promise<QueueAllResult> {
    const platform = options.platform ?? "twitter"
    if (!isPlatform(platform)) {
      throw new ValidationError(`Unknown platform: ${platform}`)
    }

    const ready = (await this.deps.contents.listReadyWithDiagram()).flatMap((content) =>
      content.diagram_path ? [{ content, diagramPath: content.diagram_path }] : [],
    )
    const slots = await this.deps.planner.planBulk(ready.length)

    const items: QueuedItem[] = []
    for (const [i, { content, diagramPath }] of ready.entries()) {
      const scheduledAt = slots[i]
      if (!scheduledAt) break
      items.push(await this.enqueue(content, diagramPath, platform, scheduledAt))
    }

    this.deps.logger.info("Queued all ready content", { count: items.length, platform })
    return { queued_count: items.length, items }
  }

  private async enqueue(
    content: Content,
    diagramPath: string,
    platform: Platform,
    scheduledAt: Date,
    customCaption?: string | null,
  ): Promise<QueuedItem> {
    return withSpan(
      "reelsmith.publish.enqueue",
      { [ReelsmithAttributes.CONTENT_ID]: content.id, [ReelsmithAttributes.PLATFORM]: platform },
      async (span) => {
        const { schedules, queue, lifecycle, now } = this.deps

        const schedule = await schedules.create({
          content_id: content.id,
          platform,
          scheduled_at: scheduledAt,
          status: "pending",
        })
        span.setAttribute(ReelsmithAttributes.SCHEDULE_ID, schedule.id)

        const enqueuedAt = now()
        const payload: PublishJobPayload = {
          content_id: content.id,
          schedule_id: schedule.id,
          platform,
          caption: buildCaption(content.script_data, customCaption),
          image_path: diagramPath,
          scheduled_at: scheduledAt.toISOString(),
          enqueued_at: enqueuedAt.toISOString(),
        }
        let messageId: string
        try {
          messageId = await queue.send(payload, {
            delaySeconds: deliveryDelaySeconds(scheduledAt, enqueuedAt, this.deps.maxDelaySeconds),
          })
        } catch (err) {
          // No message will ever finalize this record
          await schedules.markFailed(schedule.id, errorMessage(err))
          throw err
        }
        span.setAttribute(ReelsmithAttributes.QUEUE_MESSAGE_ID, messageId)

        await lifecycle.transition(content.id, "queued")

        return {
          content_id: content.id,
          schedule_id: schedule.id,
          scheduled_at: scheduledAt.toISOString(),
          message_id: messageId,
        }
      },
    )
  }
}
