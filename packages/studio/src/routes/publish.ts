/**
 * Publishing routes
 *
 * GET  /publish/platforms             platform list with configured flags
 * POST /publish/now                   synchronous publish, bypasses the queue
 * POST /publish/queue                 one item onto the next slot (or an explicit time)
 * POST /publish/queue-all             every READY item onto consecutive slots
 * GET  /publish/queue-status          PENDING schedule records plus queue depth
 * GET  /publish/history/:contentId    schedule records of one item, newest first
 */

import type { FastifyInstance } from "fastify"
import { z } from "zod"

import type { ScheduleRepository } from "../content/repository.js"
import { NotFoundError } from "../errors.js"
import type { DirectPublisher } from "../publishing/direct.js"
import type { PublisherRegistry } from "../publishing/publishers/registry.js"
import type { PublishQueue } from "../publishing/queue.js"
import type { PublishScheduler } from "../publishing/scheduler.js"
import { parseId } from "./error-handler.js"

const PublishNowBodySchema = z.object({
  content_id: z.number().int().positive(),
  platform: z.string().default("twitter"),
  caption: z.string().nullish(),
  hashtags: z.array(z.string()).optional(),
})

const QueueBodySchema = z.object({
  content_id: z.number().int().positive(),
  platform: z.string().default("twitter"),
  scheduled_at: z.string().datetime({ offset: true }).nullish(),
  caption: z.string().nullish(),
})

const QueueAllBodySchema = z
  .object({ platform: z.string().default("twitter") })
  .default({})

export interface PublishRouteDeps {
  publishers: Pick<PublisherRegistry, "statuses">
  direct: Pick<DirectPublisher, "publishNow">
  scheduler: Pick<PublishScheduler, "queueContent" | "queueAllReady">
  schedules: Pick<ScheduleRepository, "listPending" | "listForContent">
  queue: Pick<PublishQueue, "stats">
}

export function publishRoutes(deps: PublishRouteDeps) {
  const { publishers, direct, scheduler, schedules, queue } = deps

  return function register(app: FastifyInstance): void {
    app.get("/publish/platforms", async (_request, reply) => {
      return reply.send(publishers.statuses())
    })

    app.post("/publish/now", async (request, reply) => {
      const body = PublishNowBodySchema.parse(request.body)
      const result = await direct.publishNow({
        contentId: body.content_id,
        platform: body.platform,
        caption: body.caption,
        hashtags: body.hashtags,
      })
      return reply.send(result)
    })

    app.post("/publish/queue", async (request, reply) => {
      const body = QueueBodySchema.parse(request.body)
      const item = await scheduler.queueContent({
        contentId: body.content_id,
        platform: body.platform,
        scheduledAt: body.scheduled_at ? new Date(body.scheduled_at) : undefined,
        caption: body.caption,
      })
      return reply.status(201).send({
        message: `Content queued for ${item.scheduled_at}`,
        ...item,
      })
    })

    app.post("/publish/queue-all", async (request, reply) => {
      const body = QueueAllBodySchema.parse(request.body ?? undefined)
      const result = await scheduler.queueAllReady({ platform: body.platform })
      return reply.send({
        message: `Queued ${result.queued_count} items for publishing`,
        ...result,
      })
    })

    app.get("/publish/queue-status", async (_request, reply) => {
      const [pending, stats] = await Promise.all([schedules.listPending(), queue.stats()])
      return reply.send({
        pending_items: pending.map((schedule) => ({
          schedule_id: schedule.id,
          content_id: schedule.content_id,
          platform: schedule.platform,
          scheduled_at: schedule.scheduled_at.toISOString(),
          status: schedule.status,
        })),
        queue: stats,
      })
    })

    app.get<{ Params: { contentId: string } }>(
      "/publish/history/:contentId",
      async (request, reply) => {
        const contentId = parseId(request.params.contentId)
        if (contentId === undefined) throw new NotFoundError("Content", request.params.contentId)
        const records = await schedules.listForContent(contentId)
        return reply.send(
          records.map((schedule) => ({
            id: schedule.id,
            platform: schedule.platform,
            status: schedule.status,
            published_at: schedule.published_at?.toISOString() ?? null,
            post_id: schedule.platform_post_id,
            error: schedule.error_message,
          })),
        )
      },
    )
  }
}
