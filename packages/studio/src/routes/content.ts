/**
 * Content and topic routes
 *
 * GET    /content?status=&limit=&offset=
 * GET    /content/:id
 * DELETE /content/:id     cascades to schedule records
 * GET    /topics
 * POST   /topics          find-or-create on (name, category)
 * DELETE /topics/:id      cascades to content
 */

import { type ContentStatus, isContentStatus } from "@reelsmith/shared"
import type { FastifyInstance } from "fastify"
import { z } from "zod"

import type { ContentRepository, TopicRepository } from "../content/repository.js"
import type { Content, Topic } from "../db/types.js"
import { NotFoundError } from "../errors.js"
import { parseId } from "./error-handler.js"

const ContentQuerySchema = z.object({
  status: z
    .custom<ContentStatus>((value) => typeof value === "string" && isContentStatus(value), {
      message: "unknown content status",
    })
    .optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0),
})

const TopicBodySchema = z.object({
  name: z.string().trim().min(1),
  category: z.string().trim().min(1),
  description: z.string().nullish(),
})

export type ContentWithTopic = Content & { topic: Topic | null }

export interface ContentRouteDeps {
  topics: TopicRepository
  contents: ContentRepository
}

export function contentRoutes(deps: ContentRouteDeps) {
  const { topics, contents } = deps

  async function withTopic(content: Content): Promise<ContentWithTopic> {
    return { ...content, topic: (await topics.get(content.topic_id)) ?? null }
  }

  function requireId(raw: string, resource: string): number {
    const id = parseId(raw)
    if (id === undefined) throw new NotFoundError(resource, raw)
    return id
  }

  return function register(app: FastifyInstance): void {
    // ── Content ──

    app.get("/content", async (request, reply) => {
      const query = ContentQuerySchema.parse(request.query)
      const rows = await contents.list(query)
      return reply.send(await Promise.all(rows.map(withTopic)))
    })

    app.get<{ Params: { id: string } }>("/content/:id", async (request, reply) => {
      const id = requireId(request.params.id, "Content")
      const content = await contents.get(id)
      if (!content) throw new NotFoundError("Content", id)
      return reply.send(await withTopic(content))
    })

    app.delete<{ Params: { id: string } }>("/content/:id", async (request, reply) => {
      const id = requireId(request.params.id, "Content")
      if (!(await contents.delete(id))) throw new NotFoundError("Content", id)
      request.log.info({ contentId: id }, "Content deleted")
      return reply.send({ message: "Content deleted" })
    })

    // ── Topics ──

    app.get("/topics", async (_request, reply) => {
      return reply.send(await topics.list())
    })

    app.post("/topics", async (request, reply) => {
      const body = TopicBodySchema.parse(request.body)
      return reply.send(await topics.findOrCreate(body))
    })

    app.delete<{ Params: { id: string } }>("/topics/:id", async (request, reply) => {
      const id = requireId(request.params.id, "Topic")
      if (!(await topics.delete(id))) throw new NotFoundError("Topic", id)
      request.log.info({ topicId: id }, "Topic deleted")
      return reply.send({ message: "Topic deleted" })
    })
  }
}
