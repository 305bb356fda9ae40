/**
 * Generation routes
 *
 * POST /generate/single       start one pipeline, returns immediately
 * POST /generate/batch        start up to MAX_GENERATION_BATCH pipelines
 * GET  /generate/status/:id   artifact flags for one content item
 */

import { CONTENT_TYPES } from "@reelsmith/shared"
import type { FastifyInstance } from "fastify"
import { z } from "zod"

import { NotFoundError } from "../errors.js"
import type { GenerationOrchestrator } from "../generation/orchestrator.js"
import { parseId } from "./error-handler.js"

export const GenerateBodySchema = z.object({
  topic_name: z.string().trim().min(1),
  category: z.string().trim().min(1).default("engineering"),
  description: z.string().nullish(),
  content_type: z.enum(CONTENT_TYPES).default("problem"),
})

const BatchBodySchema = z.object({
  topics: z.array(GenerateBodySchema),
})

export interface GenerateRouteDeps {
  orchestrator: Pick<GenerationOrchestrator, "submit" | "submitBatch" | "status">
}

export function generateRoutes(deps: GenerateRouteDeps) {
  const { orchestrator } = deps

  return function register(app: FastifyInstance): void {
    app.post("/generate/single", async (request, reply) => {
      const body = GenerateBodySchema.parse(request.body)
      const result = await orchestrator.submit(body)
      return reply.status(202).send(result)
    })

    app.post("/generate/batch", async (request, reply) => {
      const { topics } = BatchBodySchema.parse(request.body)
      const items = await orchestrator.submitBatch(topics)
      const accepted = items.filter((item) => item.accepted).length
      return reply.status(202).send({
        message: `Started generation for ${accepted} of ${items.length} topics`,
        items,
      })
    })

    app.get<{ Params: { id: string } }>("/generate/status/:id", async (request, reply) => {
      const id = parseId(request.params.id)
      if (id === undefined) throw new NotFoundError("Content", request.params.id)
      return reply.send(await orchestrator.status(id))
    })
  }
}
