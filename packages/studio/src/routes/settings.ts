import type { FastifyInstance } from "fastify"
import { z } from "zod"

import type { RuntimeSettings } from "../settings/service.js"

const IntervalBodySchema = z.object({ minutes: z.unknown() })

export interface SettingsRouteDeps {
  settings: Pick<RuntimeSettings, "getPublishIntervalMinutes" | "setPublishIntervalMinutes">
}

/**
 * GET /settings/publish-interval
 * PUT /settings/publish-interval   body: { minutes }
 *
 * A change applies to the next planning call; slots already handed out keep
 * their times.
 */
export function settingsRoutes(deps: SettingsRouteDeps) {
  const { settings } = deps

  return function register(app: FastifyInstance): void {
    app.get("/settings/publish-interval", async (_request, reply) => {
      return reply.send({ minutes: await settings.getPublishIntervalMinutes() })
    })

    app.put("/settings/publish-interval", async (request, reply) => {
      const body = IntervalBodySchema.parse(request.body)
      const minutes = await settings.setPublishIntervalMinutes(body.minutes)
      request.log.info({ minutes }, "Publish interval updated")
      return reply.send({ minutes })
    })
  }
}
