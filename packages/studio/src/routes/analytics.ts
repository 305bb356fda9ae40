import type { FastifyInstance } from "fastify"

import { type AnalyticsSource, buildOverview } from "../content/analytics.js"

export interface AnalyticsRouteDeps {
  analytics: AnalyticsSource
  now: () => Date
}

export function analyticsRoutes(deps: AnalyticsRouteDeps) {
  return function register(app: FastifyInstance): void {
    app.get("/analytics/overview", async (_request, reply) => {
      const counts = await deps.analytics.counts(deps.now())
      return reply.send(buildOverview(counts))
    })
  }
}
