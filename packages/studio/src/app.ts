import Fastify, { type FastifyInstance } from "fastify"

import { analyticsRoutes } from "./routes/analytics.js"
import { contentRoutes } from "./routes/content.js"
import { registerErrorHandler } from "./routes/error-handler.js"
import { generateRoutes } from "./routes/generate.js"
import { healthRoutes, type HealthRouteDeps } from "./routes/health.js"
import { publishRoutes } from "./routes/publish.js"
import { settingsRoutes } from "./routes/settings.js"
import type { StudioServices } from "./services.js"

export interface AppOptions {
  services: StudioServices
  health: HealthRouteDeps
  /** Pino level; "silent" in tests. */
  logLevel: string
}

export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const { services } = options
  const app = Fastify({
    logger: {
      level: options.logLevel,
    },
  })

  registerErrorHandler(app)

  await app.register(healthRoutes(options.health))
  await app.register(
    generateRoutes({
      orchestrator: services.orchestrator,
    }),
  )
  await app.register(
    contentRoutes({
      topics: services.topics,
      contents: services.contents,
    }),
  )
  await app.register(
    publishRoutes({
      publishers: services.publishers,
      direct: services.direct,
      scheduler: services.publishScheduler,
      schedules: services.schedules,
      queue: services.queue,
    }),
  )
  await app.register(settingsRoutes({ settings: services.runtimeSettings }))
  await app.register(analyticsRoutes({ analytics: services.analytics, now: services.now }))

  return app
}
