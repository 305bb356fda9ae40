import type { FastifyInstance } from "fastify"

export interface HealthRouteDeps {
  /** Resolves when the database answers a trivial query. */
  pingDatabase: () => Promise<unknown>
  /** Whether the background generation runner is up. */
  workerRunning: () => boolean
}

export function healthRoutes(deps: HealthRouteDeps) {
  return function register(app: FastifyInstance): void {
    /** Liveness: 200 whenever the process is up. */
    app.get("/healthz", async (_request, reply) => {
      return reply.send({ status: "ok" })
    })

    /** Readiness: the generation runner is up and PostgreSQL answers. */
    app.get("/readyz", async (request, reply) => {
      const checks: Record<string, boolean> = {
        worker: deps.workerRunning(),
        db: false,
      }

      try {
        await deps.pingDatabase()
        checks.db = true
      } catch (err) {
        request.log.warn({ err }, "Readiness database check failed")
      }

      const ready = Object.values(checks).every(Boolean)
      return reply.status(ready ? 200 : 503).send({ status: ready ? "ok" : "not_ready", checks })
    })
  }
}
