import { initTracing, shutdownTracing, TracingLogger, toLogLevel } from "@reelsmith/shared/tracing"
import { makeWorkerUtils } from "graphile-worker"

import { buildApp } from "./app.js"
import { loadConfig } from "./config.js"
import { runMigrations } from "./db/auto-migrate.js"
import { createDatabase } from "./db/index.js"
import { AiScriptWriter, createAnthropicCaller } from "./generation/ai-writer.js"
import { CardDiagramRenderer } from "./generation/diagram-renderer.js"
import { PublisherRegistry } from "./publishing/publishers/registry.js"
import { TwitterPublisher } from "./publishing/publishers/twitter.js"
import { createKyselyStorage, createStudioServices } from "./services.js"
import { createWorker, GraphileGenerationScheduler } from "./worker/index.js"
import { fromPino, registerShutdownHandlers } from "./worker/shutdown.js"

const config = loadConfig()

// Initialize tracing before anything else
initTracing(config.tracing)

const { db, pool } = createDatabase(config.databaseUrl)

const logger = new TracingLogger({
  level: toLogLevel(config.logLevel),
  serviceName: config.tracing.serviceName,
})

// Run pending migrations before starting the app
await runMigrations(pool, logger)

// Worker utils for job enqueueing from routes
const workerUtils = await makeWorkerUtils({ pgPool: pool })

const services = createStudioServices({
  storage: createKyselyStorage(db, config.publishQueue.pollIntervalMs),
  config: {
    publishIntervalMinutes: config.publishIntervalMinutes,
    maxGenerationBatch: config.maxGenerationBatch,
    recentTemplateWindow: config.recentTemplateWindow,
    maxQueueDelaySeconds: config.publishQueue.maxDelaySeconds,
  },
  renderer: new CardDiagramRenderer({ outputDir: config.outputDir }),
  writer: config.aiWriter
    ? new AiScriptWriter(
        createAnthropicCaller({ apiKey: config.aiWriter.apiKey, model: config.aiWriter.model }),
      )
    : undefined,
  publishers: new PublisherRegistry([new TwitterPublisher(config.twitter)]),
  logger: logger.child({ component: "generation" }),
  createScheduler: () => new GraphileGenerationScheduler(workerUtils),
})

// Graphile Worker runs alongside Fastify on the same pg.Pool
const runner = await createWorker({
  pgPool: pool,
  generation: services.orchestrator,
  concurrency: config.workerConcurrency,
})
let runnerStopped = false

const app = await buildApp({
  services,
  logLevel: config.logLevel,
  health: {
    pingDatabase: () => db.selectFrom("topic").select("id").limit(0).execute(),
    workerRunning: () => !runnerStopped,
  },
})

app.addHook("onClose", async () => {
  await workerUtils.release()
  await shutdownTracing()
})

registerShutdownHandlers({
  log: fromPino(app.log),
  closeServer: () => app.close(),
  runner: {
    stop: async () => {
      runnerStopped = true
      await runner.stop()
    },
  },
  pool,
})

try {
  const address = await app.listen({ port: config.port, host: config.host })
  app.log.info(`Studio listening on ${address}`)
} catch (err) {
  app.log.fatal(err)
  await shutdownTracing()
  process.exit(1)
}
