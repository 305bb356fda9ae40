/**
 * Publish Worker process. Run as many copies as needed; they compete for
 * messages on the same queue table.
 */

import { initTracing, shutdownTracing, TracingLogger, toLogLevel } from "@reelsmith/shared/tracing"

import { loadConfig } from "./config.js"
import { ContentLifecycle } from "./content/lifecycle.js"
import { KyselyContentRepository, KyselyScheduleRepository } from "./content/repository.js"
import { createDatabase } from "./db/index.js"
import { PublisherRegistry } from "./publishing/publishers/registry.js"
import { TwitterPublisher } from "./publishing/publishers/twitter.js"
import { PgPublishQueue } from "./publishing/queue.js"
import { drainDeadlineMs, PublishWorker, type PublishWorkerOptions } from "./publishing/worker.js"
import { registerShutdownHandlers } from "./worker/shutdown.js"

const config = loadConfig()

initTracing({ ...config.tracing, serviceName: `${config.tracing.serviceName}-publisher` })

const { db, pool } = createDatabase(config.databaseUrl)

const logger = new TracingLogger({
  level: toLogLevel(config.logLevel),
  serviceName: config.tracing.serviceName,
}).child({ component: "publish-worker", pid: process.pid })

const options: PublishWorkerOptions = {
  batchSize: config.publishQueue.batchSize,
  waitTimeSeconds: config.publishQueue.waitTimeSeconds,
  visibilityTimeoutSeconds: config.publishQueue.visibilityTimeoutSeconds,
}

const worker = new PublishWorker({
  queue: new PgPublishQueue(db, { pollIntervalMs: config.publishQueue.pollIntervalMs }),
  schedules: new KyselyScheduleRepository(db),
  lifecycle: new ContentLifecycle(new KyselyContentRepository(db)),
  publishers: new PublisherRegistry([new TwitterPublisher(config.twitter)]),
  logger,
  now: () => new Date(),
  options,
})

registerShutdownHandlers({
  log: logger,
  // An in-flight publish may take up to the visibility timeout
  deadlineMs: drainDeadlineMs(options),
  runner: {
    stop: async () => {
      await worker.stop()
      await shutdownTracing()
    },
  },
  pool,
})

worker.start()
