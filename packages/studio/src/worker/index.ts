/**
 * Graphile Worker initialization.
 *
 * Configures the worker with:
 * - PostgreSQL connection (shared pool)
 * - Task handlers (content_generate)
 * - Concurrency (GRAPHILE_WORKER_CONCURRENCY, default 5)
 *
 * The runner is started alongside Fastify and shares the same pg.Pool.
 */

import { run, type Runner, type TaskList, type WorkerUtils } from "graphile-worker"
import type { Pool } from "pg"

import type { GenerationJob, GenerationScheduler } from "../generation/orchestrator.js"
import {
  CONTENT_GENERATE_TASK,
  type ContentGenerateDeps,
  createContentGenerateTask,
} from "./tasks/content-generate.js"

export interface WorkerOptions {
  pgPool: Pool
  generation: ContentGenerateDeps
  concurrency: number
}

/**
 * Create and start the Graphile Worker runner.
 * Returns the Runner instance (used for shutdown and health checks).
 */
export async function createWorker(options: WorkerOptions): Promise<Runner> {
  const taskList: TaskList = {
    [CONTENT_GENERATE_TASK]: createContentGenerateTask(options.generation),
  }

  return run({
    pgPool: options.pgPool,
    taskList,
    concurrency: options.concurrency,
    noHandleSignals: true, // We handle SIGTERM ourselves in shutdown.ts
  })
}

/** Schedules pipelines as graphile-worker jobs, one attempt each. */
export class GraphileGenerationScheduler implements GenerationScheduler {
  constructor(private readonly workerUtils: Pick<WorkerUtils, "addJob">) {}

  async schedule(job: GenerationJob): Promise<void> {
    await this.workerUtils.addJob(CONTENT_GENERATE_TASK, job, {
      jobKey: `generate:${job.contentId}`,
      maxAttempts: 1,
    })
  }
}

export type { Runner } from "graphile-worker"
