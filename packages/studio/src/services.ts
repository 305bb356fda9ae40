/**
 * Service composition shared by the HTTP process, the publish worker and
 * tests. Storage arrives as repository interfaces so tests can hand in
 * in-memory fakes.
 */

import type { ContentStatus, RandomSource } from "@reelsmith/shared"
import { createTemplateRegistry, loadCaptionPools, ScenarioPool } from "@reelsmith/shared/scenarios"
import { injectTraceContext, type Logger } from "@reelsmith/shared/tracing"
import type { Kysely } from "kysely"

import { type AnalyticsSource, KyselyAnalyticsSource } from "./content/analytics.js"
import { ContentLifecycle } from "./content/lifecycle.js"
import {
  type ContentRepository,
  KyselyContentRepository,
  KyselyScheduleRepository,
  KyselyTopicRepository,
  type ScheduleRepository,
  type TopicRepository,
} from "./content/repository.js"
import type { Config } from "./config.js"
import type { Database } from "./db/types.js"
import type { DiagramRenderer } from "./generation/diagram-renderer.js"
import {
  type GenerationJob,
  GenerationOrchestrator,
  type GenerationScheduler,
} from "./generation/orchestrator.js"
import { ScriptSynthesizer, type ScriptWriter } from "./generation/script-synthesizer.js"
import { DirectPublisher } from "./publishing/direct.js"
import { SchedulePlanner } from "./publishing/planner.js"
import type { PublisherRegistry } from "./publishing/publishers/registry.js"
import { PgPublishQueue, type PublishQueue } from "./publishing/queue.js"
import { PublishScheduler } from "./publishing/scheduler.js"
import { KyselySettingsStore, RuntimeSettings, type SettingsStore } from "./settings/service.js"

export interface Storage {
  topics: TopicRepository
  contents: ContentRepository
  schedules: ScheduleRepository
  settings: SettingsStore
  queue: PublishQueue
  analytics: AnalyticsSource
}

export function createKyselyStorage(db: Kysely<Database>, queuePollIntervalMs: number): Storage {
  return {
    topics: new KyselyTopicRepository(db),
    contents: new KyselyContentRepository(db),
    schedules: new KyselyScheduleRepository(db),
    settings: new KyselySettingsStore(db),
    queue: new PgPublishQueue(db, { pollIntervalMs: queuePollIntervalMs }),
    analytics: new KyselyAnalyticsSource(db),
  }
}

export type ServiceConfig = Pick<
  Config,
  "publishIntervalMinutes" | "maxGenerationBatch" | "recentTemplateWindow"
> & { maxQueueDelaySeconds: number }

export interface ServiceDeps {
  storage: Storage
  config: ServiceConfig
  renderer: DiagramRenderer
  writer?: ScriptWriter
  publishers: PublisherRegistry
  logger: Logger
  /** Builds the scheduler that runs generation pipelines in the background. */
  createScheduler: (run: (job: GenerationJob) => Promise<ContentStatus>) => GenerationScheduler
  now?: () => Date
  random?: RandomSource
}

export interface StudioServices extends Storage {
  runtimeSettings: RuntimeSettings
  lifecycle: ContentLifecycle
  orchestrator: GenerationOrchestrator
  planner: SchedulePlanner
  publishScheduler: PublishScheduler
  direct: DirectPublisher
  publishers: PublisherRegistry
  generationScheduler: GenerationScheduler
  now: () => Date
}

export function createStudioServices(deps: ServiceDeps): StudioServices {
  const { storage, config, logger } = deps
  const now = deps.now ?? (() => new Date())

  const runtimeSettings = new RuntimeSettings(storage.settings, {
    publishIntervalMinutes: config.publishIntervalMinutes,
  })
  const lifecycle = new ContentLifecycle(storage.contents)

  const synthesizer = new ScriptSynthesizer({
    pool: new ScenarioPool({
      templates: createTemplateRegistry(),
      captions: loadCaptionPools(),
      random: deps.random,
    }),
    writer: deps.writer,
    logger,
  })

  // The scheduler calls back into the orchestrator it is handed to.
  let orchestrator: GenerationOrchestrator | undefined
  const generationScheduler = deps.createScheduler(async (job) => {
    if (!orchestrator) throw new Error("Generation orchestrator is not initialised")
    return orchestrator.runPipeline(job)
  })
  orchestrator = new GenerationOrchestrator({
    topics: storage.topics,
    contents: storage.contents,
    lifecycle,
    synthesizer,
    renderer: deps.renderer,
    scheduler: generationScheduler,
    logger,
    recentTemplateWindow: config.recentTemplateWindow,
    maxBatch: config.maxGenerationBatch,
    captureTraceContext: () => injectTraceContext(),
  })

  const planner = new SchedulePlanner({
    schedules: storage.schedules,
    settings: runtimeSettings,
    now,
  })
  const publishScheduler = new PublishScheduler({
    contents: storage.contents,
    schedules: storage.schedules,
    lifecycle,
    queue: storage.queue,
    planner,
    logger,
    now,
    maxDelaySeconds: config.maxQueueDelaySeconds,
  })
  const direct = new DirectPublisher({
    contents: storage.contents,
    schedules: storage.schedules,
    lifecycle,
    publishers: deps.publishers,
    logger,
    now,
  })

  return {
    ...storage,
    runtimeSettings,
    lifecycle,
    orchestrator,
    planner,
    publishScheduler,
    direct,
    publishers: deps.publishers,
    generationScheduler,
    now,
  }
}
