/**
 * In-process stand-ins for the PostgreSQL repositories, settings table and
 * publish queue. Row semantics (guards, ordering, cascades) follow the
 * Kysely implementations.
 */

import type { ContentStatus, PublishJobPayload, ScriptPayload } from "@reelsmith/shared"

import type { AnalyticsCounts, AnalyticsSource } from "../../content/analytics.js"
import type {
  ContentListFilter,
  ContentRepository,
  ContentStatusPatch,
  NewContentInput,
  ScheduleRepository,
  TopicInput,
  TopicRepository,
} from "../../content/repository.js"
import type { Content, NewSchedule, Schedule, Topic } from "../../db/types.js"
import type { PublishQueue, QueueMessage, QueueStats, ReceiveOptions } from "../../publishing/queue.js"
import type { SettingsStore } from "../../settings/service.js"
import type { Storage } from "../../services.js"

interface Tables {
  topics: Topic[]
  contents: Content[]
  schedules: Schedule[]
  settings: Map<string, string>
}

/** Counts of row-changing calls, for asserting that a path wrote nothing. */
export interface WriteCounters {
  contentStatus: number
  schedule: number
}

export class InMemoryTopicRepository implements TopicRepository {
  private nextId = 1

  constructor(
    private readonly tables: Tables,
    private readonly now: () => Date,
  ) {}

  async findOrCreate(input: TopicInput): Promise<Topic> {
    const existing = this.tables.topics.find(
      (t) => t.name === input.name && t.category === input.category,
    )
    if (existing) return { ...existing }
    const topic: Topic = {
      id: this.nextId++,
      name: input.name,
      category: input.category,
      description: input.description ?? null,
      created_at: this.now(),
    }
    this.tables.topics.push(topic)
    return { ...topic }
  }

  async get(id: number): Promise<Topic | undefined> {
    const topic = this.tables.topics.find((t) => t.id === id)
    return topic ? { ...topic } : undefined
  }

  async list(): Promise<Topic[]> {
    return [...this.tables.topics].sort((a, b) => a.name.localeCompare(b.name)).map((t) => ({ ...t }))
  }

  async delete(id: number): Promise<boolean> {
    const before = this.tables.topics.length
    this.tables.topics = this.tables.topics.filter((t) => t.id !== id)
    if (this.tables.topics.length === before) return false
    const removed = new Set(this.tables.contents.filter((c) => c.topic_id === id).map((c) => c.id))
    this.tables.contents = this.tables.contents.filter((c) => !removed.has(c.id))
    this.tables.schedules = this.tables.schedules.filter((s) => !removed.has(s.content_id))
    return true
  }
}

export class InMemoryContentRepository implements ContentRepository {
  private nextId = 1

  constructor(
    private readonly tables: Tables,
    private readonly now: () => Date,
    private readonly writes: WriteCounters,
  ) {}

  async create(input: NewContentInput): Promise<Content> {
    const at = this.now()
    const content: Content = {
      id: this.nextId++,
      topic_id: input.topic_id,
      content_type: input.content_type,
      status: input.status,
      script_text: null,
      script_data: null,
      diagram_path: null,
      audio_path: null,
      video_path: null,
      duration_seconds: null,
      error_message: null,
      created_at: at,
      updated_at: at,
    }
    this.tables.contents.push(content)
    return { ...content }
  }

  async get(id: number): Promise<Content | undefined> {
    const content = this.find(id)
    return content ? { ...content } : undefined
  }

  async list(filter: ContentListFilter = {}): Promise<Content[]> {
    const offset = filter.offset ?? 0
    return this.newestFirst()
      .filter((c) => !filter.status || c.status === filter.status)
      .slice(offset, offset + (filter.limit ?? 50))
      .map((c) => ({ ...c }))
  }

  async delete(id: number): Promise<boolean> {
    const before = this.tables.contents.length
    this.tables.contents = this.tables.contents.filter((c) => c.id !== id)
    this.tables.schedules = this.tables.schedules.filter((s) => s.content_id !== id)
    return this.tables.contents.length < before
  }

  async recentTemplateIds(limit: number): Promise<string[]> {
    return this.newestFirst()
      .filter((c) => c.script_data !== null)
      .slice(0, limit)
      .flatMap((c) => {
        const id = c.script_data?.template_id
        return typeof id === "string" && id ? [id] : []
      })
  }

  async saveScript(id: number, scriptText: string, scriptData: ScriptPayload): Promise<void> {
    const content = this.find(id)
    if (!content) return
    content.script_text = scriptText
    content.script_data = { ...scriptData }
    content.updated_at = this.now()
  }

  async saveDiagram(id: number, diagramPath: string): Promise<void> {
    const content = this.find(id)
    if (!content) return
    content.diagram_path = diagramPath
    content.updated_at = this.now()
  }

  async updateStatus(
    id: number,
    from: ContentStatus,
    to: ContentStatus,
    patch: ContentStatusPatch = {},
  ): Promise<boolean> {
    const content = this.find(id)
    if (!content || content.status !== from) return false
    this.writes.contentStatus++
    content.status = to
    if (patch.error_message !== undefined) content.error_message = patch.error_message
    content.updated_at = this.now()
    return true
  }

  async listReadyWithDiagram(): Promise<Content[]> {
    return this.tables.contents
      .filter((c) => c.status === "ready" && c.diagram_path !== null)
      .sort((a, b) => a.created_at.getTime() - b.created_at.getTime() || a.id - b.id)
      .map((c) => ({ ...c }))
  }

  /** Test setup: overwrite columns directly, bypassing the lifecycle. */
  seed(id: number, fields: Partial<Omit<Content, "id">>): void {
    const content = this.find(id)
    if (!content) throw new Error(`no content ${id}`)
    Object.assign(content, fields)
  }

  private find(id: number): Content | undefined {
    return this.tables.contents.find((c) => c.id === id)
  }

  private newestFirst(): Content[] {
    return [...this.tables.contents].sort(
      (a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id,
    )
  }
}

export class InMemoryScheduleRepository implements ScheduleRepository {
  private nextId = 1

  constructor(
    private readonly tables: Tables,
    private readonly now: () => Date,
    private readonly writes: WriteCounters,
  ) {}

  async create(input: NewSchedule): Promise<Schedule> {
    this.writes.schedule++
    const schedule: Schedule = {
      id: this.nextId++,
      content_id: input.content_id,
      platform: input.platform,
      scheduled_at: input.scheduled_at,
      published_at: input.published_at ?? null,
      status: input.status ?? "pending",
      platform_post_id: input.platform_post_id ?? null,
      error_message: input.error_message ?? null,
      created_at: this.now(),
    }
    this.tables.schedules.push(schedule)
    return { ...schedule }
  }

  async get(id: number): Promise<Schedule | undefined> {
    const schedule = this.find(id)
    return schedule ? { ...schedule } : undefined
  }

  async latestPendingScheduledAt(): Promise<Date | null> {
    let latest: Date | null = null
    for (const s of this.pending()) {
      if (!latest || s.scheduled_at > latest) latest = s.scheduled_at
    }
    return latest
  }

  async latestPendingForContent(contentId: number): Promise<Schedule | undefined> {
    const [latest] = this.newestFirst().filter(
      (s) => s.content_id === contentId && s.status === "pending",
    )
    return latest ? { ...latest } : undefined
  }

  async listPending(): Promise<Schedule[]> {
    return this.pending()
      .sort((a, b) => a.scheduled_at.getTime() - b.scheduled_at.getTime())
      .map((s) => ({ ...s }))
  }

  async listForContent(contentId: number): Promise<Schedule[]> {
    return this.newestFirst()
      .filter((s) => s.content_id === contentId)
      .map((s) => ({ ...s }))
  }

  async markPublished(id: number, platformPostId: string, publishedAt: Date): Promise<boolean> {
    const schedule = this.find(id)
    if (!schedule || schedule.status !== "pending") return false
    this.writes.schedule++
    schedule.status = "published"
    schedule.platform_post_id = platformPostId
    schedule.published_at = publishedAt
    return true
  }

  async markFailed(id: number, errorMessage: string): Promise<boolean> {
    const schedule = this.find(id)
    if (!schedule || schedule.status !== "pending") return false
    this.writes.schedule++
    schedule.status = "failed"
    schedule.error_message = errorMessage
    return true
  }

  all(): Schedule[] {
    return this.tables.schedules.map((s) => ({ ...s }))
  }

  private find(id: number): Schedule | undefined {
    return this.tables.schedules.find((s) => s.id === id)
  }

  private pending(): Schedule[] {
    return this.tables.schedules.filter((s) => s.status === "pending")
  }

  private newestFirst(): Schedule[] {
    return [...this.tables.schedules].sort(
      (a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id,
    )
  }
}

export class InMemorySettingsStore implements SettingsStore {
  constructor(private readonly values: Map<string, string>) {}

  async get(key: string): Promise<string | undefined> {
    return this.values.get(key)
  }

  async set(key: string, value: string): Promise<void> {
    this.values.set(key, value)
  }
}

interface StoredMessage {
  id: string
  body: unknown
  visibleAt: number
  receiptHandle: string | null
  receiveCount: number
}

/**
 * Queue with the Postgres queue's visibility rules. `receive` never waits:
 * it returns what is visible at the clock's current time.
 */
export class InMemoryPublishQueue implements PublishQueue {
  private readonly messages: StoredMessage[] = []
  private nextId = 1
  private nextHandle = 1
  readonly sent: Array<{ payload: PublishJobPayload; delaySeconds: number }> = []
  readonly deleted: string[] = []
  receiveError: Error | undefined

  constructor(private readonly now: () => Date) {}

  async send(payload: PublishJobPayload, options: { delaySeconds?: number } = {}): Promise<string> {
    const delaySeconds = options.delaySeconds ?? 0
    this.sent.push({ payload, delaySeconds })
    return this.push(JSON.parse(JSON.stringify(payload)), delaySeconds)
  }

  /** Enqueue a raw body, e.g. one that fails validation. */
  sendRaw(body: unknown): string {
    return this.push(body, 0)
  }

  async receive(options: ReceiveOptions): Promise<QueueMessage[]> {
    if (this.receiveError) throw this.receiveError
    const at = this.now().getTime()
    const claimed = this.messages
      .filter((m) => m.visibleAt <= at)
      .slice(0, options.maxMessages)
    return claimed.map((m) => {
      m.receiptHandle = `rh-${this.nextHandle++}`
      m.receiveCount++
      m.visibleAt = at + options.visibilityTimeoutSeconds * 1000
      return { id: m.id, receiptHandle: m.receiptHandle, receiveCount: m.receiveCount, body: m.body }
    })
  }

  async delete(receiptHandle: string): Promise<boolean> {
    const index = this.messages.findIndex((m) => m.receiptHandle === receiptHandle)
    if (index === -1) return false
    const [removed] = this.messages.splice(index, 1)
    if (removed) this.deleted.push(removed.id)
    return true
  }

  async stats(): Promise<QueueStats> {
    const at = this.now().getTime()
    return {
      visible: this.messages.filter((m) => m.visibleAt <= at).length,
      inFlight: this.messages.filter((m) => m.visibleAt > at && m.receiveCount > 0).length,
    }
  }

  get size(): number {
    return this.messages.length
  }

  private push(body: unknown, delaySeconds: number): string {
    const id = `msg-${this.nextId++}`
    this.messages.push({
      id,
      body,
      visibleAt: this.now().getTime() + delaySeconds * 1000,
      receiptHandle: null,
      receiveCount: 0,
    })
    return id
  }
}

const DAY_MS = 24 * 60 * 60 * 1000

export class InMemoryAnalyticsSource implements AnalyticsSource {
  constructor(private readonly tables: Tables) {}

  async counts(now: Date): Promise<AnalyticsCounts> {
    const byStatus: AnalyticsCounts["byStatus"] = {}
    const byType: Record<string, number> = {}
    const byCategory = new Map<string, number>()
    for (const c of this.tables.contents) {
      byStatus[c.status] = (byStatus[c.status] ?? 0) + 1
      byType[c.content_type] = (byType[c.content_type] ?? 0) + 1
      const topic = this.tables.topics.find((t) => t.id === c.topic_id)
      if (topic) byCategory.set(topic.category, (byCategory.get(topic.category) ?? 0) + 1)
    }
    const since = (days: number) =>
      this.tables.contents.filter((c) => c.created_at.getTime() >= now.getTime() - days * DAY_MS).length

    const recentPublications = [...this.tables.schedules]
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime() || b.id - a.id)
      .slice(0, 10)
      .map((s) => {
        const content = this.tables.contents.find((c) => c.id === s.content_id)
        const topic = this.tables.topics.find((t) => t.id === content?.topic_id)
        const hook = content?.script_data?.hook_text
        return {
          content_id: s.content_id,
          title: typeof hook === "string" ? hook : (topic?.name ?? ""),
          platform: s.platform,
          status: s.status,
          published_at: s.published_at?.toISOString() ?? null,
          post_id: s.platform_post_id,
        }
      })

    return {
      byStatus,
      byType,
      byCategory: [...byCategory.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([category, count]) => ({ category, count })),
      thisWeek: since(7),
      thisMonth: since(30),
      recentPublications,
    }
  }
}

export interface InMemoryStorage extends Storage {
  topics: InMemoryTopicRepository
  contents: InMemoryContentRepository
  schedules: InMemoryScheduleRepository
  settings: InMemorySettingsStore
  queue: InMemoryPublishQueue
  analytics: InMemoryAnalyticsSource
  writes: WriteCounters
}

export function createInMemoryStorage(now: () => Date): InMemoryStorage {
  const tables: Tables = { topics: [], contents: [], schedules: [], settings: new Map() }
  const writes: WriteCounters = { contentStatus: 0, schedule: 0 }
  return {
    topics: new InMemoryTopicRepository(tables, now),
    contents: new InMemoryContentRepository(tables, now, writes),
    schedules: new InMemoryScheduleRepository(tables, now, writes),
    settings: new InMemorySettingsStore(tables.settings),
    queue: new InMemoryPublishQueue(now),
    analytics: new InMemoryAnalyticsSource(tables),
    writes,
  }
}
