/**
 * Storage access for topics, content items and schedule records.
 *
 * Services depend on the repository interfaces; the Kysely classes are the
 * PostgreSQL implementations wired in at startup.
 */

import type { ContentStatus, ContentType, ScriptPayload } from "@reelsmith/shared"
import { type Kysely, sql } from "kysely"

import type { Content, Database, NewSchedule, Schedule, Topic } from "../db/types.js"

// ──────────────────────────────────────────────────
// Interfaces
// ──────────────────────────────────────────────────

export interface TopicInput {
  name: string
  category: string
  description?: string | null
}

export interface TopicRepository {
  /** Idempotent on (name, category); the first description wins. */
  findOrCreate(input: TopicInput): Promise<Topic>
  get(id: number): Promise<Topic | undefined>
  list(): Promise<Topic[]>
  delete(id: number): Promise<boolean>
}

export interface NewContentInput {
  topic_id: number
  content_type: ContentType
  status: ContentStatus
}

export interface ContentListFilter {
  status?: ContentStatus
  limit?: number
  offset?: number
}

export interface ContentStatusPatch {
  error_message?: string | null
}

export interface ContentRepository {
  create(input: NewContentInput): Promise<Content>
  get(id: number): Promise<Content | undefined>
  /** Newest first. */
  list(filter?: ContentListFilter): Promise<Content[]>
  delete(id: number): Promise<boolean>
  /** Template ids of the `limit` most recently created script payloads, newest first. */
  recentTemplateIds(limit: number): Promise<string[]>
  saveScript(id: number, scriptText: string, scriptData: ScriptPayload): Promise<void>
  saveDiagram(id: number, diagramPath: string): Promise<void>
  /** Applies only while the row still has status `from`; false when it did not. */
  updateStatus(
    id: number,
    from: ContentStatus,
    to: ContentStatus,
    patch?: ContentStatusPatch,
  ): Promise<boolean>
  /** READY items with a diagram, oldest first. */
  listReadyWithDiagram(): Promise<Content[]>
}

export interface ScheduleRepository {
  create(input: NewSchedule): Promise<Schedule>
  get(id: number): Promise<Schedule | undefined>
  /** Latest scheduled_at across all pending records, any platform. */
  latestPendingScheduledAt(): Promise<Date | null>
  /** Most recently created pending record for one content item. */
  latestPendingForContent(contentId: number): Promise<Schedule | undefined>
  /** Pending records, soonest first. */
  listPending(): Promise<Schedule[]>
  /** Newest first. */
  listForContent(contentId: number): Promise<Schedule[]>
  /** Guarded on status = 'pending'. */
  markPublished(id: number, platformPostId: string, publishedAt: Date): Promise<boolean>
  /** Guarded on status = 'pending'. */
  markFailed(id: number, errorMessage: string): Promise<boolean>
}

// ──────────────────────────────────────────────────
// PostgreSQL implementations
// ──────────────────────────────────────────────────

export class KyselyTopicRepository implements TopicRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async findOrCreate(input: TopicInput): Promise<Topic> {
    await this.db
      .insertInto("topic")
      .values({
        name: input.name,
        category: input.category,
        description: input.description ?? null,
      })
      .onConflict((oc) => oc.columns(["name", "category"]).doNothing())
      .execute()

    return this.db
      .selectFrom("topic")
      .selectAll()
      .where("name", "=", input.name)
      .where("category", "=", input.category)
      .executeTakeFirstOrThrow()
  }

  async get(id: number): Promise<Topic | undefined> {
    return this.db.selectFrom("topic").selectAll().where("id", "=", id).executeTakeFirst()
  }

  async list(): Promise<Topic[]> {
    return this.db.selectFrom("topic").selectAll().orderBy("name").execute()
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.deleteFrom("topic").where("id", "=", id).executeTakeFirst()
    return Number(result.numDeletedRows) > 0
  }
}

export class KyselyContentRepository implements ContentRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async create(input: NewContentInput): Promise<Content> {
    return this.db
      .insertInto("content")
      .values(input)
      .returningAll()
      .executeTakeFirstOrThrow()
  }

  async get(id: number): Promise<Content | undefined> {
    return this.db.selectFrom("content").selectAll().where("id", "=", id).executeTakeFirst()
  }

  async list(filter: ContentListFilter = {}): Promise<Content[]> {
    let query = this.db
      .selectFrom("content")
      .selectAll()
      .orderBy("created_at", "desc")
      .orderBy("id", "desc")
      .limit(filter.limit ?? 50)
      .offset(filter.offset ?? 0)
    if (filter.status) {
      query = query.where("status", "=", filter.status)
    }
    return query.execute()
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.deleteFrom("content").where("id", "=", id).executeTakeFirst()
    return Number(result.numDeletedRows) > 0
  }

  async recentTemplateIds(limit: number): Promise<string[]> {
    const rows = await this.db
      .selectFrom("content")
      .select(sql<string | null>`script_data->>'template_id'`.as("template_id"))
      .where("script_data", "is not", null)
      .orderBy("created_at", "desc")
      .orderBy("id", "desc")
      .limit(limit)
      .execute()
    return rows.flatMap((row) => (row.template_id ? [row.template_id] : []))
  }

  async saveScript(id: number, scriptText: string, scriptData: ScriptPayload): Promise<void> {
    await this.db
      .updateTable("content")
      .set({ script_text: scriptText, script_data: scriptData, updated_at: new Date() })
      .where("id", "=", id)
      .execute()
  }

  async saveDiagram(id: number, diagramPath: string): Promise<void> {
    await this.db
      .updateTable("content")
      .set({ diagram_path: diagramPath, updated_at: new Date() })
      .where("id", "=", id)
      .execute()
  }

  async updateStatus(
    id: number,
    from: ContentStatus,
    to: ContentStatus,
    patch: ContentStatusPatch = {},
  ): Promise<boolean> {
    const result = await this.db
      .updateTable("content")
      .set({ ...patch, status: to, updated_at: new Date() })
      .where("id", "=", id)
      .where("status", "=", from)
      .executeTakeFirst()
    return Number(result.numUpdatedRows) > 0
  }

  async listReadyWithDiagram(): Promise<Content[]> {
    return this.db
      .selectFrom("content")
      .selectAll()
      .where("status", "=", "ready")
      .where("diagram_path", "is not", null)
      .orderBy("created_at", "asc")
      .orderBy("id", "asc")
      .execute()
  }
}

export class KyselyScheduleRepository implements ScheduleRepository {
  constructor(private readonly db: Kysely<Database>) {}

  async create(input: NewSchedule): Promise<Schedule> {
    return this.db.insertInto("schedule").values(input).returningAll().executeTakeFirstOrThrow()
  }

  async get(id: number): Promise<Schedule | undefined> {
    return this.db.selectFrom("schedule").selectAll().where("id", "=", id).executeTakeFirst()
  }

  async latestPendingScheduledAt(): Promise<Date | null> {
    const row = await this.db
      .selectFrom("schedule")
      .select(sql<Date | null>`max(scheduled_at)`.as("latest"))
      .where("status", "=", "pending")
      .executeTakeFirst()
    return row?.latest ?? null
  }

  async latestPendingForContent(contentId: number): Promise<Schedule | undefined> {
    return this.db
      .selectFrom("schedule")
      .selectAll()
      .where("content_id", "=", contentId)
      .where("status", "=", "pending")
      .orderBy("created_at", "desc")
      .orderBy("id", "desc")
      .limit(1)
      .executeTakeFirst()
  }

  async listPending(): Promise<Schedule[]> {
    return this.db
      .selectFrom("schedule")
      .selectAll()
      .where("status", "=", "pending")
      .orderBy("scheduled_at", "asc")
      .execute()
  }

  async listForContent(contentId: number): Promise<Schedule[]> {
    return this.db
      .selectFrom("schedule")
      .selectAll()
      .where("content_id", "=", contentId)
      .orderBy("created_at", "desc")
      .orderBy("id", "desc")
      .execute()
  }

  async markPublished(id: number, platformPostId: string, publishedAt: Date): Promise<boolean> {
    const result = await this.db
      .updateTable("schedule")
      .set({ status: "published", platform_post_id: platformPostId, published_at: publishedAt })
      .where("id", "=", id)
      .where("status", "=", "pending")
      .executeTakeFirst()
    return Number(result.numUpdatedRows) > 0
  }

  async markFailed(id: number, errorMessage: string): Promise<boolean> {
    const result = await this.db
      .updateTable("schedule")
      .set({ status: "failed", error_message: errorMessage })
      .where("id", "=", id)
      .where("status", "=", "pending")
      .executeTakeFirst()
    return Number(result.numUpdatedRows) > 0
  }
}
