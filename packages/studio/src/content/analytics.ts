import type { ContentStatus, Platform, ScheduleStatus } from "@reelsmith/shared"
import { type Kysely, sql } from "kysely"

import type { Database } from "../db/types.js"

export interface RecentPublication {
  content_id: number
  title: string
  platform: Platform
  status: ScheduleStatus
  published_at: string | null
  post_id: string | null
}

/** Raw aggregates read from storage. */
export interface AnalyticsCounts {
  byStatus: Partial<Record<ContentStatus, number>>
  byType: Record<string, number>
  byCategory: Array<{ category: string; count: number }>
  thisWeek: number
  thisMonth: number
  recentPublications: RecentPublication[]
}

export interface AnalyticsOverview {
  total_content: number
  by_status: Partial<Record<ContentStatus, number>>
  by_type: Record<string, number>
  category_counts: Array<{ category: string; count: number }>
  this_week: number
  this_month: number
  /** Percentage of all content that is published, one decimal. */
  publish_rate: number
  recent_publications: RecentPublication[]
}

export interface AnalyticsSource {
  counts(now: Date): Promise<AnalyticsCounts>
}

export function buildOverview(counts: AnalyticsCounts): AnalyticsOverview {
  const total = Object.values(counts.byStatus).reduce((sum, n) => sum + n, 0)
  const published = counts.byStatus.published ?? 0
  return {
    total_content: total,
    by_status: counts.byStatus,
    by_type: counts.byType,
    category_counts: counts.byCategory,
    this_week: counts.thisWeek,
    this_month: counts.thisMonth,
    publish_rate: total > 0 ? Math.round((published / total) * 1000) / 10 : 0,
    recent_publications: counts.recentPublications,
  }
}

const DAY_MS = 24 * 60 * 60 * 1000

export class KyselyAnalyticsSource implements AnalyticsSource {
  constructor(private readonly db: Kysely<Database>) {}

  async counts(now: Date): Promise<AnalyticsCounts> {
    const weekAgo = new Date(now.getTime() - 7 * DAY_MS)
    const monthAgo = new Date(now.getTime() - 30 * DAY_MS)
    const count = sql<string>`count(*)`

    const [statusRows, typeRows, categoryRows, week, month, recent] = await Promise.all([
      this.db.selectFrom("content").select(["status", count.as("count")]).groupBy("status").execute(),
      this.db
        .selectFrom("content")
        .select(["content_type", count.as("count")])
        .groupBy("content_type")
        .execute(),
      this.db
        .selectFrom("content")
        .innerJoin("topic", "topic.id", "content.topic_id")
        .select(["topic.category", count.as("count")])
        .groupBy("topic.category")
        .orderBy("topic.category")
        .execute(),
      this.db
        .selectFrom("content")
        .select(count.as("count"))
        .where("created_at", ">=", weekAgo)
        .executeTakeFirstOrThrow(),
      this.db
        .selectFrom("content")
        .select(count.as("count"))
        .where("created_at", ">=", monthAgo)
        .executeTakeFirstOrThrow(),
      this.db
        .selectFrom("schedule")
        .innerJoin("content", "content.id", "schedule.content_id")
        .innerJoin("topic", "topic.id", "content.topic_id")
        .select([
          "schedule.content_id",
          "schedule.platform",
          "schedule.status",
          "schedule.published_at",
          "schedule.platform_post_id",
          sql<string | null>`content.script_data->>'hook_text'`.as("hook_text"),
          "topic.name as topic_name",
        ])
        .orderBy("schedule.created_at", "desc")
        .limit(10)
        .execute(),
    ])

    const byStatus: Partial<Record<ContentStatus, number>> = {}
    for (const row of statusRows) byStatus[row.status] = Number(row.count)

    const byType: Record<string, number> = {}
    for (const row of typeRows) byType[row.content_type] = Number(row.count)

    return {
      byStatus,
      byType,
      byCategory: categoryRows.map((row) => ({ category: row.category, count: Number(row.count) })),
      thisWeek: Number(week.count),
      thisMonth: Number(month.count),
      recentPublications: recent.map((row) => ({
        content_id: row.content_id,
        title: row.hook_text ?? row.topic_name,
        platform: row.platform,
        status: row.status,
        published_at: row.published_at?.toISOString() ?? null,
        post_id: row.platform_post_id,
      })),
    }
  }
}
