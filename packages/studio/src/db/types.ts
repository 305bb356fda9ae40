import type { ContentStatus, ContentType, Platform, ScheduleStatus } from "@reelsmith/shared"
import type { ColumnType, Generated, Insertable, Selectable, Updateable } from "kysely"

type JsonObject = Record<string, unknown>

// ---------------------------------------------------------------------------
// Table: topic
// ---------------------------------------------------------------------------
export interface TopicTable {
  id: Generated<number>
  name: string
  category: string
  description: string | null
  created_at: ColumnType<Date, Date | undefined, never>
}

export type Topic = Selectable<TopicTable>
export type NewTopic = Insertable<TopicTable>

// ---------------------------------------------------------------------------
// Table: content
// ---------------------------------------------------------------------------
export interface ContentTable {
  id: Generated<number>
  topic_id: number
  content_type: ColumnType<ContentType, ContentType | undefined, ContentType>
  status: ColumnType<ContentStatus, ContentStatus | undefined, ContentStatus>
  script_text: string | null
  script_data: ColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>
  diagram_path: string | null
  audio_path: string | null
  video_path: string | null
  duration_seconds: number | null
  error_message: string | null
  created_at: ColumnType<Date, Date | undefined, never>
  updated_at: ColumnType<Date, Date | undefined, Date>
}

export type Content = Selectable<ContentTable>
export type NewContent = Insertable<ContentTable>
export type ContentUpdate = Updateable<ContentTable>

// ---------------------------------------------------------------------------
// Table: schedule
// ---------------------------------------------------------------------------
export interface ScheduleTable {
  id: Generated<number>
  content_id: number
  platform: Platform
  scheduled_at: Date
  published_at: Date | null
  status: ColumnType<ScheduleStatus, ScheduleStatus | undefined, ScheduleStatus>
  platform_post_id: string | null
  error_message: string | null
  created_at: ColumnType<Date, Date | undefined, never>
}

export type Schedule = Selectable<ScheduleTable>
export type NewSchedule = Insertable<ScheduleTable>

// ---------------------------------------------------------------------------
// Table: app_setting
// ---------------------------------------------------------------------------
export interface AppSettingTable {
  key: string
  value: string
  updated_at: ColumnType<Date, Date | undefined, Date>
}

// ---------------------------------------------------------------------------
// Table: publish_queue_message
// ---------------------------------------------------------------------------
export interface PublishQueueMessageTable {
  id: Generated<string>
  body: ColumnType<unknown, JsonObject, JsonObject>
  visible_at: ColumnType<Date, Date | undefined, Date>
  receipt_handle: string | null
  receive_count: ColumnType<number, number | undefined, number>
  created_at: ColumnType<Date, Date | undefined, never>
}

// ---------------------------------------------------------------------------
// Database
// ---------------------------------------------------------------------------
export interface Database {
  topic: TopicTable
  content: ContentTable
  schedule: ScheduleTable
  app_setting: AppSettingTable
  publish_queue_message: PublishQueueMessageTable
}
