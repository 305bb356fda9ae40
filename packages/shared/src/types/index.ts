// ---------------------------------------------------------------------------
// Status vocabulary
// ---------------------------------------------------------------------------

export type ContentStatus = "draft" | "generating" | "ready" | "queued" | "published" | "failed"

export const CONTENT_STATUSES: readonly ContentStatus[] = [
  "draft",
  "generating",
  "ready",
  "queued",
  "published",
  "failed",
]

export type ContentType = "problem" | "concept"

export const CONTENT_TYPES = ["problem", "concept"] as const satisfies readonly ContentType[]

export type ScheduleStatus = "pending" | "published" | "failed"

export type Platform = "twitter" | "youtube" | "tiktok" | "instagram"

export const PLATFORMS: readonly Platform[] = ["twitter", "youtube", "tiktok", "instagram"]

export function isPlatform(value: string): value is Platform {
  return PLATFORMS.some((platform) => platform === value)
}

export function isContentStatus(value: string): value is ContentStatus {
  return CONTENT_STATUSES.some((status) => status === value)
}

// ---------------------------------------------------------------------------
// Runtime settings
// ---------------------------------------------------------------------------

/** app_setting key holding the spacing between scheduled publishes. */
export const PUBLISH_INTERVAL_SETTING = "publish_interval_minutes"

/** Static fallback when the setting has never been written. */
export const DEFAULT_PUBLISH_INTERVAL_MINUTES = 120

/** Maximum topics accepted by a single batch generation request. */
export const MAX_GENERATION_BATCH = 30

export type {
  ContentStep,
  PublishJobPayload,
  ScriptPayload,
  ScriptType,
} from "./schemas.js"
export {
  ContentStepSchema,
  PublishJobPayloadSchema,
  ScriptPayloadSchema,
  ScriptTypeSchema,
} from "./schemas.js"
