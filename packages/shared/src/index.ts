export type {
  ContentStatus,
  ContentStep,
  ContentType,
  Platform,
  PublishJobPayload,
  ScheduleStatus,
  ScriptPayload,
  ScriptType,
} from "./types/index.js"
export {
  CONTENT_STATUSES,
  CONTENT_TYPES,
  ContentStepSchema,
  DEFAULT_PUBLISH_INTERVAL_MINUTES,
  MAX_GENERATION_BATCH,
  PLATFORMS,
  PUBLISH_INTERVAL_SETTING,
  PublishJobPayloadSchema,
  ScriptPayloadSchema,
  ScriptTypeSchema,
  isContentStatus,
  isPlatform,
} from "./types/index.js"
export type { RandomSource } from "./random/index.js"
export { createSeededRandom, defaultRandom, pickOne, randomInt, shuffle } from "./random/index.js"
