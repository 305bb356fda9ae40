/**
 * Schedule Planner: decides `scheduled_at` for queue operations.
 *
 * Without an explicit time the next slot is one interval after the later of
 * "now" and the latest pending slot (global across platforms), which keeps
 * pending posts evenly spaced. With nothing pending the first post goes out
 * after a short fixed lead time.
 */

import type { ScheduleRepository } from "../content/repository.js"
import type { PublishIntervalSource } from "../settings/service.js"

export const NO_PENDING_LEAD_MS = 5 * 60_000

const MINUTE_MS = 60_000

export interface SlotInput {
  now: Date
  lastPendingScheduledAt: Date | null
  intervalMinutes: number
}

export function nextSlot({ now, lastPendingScheduledAt, intervalMinutes }: SlotInput): Date {
  if (lastPendingScheduledAt === null) {
    return new Date(now.getTime() + NO_PENDING_LEAD_MS)
  }
  const base = Math.max(lastPendingScheduledAt.getTime(), now.getTime())
  return new Date(base + intervalMinutes * MINUTE_MS)
}

/** i-th slot (1-indexed) at `max(lastPending, now) + i·interval`. */
export function bulkSlots(input: SlotInput & { count: number }): Date[] {
  const base = Math.max(input.lastPendingScheduledAt?.getTime() ?? 0, input.now.getTime())
  return Array.from(
    { length: input.count },
    (_, i) => new Date(base + (i + 1) * input.intervalMinutes * MINUTE_MS),
  )
}

/**
 * Native queue delay for a slot: the seconds until `scheduledAt`, rounded up
 * so the message never surfaces before its slot, when that gap fits the
 * transport's window. Otherwise 0 and the worker gates on the payload's
 * `scheduled_at` instead.
 */
export function deliveryDelaySeconds(scheduledAt: Date, now: Date, maxDelaySeconds: number): number {
  const gapSeconds = (scheduledAt.getTime() - now.getTime()) / 1000
  if (gapSeconds > 0 && gapSeconds <= maxDelaySeconds) {
    return Math.ceil(gapSeconds)
  }
  return 0
}

export interface SchedulePlannerDeps {
  schedules: Pick<ScheduleRepository, "latestPendingScheduledAt">
  settings: PublishIntervalSource
  now: () => Date
}

export class SchedulePlanner {
  constructor(private readonly deps: SchedulePlannerDeps) {}

  /** Explicit times are used as given. */
  async plan(explicit?: Date): Promise<Date> {
    if (explicit) return explicit
    const [lastPendingScheduledAt, intervalMinutes] = await Promise.all([
      this.deps.schedules.latestPendingScheduledAt(),
      this.deps.settings.getPublishIntervalMinutes(),
    ])
    return nextSlot({ now: this.deps.now(), lastPendingScheduledAt, intervalMinutes })
  }

  async planBulk(count: number): Promise<Date[]> {
    if (count === 0) return []
    const [lastPendingScheduledAt, intervalMinutes] = await Promise.all([
      this.deps.schedules.latestPendingScheduledAt(),
      this.deps.settings.getPublishIntervalMinutes(),
    ])
    return bulkSlots({ now: this.deps.now(), lastPendingScheduledAt, intervalMinutes, count })
  }
}
