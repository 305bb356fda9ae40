/**
 * Runtime settings: operator-editable values stored in `app_setting`.
 * Values are read on every call so a change applies to the next operation
 * without a restart.
 */

import { PUBLISH_INTERVAL_SETTING } from "@reelsmith/shared"
import type { Kysely } from "kysely"

import type { Database } from "../db/types.js"
import { ValidationError } from "../errors.js"

export interface SettingsStore {
  get(key: string): Promise<string | undefined>
  set(key: string, value: string): Promise<void>
}

export class KyselySettingsStore implements SettingsStore {
  constructor(private readonly db: Kysely<Database>) {}

  async get(key: string): Promise<string | undefined> {
    const row = await this.db
      .selectFrom("app_setting")
      .select("value")
      .where("key", "=", key)
      .executeTakeFirst()
    return row?.value
  }

  async set(key: string, value: string): Promise<void> {
    const now = new Date()
    await this.db
      .insertInto("app_setting")
      .values({ key, value, updated_at: now })
      .onConflict((oc) => oc.column("key").doUpdateSet({ value, updated_at: now }))
      .execute()
  }
}

export interface PublishIntervalSource {
  getPublishIntervalMinutes(): Promise<number>
}

export class RuntimeSettings implements PublishIntervalSource {
  constructor(
    private readonly store: SettingsStore,
    private readonly defaults: { publishIntervalMinutes: number },
  ) {}

  /** Stored value when it is a positive integer, else the configured default. */
  async getPublishIntervalMinutes(): Promise<number> {
    const raw = await this.store.get(PUBLISH_INTERVAL_SETTING)
    const parsed = raw === undefined ? undefined : parsePositiveInteger(raw)
    return parsed ?? this.defaults.publishIntervalMinutes
  }

  async setPublishIntervalMinutes(value: unknown): Promise<number> {
    const minutes =
      typeof value === "number" && Number.isInteger(value) && value > 0 ? value : undefined
    if (minutes === undefined) {
      throw new ValidationError("publish interval must be a positive integer number of minutes")
    }
    await this.store.set(PUBLISH_INTERVAL_SETTING, String(minutes))
    return minutes
  }
}

function parsePositiveInteger(raw: string): number | undefined {
  if (!/^\d+$/.test(raw.trim())) return undefined
  const value = parseInt(raw, 10)
  return value > 0 ? value : undefined
}
