/**
 * Publish Queue: durable, at-least-once delivery of publish jobs.
 *
 * Backed by the `publish_queue_message` table with SQS-like semantics:
 * - send: the message becomes visible after its delay
 * - receive: long-polls, claims visible rows with FOR UPDATE SKIP LOCKED,
 *   hides them for the visibility timeout and hands out a fresh receipt
 *   handle; competing workers never claim the same visible row
 * - delete: acknowledges by receipt handle; a handle from an earlier
 *   delivery matches nothing
 *
 * A message that is received but not deleted reappears once its visibility
 * timeout passes.
 */

import { setTimeout as sleep } from "node:timers/promises"

import { type PublishJobPayload, PublishJobPayloadSchema } from "@reelsmith/shared"
import { type Kysely, sql } from "kysely"

import type { Database } from "../db/types.js"

// ──────────────────────────────────────────────────
// Contract
// ──────────────────────────────────────────────────

export interface QueueMessage {
  id: string
  receiptHandle: string
  receiveCount: number
  /** Unvalidated; see parseQueueMessage. */
  body: unknown
}

export interface ReceiveOptions {
  maxMessages: number
  waitTimeSeconds: number
  visibilityTimeoutSeconds: number
  signal?: AbortSignal
}

export interface QueueStats {
  visible: number
  inFlight: number
}

export interface PublishQueue {
  send(payload: PublishJobPayload, options?: { delaySeconds?: number }): Promise<string>
  /** Resolves `[]` when the wait elapses or the signal aborts. */
  receive(options: ReceiveOptions): Promise<QueueMessage[]>
  /** False when the handle no longer matches a delivery. */
  delete(receiptHandle: string): Promise<boolean>
  stats(): Promise<QueueStats>
}

export type ParsedMessage =
  | { ok: true; payload: PublishJobPayload }
  | { ok: false; error: string }

export function parseQueueMessage(message: QueueMessage): ParsedMessage {
  const parsed = PublishJobPayloadSchema.safeParse(message.body)
  if (parsed.success) return { ok: true, payload: parsed.data }
  return {
    ok: false,
    error: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
  }
}

// ──────────────────────────────────────────────────
// PostgreSQL implementation
// ──────────────────────────────────────────────────

export interface PgPublishQueueOptions {
  /** Sleep between empty claim attempts while long-polling. */
  pollIntervalMs: number
}

export class PgPublishQueue implements PublishQueue {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly options: PgPublishQueueOptions,
  ) {}

  async send(payload: PublishJobPayload, options: { delaySeconds?: number } = {}): Promise<string> {
    const delaySeconds = Math.max(0, options.delaySeconds ?? 0)
    const row = await this.db
      .insertInto("publish_queue_message")
      .values({
        body: payload,
        visible_at: sql<Date>`now() + make_interval(secs => ${delaySeconds})`,
      })
      .returning("id")
      .executeTakeFirstOrThrow()
    return row.id
  }

  async receive(options: ReceiveOptions): Promise<QueueMessage[]> {
    const deadline = Date.now() + options.waitTimeSeconds * 1000

    for (;;) {
      if (options.signal?.aborted) return []

      const claimed = await this.claim(options.maxMessages, options.visibilityTimeoutSeconds)
      if (claimed.length > 0) return claimed

      const remaining = deadline - Date.now()
      if (remaining <= 0) return []
      try {
        await sleep(Math.min(this.options.pollIntervalMs, remaining), undefined, {
          signal: options.signal,
        })
      } catch (err) {
        if (err instanceof Error && err.name === "AbortError") return []
        throw err
      }
    }
  }

  async delete(receiptHandle: string): Promise<boolean> {
    const result = await this.db
      .deleteFrom("publish_queue_message")
      .where("receipt_handle", "=", receiptHandle)
      .executeTakeFirst()
    return Number(result.numDeletedRows) > 0
  }

  async stats(): Promise<QueueStats> {
    const row = await this.db
      .selectFrom("publish_queue_message")
      .select([
        sql<string>`count(*) filter (where visible_at <= now())`.as("visible"),
        sql<string>`count(*) filter (where visible_at > now() and receive_count > 0)`.as(
          "in_flight",
        ),
      ])
      .executeTakeFirstOrThrow()
    return { visible: Number(row.visible), inFlight: Number(row.in_flight) }
  }

  private async claim(maxMessages: number, visibilityTimeoutSeconds: number): Promise<QueueMessage[]> {
    const rows = await this.db
      .updateTable("publish_queue_message")
      .set({
        visible_at: sql<Date>`now() + make_interval(secs => ${visibilityTimeoutSeconds})`,
        receipt_handle: sql<string>`gen_random_uuid()`,
        receive_count: sql<number>`receive_count + 1`,
      })
      .where(
        "id",
        "in",
        this.db
          .selectFrom("publish_queue_message")
          .select("id")
          .where("visible_at", "<=", sql<Date>`now()`)
          .orderBy("visible_at")
          .limit(maxMessages)
          .forUpdate()
          .skipLocked(),
      )
      .returning(["id", "body", "receipt_handle", "receive_count"])
      .execute()

    return rows.flatMap((row) =>
      row.receipt_handle === null
        ? []
        : [
            {
              id: row.id,
              receiptHandle: row.receipt_handle,
              receiveCount: row.receive_count,
              body: row.body,
            },
          ],
    )
  }
}
