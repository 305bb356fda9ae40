/**
 * Auto-migration: runs pending migrations on startup.
 *
 * Uses the same logic as migrate.ts but exported as a callable function
 * (rather than a CLI script) for use in index.ts.
 */

import type pg from "pg"

import {
  applyMigration,
  ensureMigrationsTable,
  getAppliedVersions,
  loadMigrations,
  pendingMigrations,
} from "./migrations.js"

export interface MigrationLog {
  info(message: string): void
}

export async function runMigrations(pool: pg.Pool, log: MigrationLog): Promise<number> {
  const client = await pool.connect()

  try {
    await ensureMigrationsTable(client)
    const pending = pendingMigrations(await loadMigrations(), await getAppliedVersions(client))

    if (pending.length === 0) {
      log.info("[auto-migrate] No pending migrations.")
      return 0
    }

    for (const migration of pending) {
      log.info(`[auto-migrate] Applying ${migration.version}_${migration.name}...`)
      await applyMigration(client, migration)
    }

    log.info(`[auto-migrate] Applied ${String(pending.length)} migration(s).`)
    return pending.length
  } finally {
    client.release()
  }
}
