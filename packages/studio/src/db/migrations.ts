/**
 * Migration file discovery and application, shared by the startup
 * auto-migrator and the `db:migrate` CLI.
 */

import { readdir, readFile } from "node:fs/promises"
import { join } from "node:path"
import { fileURLToPath } from "node:url"

import type pg from "pg"

export const MIGRATIONS_DIR = join(fileURLToPath(new URL(".", import.meta.url)), "../../migrations")

export type MigrationDirection = "up" | "down"

export interface MigrationFile {
  version: number
  name: string
  direction: MigrationDirection
  filename: string
}

const MIGRATION_FILENAME = /^(\d+)_(.+)\.(up|down)\.sql$/

/** Parse `001_initial.up.sql` style names; anything else yields undefined. */
export function parseMigrationFilename(filename: string): MigrationFile | undefined {
  const match = MIGRATION_FILENAME.exec(filename)
  if (!match) return undefined
  const [, version, name, direction] = match
  if (version === undefined || name === undefined) return undefined
  if (direction !== "up" && direction !== "down") return undefined
  return { version: parseInt(version, 10), name, direction, filename }
}

export async function loadMigrations(dir = MIGRATIONS_DIR): Promise<MigrationFile[]> {
  const files = await readdir(dir)
  const migrations: MigrationFile[] = []
  for (const file of files) {
    const parsed = parseMigrationFilename(file)
    if (parsed) migrations.push(parsed)
  }
  return migrations.sort((a, b) => a.version - b.version || a.direction.localeCompare(b.direction))
}

export async function ensureMigrationsTable(client: pg.PoolClient): Promise<void> {
  await client.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `)
}

export async function getAppliedVersions(client: pg.PoolClient): Promise<Set<number>> {
  const result = await client.query<{ version: number }>(
    "SELECT version FROM schema_migrations ORDER BY version",
  )
  return new Set(result.rows.map((r) => r.version))
}

/** Run one migration file and record it, inside a transaction. */
export async function applyMigration(
  client: pg.PoolClient,
  migration: MigrationFile,
  dir = MIGRATIONS_DIR,
): Promise<void> {
  const sql = await readFile(join(dir, migration.filename), "utf-8")

  await client.query("BEGIN")
  try {
    await client.query(sql)
    if (migration.direction === "up") {
      await client.query("INSERT INTO schema_migrations (version, name) VALUES ($1, $2)", [
        migration.version,
        migration.name,
      ])
    } else {
      await client.query("DELETE FROM schema_migrations WHERE version = $1", [migration.version])
    }
    await client.query("COMMIT")
  } catch (err) {
    await client.query("ROLLBACK")
    throw err
  }
}

/** Up migrations not yet applied, in version order. */
export function pendingMigrations(all: MigrationFile[], applied: Set<number>): MigrationFile[] {
  return all
    .filter((m) => m.direction === "up" && !applied.has(m.version))
    .sort((a, b) => a.version - b.version)
}
