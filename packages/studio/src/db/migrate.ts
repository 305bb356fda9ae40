import pg from "pg"

import {
  applyMigration,
  ensureMigrationsTable,
  getAppliedVersions,
  loadMigrations,
  pendingMigrations,
} from "./migrations.js"

const databaseUrl = process.env.DATABASE_URL
if (!databaseUrl) {
  console.error("DATABASE_URL is required")
  process.exit(1)
}

async function withClient(fn: (client: pg.PoolClient) => Promise<void>): Promise<void> {
  const pool = new pg.Pool({ connectionString: databaseUrl })
  const client = await pool.connect()
  try {
    await ensureMigrationsTable(client)
    await fn(client)
  } finally {
    client.release()
    await pool.end()
  }
}

async function migrateUp(client: pg.PoolClient): Promise<void> {
  const pending = pendingMigrations(await loadMigrations(), await getAppliedVersions(client))

  if (pending.length === 0) {
    console.log("No pending migrations.")
    return
  }

  for (const migration of pending) {
    console.log(`Applying migration ${migration.version}_${migration.name}...`)
    await applyMigration(client, migration)
    console.log(`  ✓ Applied ${migration.version}_${migration.name}`)
  }

  console.log(`Applied ${String(pending.length)} migration(s).`)
}

async function migrateDown(client: pg.PoolClient): Promise<void> {
  const applied = await getAppliedVersions(client)
  if (applied.size === 0) {
    console.log("No migrations to roll back.")
    return
  }

  const maxVersion = Math.max(...applied)
  const migrations = await loadMigrations()
  const downMigration = migrations.find((m) => m.version === maxVersion && m.direction === "down")

  if (!downMigration) {
    throw new Error(`No down migration found for version ${String(maxVersion)}`)
  }

  console.log(`Rolling back migration ${downMigration.version}_${downMigration.name}...`)
  await applyMigration(client, downMigration)
  console.log(`  ✓ Rolled back ${downMigration.version}_${downMigration.name}`)
}

async function migrationStatus(client: pg.PoolClient): Promise<void> {
  const applied = await getAppliedVersions(client)
  for (const migration of await loadMigrations()) {
    if (migration.direction !== "up") continue
    const mark = applied.has(migration.version) ? "applied" : "pending"
    console.log(`${mark.padEnd(8)} ${migration.version}_${migration.name}`)
  }
}

const command = process.argv[2]

switch (command) {
  case "up":
  case undefined:
    await withClient(migrateUp)
    break
  case "down":
    await withClient(migrateDown)
    break
  case "status":
    await withClient(migrationStatus)
    break
  default:
    console.error(`Unknown command: ${command}`)
    console.error("Usage: db:migrate [up|down|status]")
    process.exit(1)
}
