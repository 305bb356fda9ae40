import { readFile } from "node:fs/promises"
import { join } from "node:path"

import { describe, expect, it } from "vitest"

import {
  loadMigrations,
  MIGRATIONS_DIR,
  parseMigrationFilename,
  pendingMigrations,
} from "../db/migrations.js"

describe("parseMigrationFilename", () => {
  it("parses version, name and direction", () => {
    expect(parseMigrationFilename("001_initial.up.sql")).toEqual({
      version: 1,
      name: "initial",
      direction: "up",
      filename: "001_initial.up.sql",
    })
    expect(parseMigrationFilename("012_add_queue_index.down.sql")).toEqual({
      version: 12,
      name: "add_queue_index",
      direction: "down",
      filename: "012_add_queue_index.down.sql",
    })
  })

  it("ignores anything that is not a migration", () => {
    expect(parseMigrationFilename("README.md")).toBeUndefined()
    expect(parseMigrationFilename("001_initial.sql")).toBeUndefined()
    expect(parseMigrationFilename("initial.up.sql")).toBeUndefined()
  })
})

describe("pendingMigrations", () => {
  const all = [
    { version: 2, name: "b", direction: "up" as const, filename: "002_b.up.sql" },
    { version: 1, name: "a", direction: "down" as const, filename: "001_a.down.sql" },
    { version: 1, name: "a", direction: "up" as const, filename: "001_a.up.sql" },
    { version: 3, name: "c", direction: "up" as const, filename: "003_c.up.sql" },
  ]

  it("returns unapplied up migrations in version order", () => {
    expect(pendingMigrations(all, new Set([2])).map((m) => m.filename)).toEqual([
      "001_a.up.sql",
      "003_c.up.sql",
    ])
  })

  it("is empty when everything is applied", () => {
    expect(pendingMigrations(all, new Set([1, 2, 3]))).toEqual([])
  })
})

describe("bundled migrations", () => {
  it("ships a matching down file for every up file", async () => {
    const migrations = await loadMigrations()
    const ups = migrations.filter((m) => m.direction === "up").map((m) => m.version)
    const downs = migrations.filter((m) => m.direction === "down").map((m) => m.version)
    expect(ups).toEqual(downs)
    expect(ups[0]).toBe(1)
  })

  it("creates every table the repositories use", async () => {
    const sql = await readFile(join(MIGRATIONS_DIR, "001_initial.up.sql"), "utf-8")
    for (const table of ["topic", "content", "schedule", "app_setting", "publish_queue_message"]) {
      expect(sql).toContain(`CREATE TABLE ${table} (`)
    }
  })
})
