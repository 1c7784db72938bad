import { readFile } from "fs/promises"
import path from "path"
import { fileURLToPath } from "url"
import { Umzug } from "umzug"
import type { Pool } from "pg"
import { logger } from "../lib/logger"

const migrationsDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "migrations")

export function createMigrator(pool: Pool) {
  return new Umzug({
    migrations: {
      glob: path.join(migrationsDir, "*.sql").replace(/\\/g, "/"),
      resolve: ({ name, path: filepath }) => ({
        name,
        up: async () => {
          if (!filepath) throw new Error(`Migration ${name} has no file path`)
          const sql = await readFile(filepath, "utf8")
          await pool.query(sql)
        },
        down: async () => {
          throw new Error("Down migrations not supported")
        },
      }),
    },
    storage: {
      async executed() {
        await pool.query(`
          CREATE TABLE IF NOT EXISTS umzug_migrations (
            name VARCHAR(255) PRIMARY KEY,
            executed_at TIMESTAMPTZ DEFAULT NOW()
          )
        `)
        const result = await pool.query<{ name: string }>("SELECT name FROM umzug_migrations ORDER BY name")
        return result.rows.map((r) => r.name)
      },
      async logMigration({ name }) {
        await pool.query("INSERT INTO umzug_migrations (name) VALUES ($1)", [name])
      },
      async unlogMigration({ name }) {
        await pool.query("DELETE FROM umzug_migrations WHERE name = $1", [name])
      },
    },
    logger,
  })
}
