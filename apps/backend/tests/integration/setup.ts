/**
 * Shared setup for integration tests.
 * Runs the real migrations against an in-process Postgres and hands out a pg-shaped pool over it.
 */

import { PGlite } from "@electric-sql/pglite"
import type { Pool, PoolClient } from "pg"
import { createMigrator } from "../../src/db/migrations"

interface QueryConfig {
  text: string
  values?: unknown[]
}

async function runQuery(db: PGlite, textOrConfig: string | QueryConfig, values?: unknown[]) {
  const text = typeof textOrConfig === "string" ? textOrConfig : textOrConfig.text
  const params = typeof textOrConfig === "string" ? values : textOrConfig.values

  // Migrations hold several statements, which only the simple protocol accepts
  if (params === undefined) {
    const results = await db.exec(text)
    const last = results[results.length - 1]
    return { rows: last?.rows ?? [], rowCount: last?.affectedRows ?? 0 }
  }

  const result = await db.query(text, params)
  return { rows: result.rows, rowCount: result.affectedRows ?? result.rows.length }
}

/**
 * PGlite serves one connection, so every checked-out client shares it.
 * Tests in a file run one at a time, which keeps transactions from interleaving.
 */
function createTestPool(db: PGlite): Pool {
  const query = (textOrConfig: string | QueryConfig, values?: unknown[]) => runQuery(db, textOrConfig, values)
  const client = { query, release: () => undefined }

  return {
    query,
    connect: async () => client,
    end: () => db.close(),
  } as unknown as Pool
}

/**
 * Full setup: start an empty database, run migrations.
 * Returns the pool for use in tests.
 */
export async function setupTestDatabase(): Promise<Pool> {
  const pool = createTestPool(new PGlite())
  const migrator = createMigrator(pool)
  await migrator.up()
  return pool
}

/**
 * Run the callback inside a transaction that is always rolled back, so tests leave no rows behind.
 */
export async function withTestTransaction<T>(pool: Pool, callback: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect()
  try {
    await client.query("BEGIN")
    return await callback(client)
  } finally {
    await client.query("ROLLBACK")
    client.release()
  }
}
