import type { Querier } from "../../db"
import { sql } from "../../db"

interface RoomRow {
  id: string
  created_by: string
  created_at: Date
}

export interface Room {
  id: string
  createdBy: string
  createdAt: Date
}

function mapRowToRoom(row: RoomRow): Room {
  return {
    id: row.id,
    createdBy: row.created_by,
    createdAt: row.created_at,
  }
}

export const RoomRepository = {
  async insert(db: Querier, params: { id: string; createdBy: string }): Promise<Room> {
    const result = await db.query<RoomRow>(sql`
      INSERT INTO rooms (id, created_by)
      VALUES (${params.id}, ${params.createdBy})
      RETURNING id, created_by, created_at
    `)
    return mapRowToRoom(result.rows[0])
  },

  async findById(db: Querier, id: string): Promise<Room | null> {
    const result = await db.query<RoomRow>(sql`
      SELECT id, created_by, created_at FROM rooms WHERE id = ${id}
    `)
    return result.rows[0] ? mapRowToRoom(result.rows[0]) : null
  },
}
