import type { Membership } from "@relatable/types"
import type { Querier } from "../../db"
import { sql } from "../../db"

interface RoomMemberRow {
  room_id: string
  user_id: string
  membership: string
  event_id: string
  updated_at: Date
}

export interface RoomMember {
  roomId: string
  userId: string
  membership: Membership
  eventId: string
  updatedAt: Date
}

function mapRowToMember(row: RoomMemberRow): RoomMember {
  return {
    roomId: row.room_id,
    userId: row.user_id,
    membership: row.membership === "join" ? "join" : "leave",
    eventId: row.event_id,
    updatedAt: row.updated_at,
  }
}

export const RoomMemberRepository = {
  /**
   * Record the membership carried by a membership event. The latest event wins.
   */
  async upsert(
    db: Querier,
    params: { roomId: string; userId: string; membership: Membership; eventId: string }
  ): Promise<RoomMember> {
    const result = await db.query<RoomMemberRow>(sql`
      INSERT INTO room_members (room_id, user_id, membership, event_id)
      VALUES (${params.roomId}, ${params.userId}, ${params.membership}, ${params.eventId})
      ON CONFLICT (room_id, user_id) DO UPDATE
        SET membership = EXCLUDED.membership, event_id = EXCLUDED.event_id, updated_at = NOW()
      RETURNING room_id, user_id, membership, event_id, updated_at
    `)
    return mapRowToMember(result.rows[0])
  },

  async find(db: Querier, roomId: string, userId: string): Promise<RoomMember | null> {
    const result = await db.query<RoomMemberRow>(sql`
      SELECT room_id, user_id, membership, event_id, updated_at
      FROM room_members
      WHERE room_id = ${roomId} AND user_id = ${userId}
    `)
    return result.rows[0] ? mapRowToMember(result.rows[0]) : null
  },

  async isJoined(db: Querier, roomId: string, userId: string): Promise<boolean> {
    const result = await db.query<{ joined: boolean }>(sql`
      SELECT EXISTS (
        SELECT 1 FROM room_members
        WHERE room_id = ${roomId} AND user_id = ${userId} AND membership = 'join'
      ) AS joined
    `)
    return result.rows[0]?.joined ?? false
  },
}
