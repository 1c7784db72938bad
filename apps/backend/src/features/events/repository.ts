import type { PaginationDirection } from "@relatable/types"
import type { Querier } from "../../db"
import { sql } from "../../db"
import { orderKeyword, watermarkOperator, type StreamPosition } from "../../lib/pagination"

// Internal row type (snake_case, not exported)
interface EventRow {
  id: string
  room_id: string
  type: string
  state_key: string | null
  sender: string
  content: Record<string, unknown>
  redacts: string | null
  topological_ordering: string // bigint comes as string from pg
  stream_ordering: string
  origin_server_ts: string
  redacted_at: Date | null
  redacted_by: string | null
}

// Domain type (camelCase, exported)
export interface RoomEvent {
  id: string
  roomId: string
  type: string
  stateKey: string | null
  sender: string
  content: Record<string, unknown>
  redacts: string | null
  topologicalOrdering: bigint
  streamOrdering: bigint
  originServerTs: number
  redactedAt: Date | null
  redactedBy: string | null
}

export interface InsertEventParams {
  id: string
  roomId: string
  type: string
  sender: string
  content: Record<string, unknown>
  stateKey?: string
  redacts?: string
  originServerTs: number
}

export interface ListEventsParams {
  direction: PaginationDirection
  from?: StreamPosition
  limit: number
}

const SELECT_FIELDS = `
  id, room_id, type, state_key, sender, content, redacts,
  topological_ordering, stream_ordering, origin_server_ts, redacted_at, redacted_by
`

function mapRowToEvent(row: EventRow): RoomEvent {
  return {
    id: row.id,
    roomId: row.room_id,
    type: row.type,
    stateKey: row.state_key,
    sender: row.sender,
    content: row.content,
    redacts: row.redacts,
    topologicalOrdering: BigInt(row.topological_ordering),
    streamOrdering: BigInt(row.stream_ordering),
    originServerTs: Number(row.origin_server_ts),
    redactedAt: row.redacted_at,
    redactedBy: row.redacted_by,
  }
}

export function eventPosition(event: RoomEvent): StreamPosition {
  return { topologicalOrdering: event.topologicalOrdering, streamOrdering: event.streamOrdering }
}

export const EventRepository = {
  async getNextOrdering(db: Querier, roomId: string): Promise<bigint> {
    // Upsert and return next ordering atomically
    const result = await db.query<{ next_ordering: string }>(sql`
      INSERT INTO room_sequences (room_id, next_ordering)
      VALUES (${roomId}, 2)
      ON CONFLICT (room_id) DO UPDATE
        SET next_ordering = room_sequences.next_ordering + 1
      RETURNING next_ordering - 1 AS next_ordering
    `)
    return BigInt(result.rows[0].next_ordering)
  },

  async insert(db: Querier, params: InsertEventParams): Promise<RoomEvent> {
    const topologicalOrdering = await this.getNextOrdering(db, params.roomId)

    const result = await db.query<EventRow>(sql`
      INSERT INTO events (id, room_id, type, state_key, sender, content, redacts, topological_ordering, origin_server_ts)
      VALUES (
        ${params.id},
        ${params.roomId},
        ${params.type},
        ${params.stateKey ?? null},
        ${params.sender},
        ${JSON.stringify(params.content)},
        ${params.redacts ?? null},
        ${topologicalOrdering.toString()},
        ${params.originServerTs}
      )
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)
    return mapRowToEvent(result.rows[0])
  },

  async findById(db: Querier, id: string): Promise<RoomEvent | null> {
    const result = await db.query<EventRow>(sql`SELECT ${sql.raw(SELECT_FIELDS)} FROM events WHERE id = ${id}`)
    return result.rows[0] ? mapRowToEvent(result.rows[0]) : null
  },

  /**
   * Share-lock the event row for the rest of the transaction. Relations to the same target
   * do not block each other, but a concurrent redaction of the target waits for them.
   */
  async findByIdForShare(db: Querier, id: string): Promise<RoomEvent | null> {
    const result = await db.query<EventRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM events WHERE id = ${id} FOR SHARE
    `)
    return result.rows[0] ? mapRowToEvent(result.rows[0]) : null
  },

  async findByIds(db: Querier, ids: string[]): Promise<Map<string, RoomEvent>> {
    if (ids.length === 0) return new Map()

    const result = await db.query<EventRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM events WHERE id = ANY(${ids})
    `)

    const map = new Map<string, RoomEvent>()
    for (const row of result.rows) {
      map.set(row.id, mapRowToEvent(row))
    }
    return map
  },

  /**
   * List a room's events in topological order. Fetches up to `limit` rows strictly beyond `from`.
   */
  async list(db: Querier, roomId: string, params: ListEventsParams): Promise<RoomEvent[]> {
    const op = watermarkOperator(params.direction)
    const order = orderKeyword(params.direction)
    const topo = params.from?.topologicalOrdering.toString() ?? null
    const stream = params.from?.streamOrdering.toString() ?? null

    const result = await db.query<EventRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM events
      WHERE room_id = ${roomId}
        AND (
          ${topo}::bigint IS NULL
          OR (topological_ordering, stream_ordering) ${sql.raw(op)} (${topo}::bigint, ${stream}::bigint)
        )
      ORDER BY topological_ordering ${sql.raw(order)}, stream_ordering ${sql.raw(order)}
      LIMIT ${params.limit}
    `)
    return result.rows.map(mapRowToEvent)
  },

  /**
   * Mark an event redacted. Returns null when it was already redacted, so callers
   * only undo its side effects once.
   */
  async markRedacted(db: Querier, id: string, redactedBy: string): Promise<RoomEvent | null> {
    const result = await db.query<EventRow>(sql`
      UPDATE events
      SET redacted_at = NOW(), redacted_by = ${redactedBy}
      WHERE id = ${id} AND redacted_at IS NULL
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)
    return result.rows[0] ? mapRowToEvent(result.rows[0]) : null
  },
}
