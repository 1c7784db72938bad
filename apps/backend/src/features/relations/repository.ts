import type { PaginationDirection } from "@relatable/types"
import type { Querier } from "../../db"
import { sql } from "../../db"
import { orderKeyword, watermarkOperator, type StreamPosition } from "../../lib/pagination"

// Internal row type (snake_case, not exported)
interface RelationRow {
  event_id: string
  relates_to_id: string
  room_id: string
  relation_type: string
  aggregation_key: string | null
  event_type: string
  sender: string
  topological_ordering: string
  stream_ordering: string
  origin_server_ts: string
  redacted_at: Date | null
}

/**
 * One relation edge: `eventId` relates to `relatesToId`.
 * Immutable once written, apart from the redaction marker.
 */
export interface RelationEdge {
  eventId: string
  relatesToId: string
  roomId: string
  relationType: string
  aggregationKey: string | null
  eventType: string
  sender: string
  topologicalOrdering: bigint
  streamOrdering: bigint
  originServerTs: number
  redactedAt: Date | null
}

export type InsertRelationParams = Omit<RelationEdge, "redactedAt">

export interface RelationFilter {
  relationType?: string
  eventType?: string
  key?: string
}

export interface ListRelationsParams extends RelationFilter {
  relatesToId: string
  direction: PaginationDirection
  from?: StreamPosition
  limit: number
}

const SELECT_FIELDS = `
  event_id, relates_to_id, room_id, relation_type, aggregation_key, event_type, sender,
  topological_ordering, stream_ordering, origin_server_ts, redacted_at
`

function mapRowToEdge(row: RelationRow): RelationEdge {
  return {
    eventId: row.event_id,
    relatesToId: row.relates_to_id,
    roomId: row.room_id,
    relationType: row.relation_type,
    aggregationKey: row.aggregation_key,
    eventType: row.event_type,
    sender: row.sender,
    topologicalOrdering: BigInt(row.topological_ordering),
    streamOrdering: BigInt(row.stream_ordering),
    originServerTs: Number(row.origin_server_ts),
    redactedAt: row.redacted_at,
  }
}

export function edgePosition(edge: RelationEdge): StreamPosition {
  return { topologicalOrdering: edge.topologicalOrdering, streamOrdering: edge.streamOrdering }
}

export const RelationRepository = {
  async insert(db: Querier, params: InsertRelationParams): Promise<RelationEdge> {
    const result = await db.query<RelationRow>(sql`
      INSERT INTO event_relations (
        event_id, relates_to_id, room_id, relation_type, aggregation_key, event_type, sender,
        topological_ordering, stream_ordering, origin_server_ts
      )
      VALUES (
        ${params.eventId},
        ${params.relatesToId},
        ${params.roomId},
        ${params.relationType},
        ${params.aggregationKey},
        ${params.eventType},
        ${params.sender},
        ${params.topologicalOrdering.toString()},
        ${params.streamOrdering.toString()},
        ${params.originServerTs}
      )
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)
    return mapRowToEdge(result.rows[0])
  },

  async findByEventId(db: Querier, eventId: string): Promise<RelationEdge | null> {
    const result = await db.query<RelationRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM event_relations WHERE event_id = ${eventId}
    `)
    return result.rows[0] ? mapRowToEdge(result.rows[0]) : null
  },

  /**
   * Fetch up to `limit` non-redacted edges pointing at `relatesToId`, strictly beyond `from`.
   * A key filter implies the annotation relation type.
   */
  async list(db: Querier, params: ListRelationsParams): Promise<RelationEdge[]> {
    const op = watermarkOperator(params.direction)
    const order = orderKeyword(params.direction)
    const relationType = params.key !== undefined ? "m.annotation" : (params.relationType ?? null)
    const eventType = params.eventType ?? null
    const key = params.key ?? null
    const topo = params.from?.topologicalOrdering.toString() ?? null
    const stream = params.from?.streamOrdering.toString() ?? null

    const result = await db.query<RelationRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM event_relations
      WHERE relates_to_id = ${params.relatesToId}
        AND redacted_at IS NULL
        AND (${relationType}::text IS NULL OR relation_type = ${relationType})
        AND (${eventType}::text IS NULL OR event_type = ${eventType})
        AND (${key}::text IS NULL OR aggregation_key = ${key})
        AND (
          ${topo}::bigint IS NULL
          OR (topological_ordering, stream_ordering) ${sql.raw(op)} (${topo}::bigint, ${stream}::bigint)
        )
      ORDER BY topological_ordering ${sql.raw(order)}, stream_ordering ${sql.raw(order)}
      LIMIT ${params.limit}
    `)
    return result.rows.map(mapRowToEdge)
  },

  /**
   * Latest non-redacted replacement of `relatesToId` sent by `sender`.
   */
  async findLatestReplacement(db: Querier, relatesToId: string, sender: string): Promise<RelationEdge | null> {
    const result = await db.query<RelationRow>(sql`
      SELECT ${sql.raw(SELECT_FIELDS)} FROM event_relations
      WHERE relates_to_id = ${relatesToId}
        AND relation_type = 'm.replace'
        AND sender = ${sender}
        AND redacted_at IS NULL
      ORDER BY topological_ordering DESC, stream_ordering DESC
      LIMIT 1
    `)
    return result.rows[0] ? mapRowToEdge(result.rows[0]) : null
  },

  /**
   * Soft-delete the edge whose source event was redacted.
   * Returns the edge only when this call flipped it, so counters are decremented once.
   */
  async markRedacted(db: Querier, eventId: string): Promise<RelationEdge | null> {
    const result = await db.query<RelationRow>(sql`
      UPDATE event_relations
      SET redacted_at = NOW()
      WHERE event_id = ${eventId} AND redacted_at IS NULL
      RETURNING ${sql.raw(SELECT_FIELDS)}
    `)
    return result.rows[0] ? mapRowToEdge(result.rows[0]) : null
  },
}
