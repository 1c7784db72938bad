import type { Querier } from "../../db"
import { sql } from "../../db"

interface AggregationRow {
  relates_to_id: string
  event_type: string
  aggregation_key: string
  count: number
  creation_order: string
}

/**
 * Materialized annotation count for one (target, event type, key) group.
 * `creationOrder` is the stream ordering of the edge that created the group and breaks count ties.
 */
export interface AggregationCount {
  relatesToId: string
  eventType: string
  key: string
  count: number
  creationOrder: bigint
}

export interface GroupWatermark {
  count: number
  creationOrder: bigint
}

export interface GroupKey {
  relatesToId: string
  eventType: string
  key: string
}

export interface ListGroupsParams {
  relatesToId: string
  eventType?: string
  from?: GroupWatermark
  limit: number
}

function mapRowToCount(row: AggregationRow): AggregationCount {
  return {
    relatesToId: row.relates_to_id,
    eventType: row.event_type,
    key: row.aggregation_key,
    count: row.count,
    creationOrder: BigInt(row.creation_order),
  }
}

export function groupWatermark(group: AggregationCount): GroupWatermark {
  return { count: group.count, creationOrder: group.creationOrder }
}

export const AggregationRepository = {
  /**
   * Atomically add one to a group's count, creating the group on its first edge.
   */
  async increment(db: Querier, group: GroupKey, creationOrder: bigint): Promise<AggregationCount> {
    const result = await db.query<AggregationRow>(sql`
      INSERT INTO relation_aggregation_counts (relates_to_id, event_type, aggregation_key, count, creation_order)
      VALUES (${group.relatesToId}, ${group.eventType}, ${group.key}, 1, ${creationOrder.toString()})
      ON CONFLICT (relates_to_id, event_type, aggregation_key) DO UPDATE
        SET count = relation_aggregation_counts.count + 1
      RETURNING relates_to_id, event_type, aggregation_key, count, creation_order
    `)
    return mapRowToCount(result.rows[0])
  },

  /**
   * Atomically subtract one from a group's count and drop the group when it reaches zero.
   * Returns the remaining count, 0 when the group is gone.
   */
  async decrement(db: Querier, group: GroupKey): Promise<number> {
    const result = await db.query<{ count: number }>(sql`
      UPDATE relation_aggregation_counts
      SET count = count - 1
      WHERE relates_to_id = ${group.relatesToId}
        AND event_type = ${group.eventType}
        AND aggregation_key = ${group.key}
        AND count > 0
      RETURNING count
    `)
    const remaining = result.rows[0]?.count ?? 0

    if (remaining === 0) {
      await db.query(sql`
        DELETE FROM relation_aggregation_counts
        WHERE relates_to_id = ${group.relatesToId}
          AND event_type = ${group.eventType}
          AND aggregation_key = ${group.key}
          AND count = 0
      `)
    }

    return remaining
  },

  /**
   * Fetch up to `limit` groups ordered by count descending, then creation order ascending,
   * strictly after the `from` watermark.
   */
  async list(db: Querier, params: ListGroupsParams): Promise<AggregationCount[]> {
    const eventType = params.eventType ?? null
    const count = params.from?.count ?? null
    const creationOrder = params.from?.creationOrder.toString() ?? null

    const result = await db.query<AggregationRow>(sql`
      SELECT relates_to_id, event_type, aggregation_key, count, creation_order
      FROM relation_aggregation_counts
      WHERE relates_to_id = ${params.relatesToId}
        AND count > 0
        AND (${eventType}::text IS NULL OR event_type = ${eventType})
        AND (
          ${count}::integer IS NULL
          OR count < ${count}::integer
          OR (count = ${count}::integer AND creation_order > ${creationOrder}::bigint)
        )
      ORDER BY count DESC, creation_order ASC
      LIMIT ${params.limit}
    `)
    return result.rows.map(mapRowToCount)
  },
}
