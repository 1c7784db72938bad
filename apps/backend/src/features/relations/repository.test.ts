import { describe, expect, test, vi } from "vitest"
import type { QueryResult, QueryResultRow } from "pg"
import type { Querier } from "../../db"
import { RelationRepository, edgePosition } from "./repository"

function createQuerier(rows: QueryResultRow[]) {
  const query = vi.fn().mockResolvedValue({ rows, rowCount: rows.length } as QueryResult)
  const db: Querier = { query: query as Querier["query"] }
  return { db, query }
}

const referenceRow = {
  event_id: "event_ref",
  relates_to_id: "event_parent",
  room_id: "room_1",
  relation_type: "m.reference",
  aggregation_key: null,
  event_type: "m.room.message",
  sender: "@bob:test",
  topological_ordering: "12",
  stream_ordering: "30",
  origin_server_ts: "1700000000123",
  redacted_at: null,
}

describe("RelationRepository.findByEventId", () => {
  test("should map bigint columns and the timestamp", async () => {
    const { db } = createQuerier([referenceRow])

    const edge = await RelationRepository.findByEventId(db, "event_ref")

    expect(edge).toEqual({
      eventId: "event_ref",
      relatesToId: "event_parent",
      roomId: "room_1",
      relationType: "m.reference",
      aggregationKey: null,
      eventType: "m.room.message",
      sender: "@bob:test",
      topologicalOrdering: 12n,
      streamOrdering: 30n,
      originServerTs: 1_700_000_000_123,
      redactedAt: null,
    })
  })

  test("should return null for an event without a relation", async () => {
    const { db } = createQuerier([])

    expect(await RelationRepository.findByEventId(db, "event_plain")).toBeNull()
  })
})

describe("RelationRepository.markRedacted", () => {
  test("should return null when the edge was already redacted", async () => {
    const { db } = createQuerier([])

    expect(await RelationRepository.markRedacted(db, "event_ref")).toBeNull()
  })
})

describe("edgePosition", () => {
  test("should take both orderings from the edge", async () => {
    const { db } = createQuerier([referenceRow])
    const [edge] = await RelationRepository.list(db, {
      relatesToId: "event_parent",
      direction: "b",
      limit: 6,
    })

    expect(edgePosition(edge)).toEqual({ topologicalOrdering: 12n, streamOrdering: 30n })
  })
})
