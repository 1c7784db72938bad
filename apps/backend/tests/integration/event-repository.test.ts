/**
 * Event Repository Integration Tests
 *
 * Tests verify:
 * 1. insert: per-room topological ordering from the sequence upsert, global stream ordering
 * 2. list: watermark paging in both directions
 * 3. markRedacted / findByIdForShare
 */

import { describe, test, expect, beforeAll, afterAll } from "vitest"
import type { Pool } from "pg"
import { EventRepository, eventPosition, type RoomEvent } from "../../src/features/events/repository"
import { setupTestDatabase, withTestTransaction } from "./setup"
import { ALICE, insertMessage, insertRoom } from "./fixtures"

describe("EventRepository", () => {
  let pool: Pool

  beforeAll(async () => {
    pool = await setupTestDatabase()
  }, 30_000)

  afterAll(async () => {
    await pool.end()
  })

  describe("insert", () => {
    test("should number events per room and order them globally", async () => {
      await withTestTransaction(pool, async (client) => {
        const roomA = await insertRoom(client)
        const roomB = await insertRoom(client)

        const a1 = await insertMessage(client, roomA)
        const b1 = await insertMessage(client, roomB)
        const a2 = await insertMessage(client, roomA)

        expect([a1.topologicalOrdering, a2.topologicalOrdering, b1.topologicalOrdering]).toEqual([1n, 2n, 1n])
        expect(a1.streamOrdering < b1.streamOrdering && b1.streamOrdering < a2.streamOrdering).toBe(true)
        expect(a1.sender).toBe(ALICE)
        expect(a1.redactedAt).toBeNull()
      })
    })
  })

  describe("list", () => {
    test("should page a room backward and forward from a watermark", async () => {
      await withTestTransaction(pool, async (client) => {
        const room = await insertRoom(client)
        const events: RoomEvent[] = []
        for (let i = 0; i < 4; i++) {
          events.push(await insertMessage(client, room))
        }
        const ids = events.map((e) => e.id)

        const newest = await EventRepository.list(client, room, { direction: "b", limit: 2 })
        const older = await EventRepository.list(client, room, {
          direction: "b",
          limit: 2,
          from: eventPosition(newest[1]),
        })
        const newer = await EventRepository.list(client, room, {
          direction: "f",
          limit: 10,
          from: eventPosition(events[1]),
        })

        expect(newest.map((e) => e.id)).toEqual([ids[3], ids[2]])
        expect(older.map((e) => e.id)).toEqual([ids[1], ids[0]])
        expect(newer.map((e) => e.id)).toEqual([ids[2], ids[3]])
      })
    })
  })

  describe("markRedacted", () => {
    test("should mark an event once and record the redaction", async () => {
      await withTestTransaction(pool, async (client) => {
        const room = await insertRoom(client)
        const target = await insertMessage(client, room)
        const redaction = await insertMessage(client, room)

        const marked = await EventRepository.markRedacted(client, target.id, redaction.id)
        const again = await EventRepository.markRedacted(client, target.id, redaction.id)
        const locked = await EventRepository.findByIdForShare(client, target.id)

        expect(marked?.redactedBy).toBe(redaction.id)
        expect(marked?.redactedAt).toBeInstanceOf(Date)
        expect(again).toBeNull()
        expect(locked?.redactedBy).toBe(redaction.id)
      })
    })

    test("should find nothing for an unknown id", async () => {
      await withTestTransaction(pool, async (client) => {
        expect(await EventRepository.findByIdForShare(client, "event_missing")).toBeNull()
      })
    })
  })
})
