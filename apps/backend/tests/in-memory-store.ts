/**
 * In-process stand-in for the Postgres repositories.
 *
 * `install()` replaces every repository method the services call with an implementation over
 * plain maps that follows the same ordering, watermark and redaction rules as the SQL.
 */

import { vi } from "vitest"
import type { Pool } from "pg"
import { RelationTypes, type PaginationDirection } from "@relatable/types"
import type { StreamPosition } from "../src/lib/pagination"
import { EventRepository, eventPosition, type InsertEventParams, type RoomEvent } from "../src/features/events"
import { RoomMemberRepository, RoomRepository, type Room, type RoomMember } from "../src/features/rooms"
import {
  AggregationRepository,
  RelationRepository,
  edgePosition,
  type AggregationCount,
  type GroupKey,
  type InsertRelationParams,
  type ListGroupsParams,
  type ListRelationsParams,
  type RelationEdge,
} from "../src/features/relations"

// Same order as ORDER BY topological_ordering, stream_ordering
function comparePositions(a: StreamPosition, b: StreamPosition): number {
  if (a.topologicalOrdering !== b.topologicalOrdering) {
    return a.topologicalOrdering < b.topologicalOrdering ? -1 : 1
  }
  if (a.streamOrdering !== b.streamOrdering) {
    return a.streamOrdering < b.streamOrdering ? -1 : 1
  }
  return 0
}

function beyond(position: StreamPosition, from: StreamPosition | undefined, direction: PaginationDirection) {
  if (!from) return true
  const cmp = comparePositions(position, from)
  return direction === "b" ? cmp < 0 : cmp > 0
}

function sortByPosition<T>(items: T[], positionOf: (item: T) => StreamPosition, direction: PaginationDirection) {
  const sorted = [...items].sort((a, b) => comparePositions(positionOf(a), positionOf(b)))
  return direction === "b" ? sorted.reverse() : sorted
}

function groupId(group: GroupKey): string {
  return JSON.stringify([group.relatesToId, group.eventType, group.key])
}

export class InMemoryStore {
  readonly rooms = new Map<string, Room>()
  readonly members = new Map<string, RoomMember>()
  readonly events = new Map<string, RoomEvent>()
  readonly edges = new Map<string, RelationEdge>()
  readonly counts = new Map<string, AggregationCount>()
  private sequences = new Map<string, bigint>()
  private nextStreamOrdering = 1n

  install(): void {
    vi.spyOn(RoomRepository, "insert").mockImplementation(async (_db, params) => {
      const room: Room = { id: params.id, createdBy: params.createdBy, createdAt: new Date() }
      this.rooms.set(room.id, room)
      return room
    })
    vi.spyOn(RoomRepository, "findById").mockImplementation(async (_db, id) => this.rooms.get(id) ?? null)

    vi.spyOn(RoomMemberRepository, "upsert").mockImplementation(async (_db, params) => {
      const member: RoomMember = { ...params, updatedAt: new Date() }
      this.members.set(`${params.roomId}|${params.userId}`, member)
      return member
    })
    vi.spyOn(RoomMemberRepository, "find").mockImplementation(
      async (_db, roomId, userId) => this.members.get(`${roomId}|${userId}`) ?? null
    )
    vi.spyOn(RoomMemberRepository, "isJoined").mockImplementation(
      async (_db, roomId, userId) => this.members.get(`${roomId}|${userId}`)?.membership === "join"
    )

    vi.spyOn(EventRepository, "insert").mockImplementation(async (_db, params) => this.insertEvent(params))
    vi.spyOn(EventRepository, "findById").mockImplementation(async (_db, id) => this.events.get(id) ?? null)
    vi.spyOn(EventRepository, "findByIdForShare").mockImplementation(async (_db, id) => this.events.get(id) ?? null)
    vi.spyOn(EventRepository, "findByIds").mockImplementation(async (_db, ids) => {
      const found = new Map<string, RoomEvent>()
      for (const id of ids) {
        const event = this.events.get(id)
        if (event) found.set(id, event)
      }
      return found
    })
    vi.spyOn(EventRepository, "list").mockImplementation(async (_db, roomId, params) => {
      const inRoom = [...this.events.values()].filter(
        (event) => event.roomId === roomId && beyond(eventPosition(event), params.from, params.direction)
      )
      return sortByPosition(inRoom, eventPosition, params.direction).slice(0, params.limit)
    })
    vi.spyOn(EventRepository, "markRedacted").mockImplementation(async (_db, id, redactedBy) => {
      const event = this.events.get(id)
      if (!event || event.redactedAt) return null
      const redacted = { ...event, redactedAt: new Date(), redactedBy }
      this.events.set(id, redacted)
      return redacted
    })

    vi.spyOn(RelationRepository, "insert").mockImplementation(async (_db, params) => this.insertEdge(params))
    vi.spyOn(RelationRepository, "findByEventId").mockImplementation(
      async (_db, eventId) => this.edges.get(eventId) ?? null
    )
    vi.spyOn(RelationRepository, "list").mockImplementation(async (_db, params) => this.listEdges(params))
    vi.spyOn(RelationRepository, "findLatestReplacement").mockImplementation(async (_db, relatesToId, sender) => {
      const replacements = [...this.edges.values()].filter(
        (edge) =>
          edge.relatesToId === relatesToId &&
          edge.relationType === RelationTypes.REPLACE &&
          edge.sender === sender &&
          edge.redactedAt === null
      )
      return sortByPosition(replacements, edgePosition, "b")[0] ?? null
    })
    vi.spyOn(RelationRepository, "markRedacted").mockImplementation(async (_db, eventId) => {
      const edge = this.edges.get(eventId)
      if (!edge || edge.redactedAt) return null
      const redacted = { ...edge, redactedAt: new Date() }
      this.edges.set(eventId, redacted)
      return redacted
    })

    vi.spyOn(AggregationRepository, "increment").mockImplementation(async (_db, group, creationOrder) => {
      const existing = this.counts.get(groupId(group))
      const count: AggregationCount = existing
        ? { ...existing, count: existing.count + 1 }
        : { ...group, count: 1, creationOrder }
      this.counts.set(groupId(group), count)
      return count
    })
    vi.spyOn(AggregationRepository, "decrement").mockImplementation(async (_db, group) => {
      const existing = this.counts.get(groupId(group))
      const remaining = existing && existing.count > 0 ? existing.count - 1 : 0
      if (remaining === 0) {
        this.counts.delete(groupId(group))
      } else if (existing) {
        this.counts.set(groupId(group), { ...existing, count: remaining })
      }
      return remaining
    })
    vi.spyOn(AggregationRepository, "list").mockImplementation(async (_db, params) => this.listGroups(params))
  }

  private insertEvent(params: InsertEventParams): RoomEvent {
    const topologicalOrdering = (this.sequences.get(params.roomId) ?? 0n) + 1n
    this.sequences.set(params.roomId, topologicalOrdering)

    const event: RoomEvent = {
      id: params.id,
      roomId: params.roomId,
      type: params.type,
      stateKey: params.stateKey ?? null,
      sender: params.sender,
      content: params.content,
      redacts: params.redacts ?? null,
      topologicalOrdering,
      streamOrdering: this.nextStreamOrdering++,
      originServerTs: params.originServerTs,
      redactedAt: null,
      redactedBy: null,
    }
    this.events.set(event.id, event)
    return event
  }

  private insertEdge(params: InsertRelationParams): RelationEdge {
    if (this.edges.has(params.eventId)) {
      throw new Error(`duplicate key value violates unique constraint on event_relations: ${params.eventId}`)
    }
    const edge: RelationEdge = { ...params, redactedAt: null }
    this.edges.set(edge.eventId, edge)
    return edge
  }

  private listEdges(params: ListRelationsParams): RelationEdge[] {
    const relationType = params.key !== undefined ? RelationTypes.ANNOTATION : params.relationType
    const matching = [...this.edges.values()].filter(
      (edge) =>
        edge.relatesToId === params.relatesToId &&
        edge.redactedAt === null &&
        (relationType === undefined || edge.relationType === relationType) &&
        (params.eventType === undefined || edge.eventType === params.eventType) &&
        (params.key === undefined || edge.aggregationKey === params.key) &&
        beyond(edgePosition(edge), params.from, params.direction)
    )
    return sortByPosition(matching, edgePosition, params.direction).slice(0, params.limit)
  }

  private listGroups(params: ListGroupsParams): AggregationCount[] {
    const { from } = params
    const matching = [...this.counts.values()].filter(
      (group) =>
        group.relatesToId === params.relatesToId &&
        group.count > 0 &&
        (params.eventType === undefined || group.eventType === params.eventType) &&
        (!from ||
          group.count < from.count ||
          (group.count === from.count && group.creationOrder > from.creationOrder))
    )
    return matching
      .sort((a, b) => {
        if (a.count !== b.count) return b.count - a.count
        return a.creationOrder < b.creationOrder ? -1 : a.creationOrder > b.creationOrder ? 1 : 0
      })
      .slice(0, params.limit)
  }
}

/**
 * Pool whose clients accept transaction control statements and nothing else.
 * Every data query goes through the repositories replaced by `InMemoryStore.install()`.
 */
export function createFakePool(): Pool {
  const client = {
    query: async () => ({ rows: [], rowCount: 0 }),
    release: () => undefined,
  }
  return { connect: async () => client } as unknown as Pool
}
