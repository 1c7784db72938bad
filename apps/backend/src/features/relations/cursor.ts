import { z } from "zod"
import { PAGINATION_DIRECTIONS, type PaginationDirection } from "@relatable/types"
import { InvalidCursorError } from "../../lib/errors"
import type { StreamPosition } from "../../lib/pagination"
import type { GroupWatermark } from "./aggregation-repository"

/**
 * Pagination tokens are base64url-encoded JSON payloads tagged with a version and the
 * query kind they were issued for. They carry the query shape (target and filters) so a
 * token can only resume the query that produced it.
 */

const CURSOR_VERSION = 1

export interface RelationsCursorFilter {
  relationType: string | null
  eventType: string | null
  key: string | null
}

export type PaginationCursor =
  | {
      kind: "relations"
      target: string
      direction: PaginationDirection
      filter: RelationsCursorFilter
      position: StreamPosition
    }
  | {
      kind: "aggregations"
      target: string
      eventType: string | null
      watermark: GroupWatermark
    }
  | {
      kind: "messages"
      roomId: string
      direction: PaginationDirection
      position: StreamPosition
    }

// Orderings and counts are compared against bigint and integer columns
const MAX_ORDERING = 9223372036854775807n
const MAX_COUNT = 2147483647

const ORDERING_PATTERN = /^\d{1,19}$/

const orderingSchema = z
  .string()
  .refine(
    (value) => ORDERING_PATTERN.test(value) && BigInt(value) <= MAX_ORDERING,
    "ordering must be a non-negative bigint string"
  )

const relationsPayloadSchema = z.object({
  v: z.literal(CURSOR_VERSION),
  kind: z.literal("relations"),
  target: z.string().min(1),
  dir: z.enum(PAGINATION_DIRECTIONS),
  relationType: z.string().min(1).nullable(),
  eventType: z.string().min(1).nullable(),
  key: z.string().min(1).nullable(),
  topo: orderingSchema,
  stream: orderingSchema,
})

const aggregationsPayloadSchema = z.object({
  v: z.literal(CURSOR_VERSION),
  kind: z.literal("aggregations"),
  target: z.string().min(1),
  eventType: z.string().min(1).nullable(),
  count: z.number().int().nonnegative().max(MAX_COUNT),
  order: orderingSchema,
})

const messagesPayloadSchema = z.object({
  v: z.literal(CURSOR_VERSION),
  kind: z.literal("messages"),
  room: z.string().min(1),
  dir: z.enum(PAGINATION_DIRECTIONS),
  topo: orderingSchema,
  stream: orderingSchema,
})

const cursorPayloadSchema = z.discriminatedUnion("kind", [
  relationsPayloadSchema,
  aggregationsPayloadSchema,
  messagesPayloadSchema,
])

type CursorPayload = z.infer<typeof cursorPayloadSchema>

const TOKEN_PATTERN = /^[A-Za-z0-9_-]+$/

function toPayload(cursor: PaginationCursor): CursorPayload {
  switch (cursor.kind) {
    case "relations":
      return {
        v: CURSOR_VERSION,
        kind: "relations",
        target: cursor.target,
        dir: cursor.direction,
        relationType: cursor.filter.relationType,
        eventType: cursor.filter.eventType,
        key: cursor.filter.key,
        topo: cursor.position.topologicalOrdering.toString(),
        stream: cursor.position.streamOrdering.toString(),
      }
    case "aggregations":
      return {
        v: CURSOR_VERSION,
        kind: "aggregations",
        target: cursor.target,
        eventType: cursor.eventType,
        count: cursor.watermark.count,
        order: cursor.watermark.creationOrder.toString(),
      }
    case "messages":
      return {
        v: CURSOR_VERSION,
        kind: "messages",
        room: cursor.roomId,
        dir: cursor.direction,
        topo: cursor.position.topologicalOrdering.toString(),
        stream: cursor.position.streamOrdering.toString(),
      }
  }
}

// Orderings were checked against orderingSchema, so BigInt() cannot throw here
function toPosition(topo: string, stream: string): StreamPosition {
  return { topologicalOrdering: BigInt(topo), streamOrdering: BigInt(stream) }
}

function fromPayload(payload: CursorPayload): PaginationCursor {
  switch (payload.kind) {
    case "relations":
      return {
        kind: "relations",
        target: payload.target,
        direction: payload.dir,
        filter: { relationType: payload.relationType, eventType: payload.eventType, key: payload.key },
        position: toPosition(payload.topo, payload.stream),
      }
    case "aggregations":
      return {
        kind: "aggregations",
        target: payload.target,
        eventType: payload.eventType,
        watermark: { count: payload.count, creationOrder: BigInt(payload.order) },
      }
    case "messages":
      return {
        kind: "messages",
        roomId: payload.room,
        direction: payload.dir,
        position: toPosition(payload.topo, payload.stream),
      }
  }
}

export function encodeCursor(cursor: PaginationCursor): string {
  return Buffer.from(JSON.stringify(toPayload(cursor)), "utf8").toString("base64url")
}

export function decodeCursor(token: string): PaginationCursor {
  if (!TOKEN_PATTERN.test(token)) {
    throw new InvalidCursorError()
  }

  let raw: unknown
  try {
    raw = JSON.parse(Buffer.from(token, "base64url").toString("utf8"))
  } catch (error) {
    throw new InvalidCursorError("Invalid pagination token", { cause: error })
  }

  const result = cursorPayloadSchema.safeParse(raw)
  if (!result.success) {
    throw new InvalidCursorError()
  }
  return fromPayload(result.data)
}

function sameFilter(a: RelationsCursorFilter, b: RelationsCursorFilter): boolean {
  return a.relationType === b.relationType && a.eventType === b.eventType && a.key === b.key
}

/**
 * Decode a token that must resume a relations query with exactly this target, direction and filter.
 */
export function decodeRelationsCursor(
  token: string,
  expected: { target: string; direction: PaginationDirection; filter: RelationsCursorFilter }
): StreamPosition {
  const cursor = decodeCursor(token)
  if (
    cursor.kind !== "relations" ||
    cursor.target !== expected.target ||
    cursor.direction !== expected.direction ||
    !sameFilter(cursor.filter, expected.filter)
  ) {
    throw new InvalidCursorError("Pagination token does not belong to this query")
  }
  return cursor.position
}

/**
 * Decode a token that must resume an aggregations query for this target and event type filter.
 */
export function decodeAggregationsCursor(
  token: string,
  expected: { target: string; eventType: string | null }
): GroupWatermark {
  const cursor = decodeCursor(token)
  if (cursor.kind !== "aggregations" || cursor.target !== expected.target || cursor.eventType !== expected.eventType) {
    throw new InvalidCursorError("Pagination token does not belong to this query")
  }
  return cursor.watermark
}

/**
 * Decode a token that must resume a room message listing in this direction.
 */
export function decodeMessagesCursor(
  token: string,
  expected: { roomId: string; direction: PaginationDirection }
): StreamPosition {
  const cursor = decodeCursor(token)
  if (cursor.kind !== "messages" || cursor.roomId !== expected.roomId || cursor.direction !== expected.direction) {
    throw new InvalidCursorError("Pagination token does not belong to this query")
  }
  return cursor.position
}
