import type { Pool } from "pg"
import { EventTypes, type PaginationDirection } from "@relatable/types"
import { withClient, withTransaction } from "../../db"
import { EventNotFoundError, ForbiddenError } from "../../lib/errors"
import { eventId } from "../../lib/id"
import { logger } from "../../lib/logger"
import { relationsIngestedTotal, relationsRedactedTotal } from "../../lib/observability"
import { toPage } from "../../lib/pagination"
import { assertJoined } from "../rooms/access"
import { decodeMessagesCursor, encodeCursor } from "../relations/cursor"
import { indexRelation, unindexRelation } from "../relations/indexer"
import type { RelationEdge } from "../relations/repository"
import { parseRelatesTo, validateRelation } from "../relations/validator"
import { EventRepository, eventPosition, type RoomEvent } from "./repository"

export interface SendEventParams {
  roomId: string
  sender: string
  type: string
  content: Record<string, unknown>
  stateKey?: string
}

export interface RedactEventParams {
  roomId: string
  sender: string
  eventId: string
  reason?: string
}

export interface ListMessagesParams {
  from?: string
  limit: number
  direction: PaginationDirection
}

export interface MessagesPage {
  events: RoomEvent[]
  nextBatch: string | null
}

const KNOWN_RELATION_TYPE_LABELS = new Set(["m.annotation", "m.reference", "m.replace"])

// Relation types are client-chosen strings; keep the metric's label set bounded
function relationTypeLabel(relationType: string): string {
  return KNOWN_RELATION_TYPE_LABELS.has(relationType) ? relationType : "other"
}

export class EventService {
  constructor(private pool: Pool) {}

  /**
   * Persist an event. When its content declares a relation, the relation is validated against
   * its target before any write, and the edge and annotation count are written in the same
   * transaction as the event.
   */
  async sendEvent(params: SendEventParams): Promise<RoomEvent> {
    const relation = parseRelatesTo(params.content)

    const { event, edge } = await withTransaction(this.pool, async (client) => {
      await assertJoined(client, params.roomId, params.sender)

      if (relation) {
        await validateRelation(client, { roomId: params.roomId, eventType: params.type, relation })
      }

      const event = await EventRepository.insert(client, {
        id: eventId(),
        roomId: params.roomId,
        type: params.type,
        sender: params.sender,
        content: params.content,
        stateKey: params.stateKey,
        originServerTs: Date.now(),
      })

      const edge: RelationEdge | null = relation ? await indexRelation(client, event, relation) : null

      return { event, edge }
    })

    if (edge) {
      relationsIngestedTotal.inc({ relation_type: relationTypeLabel(edge.relationType) })
      logger.debug(
        { eventId: event.id, relatesToId: edge.relatesToId, relationType: edge.relationType },
        "Relation indexed"
      )
    }

    return event
  }

  async getEvent(roomId: string, id: string, viewerId: string): Promise<RoomEvent> {
    return withClient(this.pool, async (client) => {
      await assertJoined(client, roomId, viewerId)

      const event = await EventRepository.findById(client, id)
      if (!event || event.roomId !== roomId) {
        throw new EventNotFoundError()
      }
      return event
    })
  }

  async listMessages(roomId: string, viewerId: string, params: ListMessagesParams): Promise<MessagesPage> {
    const from = params.from ? decodeMessagesCursor(params.from, { roomId, direction: params.direction }) : undefined

    return withClient(this.pool, async (client) => {
      await assertJoined(client, roomId, viewerId)

      const rows = await EventRepository.list(client, roomId, {
        direction: params.direction,
        from,
        limit: params.limit + 1,
      })
      const page = toPage(rows, params.limit, eventPosition)

      return {
        events: page.items,
        nextBatch: page.next
          ? encodeCursor({ kind: "messages", roomId, direction: params.direction, position: page.next })
          : null,
      }
    })
  }

  /**
   * Redact an event. Only its sender may do so. A redacted relation leaves pagination and its
   * annotation count drops by one; relations pointing at the redacted event are kept as they are.
   */
  async redactEvent(params: RedactEventParams): Promise<RoomEvent> {
    const { redaction, edge } = await withTransaction(this.pool, async (client) => {
      await assertJoined(client, params.roomId, params.sender)

      const target = await EventRepository.findById(client, params.eventId)
      if (!target || target.roomId !== params.roomId) {
        throw new EventNotFoundError()
      }

      if (target.sender !== params.sender) {
        throw new ForbiddenError("Only the sender of an event can redact it")
      }

      const redaction = await EventRepository.insert(client, {
        id: eventId(),
        roomId: params.roomId,
        type: EventTypes.REDACTION,
        sender: params.sender,
        content: params.reason ? { reason: params.reason } : {},
        redacts: target.id,
        originServerTs: Date.now(),
      })

      const redacted = await EventRepository.markRedacted(client, target.id, redaction.id)
      const edge = redacted ? await unindexRelation(client, target.id) : null

      return { redaction, edge }
    })

    if (edge) {
      relationsRedactedTotal.inc({ relation_type: relationTypeLabel(edge.relationType) })
    }

    logger.info({ eventId: params.eventId, redactionId: redaction.id }, "Event redacted")
    return redaction
  }
}
