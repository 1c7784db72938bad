import type { Pool } from "pg"
import {
  RELATES_TO_KEY,
  RelationTypes,
  type AggregationGroup,
  type BundledRelations,
  type PaginationDirection,
} from "@relatable/types"
import { withClient, type Querier } from "../../db"
import { EventNotFoundError, InvalidRelationError } from "../../lib/errors"
import { relationQueriesTotal } from "../../lib/observability"
import { DEFAULT_PAGE_LIMIT, toPage } from "../../lib/pagination"
import { EventRepository, type RoomEvent } from "../events/repository"
import type { EventService } from "../events/service"
import { assertJoined } from "../rooms/access"
import { AggregationRepository, groupWatermark } from "./aggregation-repository"
import {
  decodeAggregationsCursor,
  decodeRelationsCursor,
  encodeCursor,
  type RelationsCursorFilter,
} from "./cursor"
import { RelationRepository, edgePosition, type RelationEdge } from "./repository"
import { buildRelatesTo } from "./validator"

export interface SubmitRelationParams {
  roomId: string
  sender: string
  parentId: string
  relationType: string
  eventType: string
  key?: string
  content: Record<string, unknown>
}

export interface PaginateRelationsParams {
  roomId: string
  viewerId: string
  parentId: string
  relationType?: string
  eventType?: string
  key?: string
  direction: PaginationDirection
  limit: number
  from?: string
}

export interface PaginateAggregationsParams {
  roomId: string
  viewerId: string
  parentId: string
  relationType?: string
  eventType?: string
  limit: number
  from?: string
}

export interface PaginateGroupParams {
  roomId: string
  viewerId: string
  parentId: string
  relationType: string
  eventType: string
  key: string
  direction: PaginationDirection
  limit: number
  from?: string
}

export interface RelationsPage {
  events: RoomEvent[]
  nextBatch: string | null
}

export interface AggregationsPage {
  groups: AggregationGroup[]
  nextBatch: string | null
}

function toCursorFilter(params: { relationType?: string; eventType?: string; key?: string }): RelationsCursorFilter {
  return {
    relationType: params.key !== undefined ? RelationTypes.ANNOTATION : (params.relationType ?? null),
    eventType: params.eventType ?? null,
    key: params.key ?? null,
  }
}

/**
 * Relation-aware reads and the relation write path. Writes go through the event service so a
 * relation is stored, validated and indexed exactly like any other event carrying `m.relates_to`.
 */
export class RelationService {
  constructor(
    private pool: Pool,
    private eventService: EventService
  ) {}

  async submitRelation(params: SubmitRelationParams): Promise<RoomEvent> {
    const relatesTo = buildRelatesTo({
      eventId: params.parentId,
      relationType: params.relationType,
      key: params.key ?? null,
    })

    return this.eventService.sendEvent({
      roomId: params.roomId,
      sender: params.sender,
      type: params.eventType,
      content: { ...params.content, [RELATES_TO_KEY]: relatesTo },
    })
  }

  /**
   * Page through the events relating to a parent, newest first when walking backward.
   */
  async paginateRelations(params: PaginateRelationsParams): Promise<RelationsPage> {
    const filter = toCursorFilter(params)
    const from = params.from
      ? decodeRelationsCursor(params.from, { target: params.parentId, direction: params.direction, filter })
      : undefined

    relationQueriesTotal.inc({ kind: "relations" })

    return withClient(this.pool, async (client) => {
      await this.assertParentVisible(client, params.roomId, params.viewerId, params.parentId)

      const rows = await RelationRepository.list(client, {
        relatesToId: params.parentId,
        relationType: filter.relationType ?? undefined,
        eventType: params.eventType,
        key: params.key,
        direction: params.direction,
        from,
        limit: params.limit + 1,
      })
      const page = toPage(rows, params.limit, edgePosition)

      return {
        events: await this.loadEdgeEvents(client, page.items),
        nextBatch: page.next
          ? encodeCursor({
              kind: "relations",
              target: params.parentId,
              direction: params.direction,
              filter,
              position: page.next,
            })
          : null,
      }
    })
  }

  /**
   * Annotation groups for a parent, largest first. Ties go to the group created first.
   */
  async paginateAggregations(params: PaginateAggregationsParams): Promise<AggregationsPage> {
    const relationType = params.relationType ?? RelationTypes.ANNOTATION
    if (relationType !== RelationTypes.ANNOTATION) {
      throw new InvalidRelationError(`Only ${RelationTypes.ANNOTATION} relations can be aggregated`)
    }

    const eventType = params.eventType ?? null
    const from = params.from
      ? decodeAggregationsCursor(params.from, { target: params.parentId, eventType })
      : undefined

    relationQueriesTotal.inc({ kind: "aggregations" })

    return withClient(this.pool, async (client) => {
      await this.assertParentVisible(client, params.roomId, params.viewerId, params.parentId)

      const rows = await AggregationRepository.list(client, {
        relatesToId: params.parentId,
        eventType: params.eventType,
        from,
        limit: params.limit + 1,
      })
      const page = toPage(rows, params.limit, groupWatermark)

      return {
        groups: page.items.map((group) => ({ type: group.eventType, key: group.key, count: group.count })),
        nextBatch: page.next
          ? encodeCursor({ kind: "aggregations", target: params.parentId, eventType, watermark: page.next })
          : null,
      }
    })
  }

  /**
   * The annotation events making up one (event type, key) group.
   */
  async paginateGroup(params: PaginateGroupParams): Promise<RelationsPage> {
    if (params.relationType !== RelationTypes.ANNOTATION) {
      throw new InvalidRelationError(`Only ${RelationTypes.ANNOTATION} relations can be aggregated`)
    }

    return this.paginateRelations({
      roomId: params.roomId,
      viewerId: params.viewerId,
      parentId: params.parentId,
      relationType: RelationTypes.ANNOTATION,
      eventType: params.eventType,
      key: params.key,
      direction: params.direction,
      limit: params.limit,
      from: params.from,
    })
  }

  /**
   * First pages of the relations bundled into each event, keyed by event id. Events with
   * nothing to bundle are absent from the result. One connection serves the whole batch.
   */
  async getBundledRelations(events: RoomEvent[]): Promise<Map<string, BundledRelations>> {
    const bundles = new Map<string, BundledRelations>()
    if (events.length === 0) return bundles

    relationQueriesTotal.inc({ kind: "bundle" })

    await withClient(this.pool, async (client) => {
      for (const event of events) {
        const bundle = await this.collectBundle(client, event)
        if (Object.keys(bundle).length > 0) {
          bundles.set(event.id, bundle)
        }
      }
    })

    return bundles
  }

  private async collectBundle(db: Querier, event: RoomEvent): Promise<BundledRelations> {
    const bundle: BundledRelations = {}

    const groupRows = await AggregationRepository.list(db, { relatesToId: event.id, limit: DEFAULT_PAGE_LIMIT + 1 })
    const groups = toPage(groupRows, DEFAULT_PAGE_LIMIT, groupWatermark)
    if (groups.items.length > 0) {
      bundle["m.annotation"] = {
        chunk: groups.items.map((group) => ({ type: group.eventType, key: group.key, count: group.count })),
        ...(groups.next && {
          next_batch: encodeCursor({ kind: "aggregations", target: event.id, eventType: null, watermark: groups.next }),
        }),
      }
    }

    // References read oldest first, so their token resumes a forward walk
    const referenceRows = await RelationRepository.list(db, {
      relatesToId: event.id,
      relationType: RelationTypes.REFERENCE,
      direction: "f",
      limit: DEFAULT_PAGE_LIMIT + 1,
    })
    const references = toPage(referenceRows, DEFAULT_PAGE_LIMIT, edgePosition)
    if (references.items.length > 0) {
      bundle["m.reference"] = {
        chunk: references.items.map((edge) => ({ event_id: edge.eventId })),
        ...(references.next && {
          next_batch: encodeCursor({
            kind: "relations",
            target: event.id,
            direction: "f",
            filter: { relationType: RelationTypes.REFERENCE, eventType: null, key: null },
            position: references.next,
          }),
        }),
      }
    }

    const replacement = await RelationRepository.findLatestReplacement(db, event.id, event.sender)
    if (replacement) {
      bundle["m.replace"] = {
        event_id: replacement.eventId,
        origin_server_ts: replacement.originServerTs,
        sender: replacement.sender,
      }
    }

    return bundle
  }

  private async assertParentVisible(db: Querier, roomId: string, viewerId: string, parentId: string): Promise<void> {
    await assertJoined(db, roomId, viewerId)

    const parent = await EventRepository.findById(db, parentId)
    if (!parent || parent.roomId !== roomId) {
      throw new EventNotFoundError()
    }
  }

  private async loadEdgeEvents(db: Querier, edges: RelationEdge[]): Promise<RoomEvent[]> {
    const byId = await EventRepository.findByIds(
      db,
      edges.map((edge) => edge.eventId)
    )
    const events: RoomEvent[] = []
    for (const edge of edges) {
      const event = byId.get(edge.eventId)
      if (event) events.push(event)
    }
    return events
  }
}
