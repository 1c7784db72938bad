import { RelationTypes } from "@relatable/types"
import type { Querier } from "../../db"
import type { RoomEvent } from "../events/repository"
import { AggregationRepository } from "./aggregation-repository"
import { RelationRepository, type RelationEdge } from "./repository"
import type { RelationDescriptor } from "./validator"

/**
 * Write the edge for a freshly persisted relation event and bump its annotation group.
 * Runs inside the transaction that inserted the event.
 */
export async function indexRelation(db: Querier, event: RoomEvent, relation: RelationDescriptor): Promise<RelationEdge> {
  const edge = await RelationRepository.insert(db, {
    eventId: event.id,
    relatesToId: relation.eventId,
    roomId: event.roomId,
    relationType: relation.relationType,
    aggregationKey: relation.key,
    eventType: event.type,
    sender: event.sender,
    topologicalOrdering: event.topologicalOrdering,
    streamOrdering: event.streamOrdering,
    originServerTs: event.originServerTs,
  })

  if (edge.relationType === RelationTypes.ANNOTATION && edge.aggregationKey !== null) {
    await AggregationRepository.increment(
      db,
      { relatesToId: edge.relatesToId, eventType: edge.eventType, key: edge.aggregationKey },
      edge.streamOrdering
    )
  }

  return edge
}

/**
 * Soft-delete the edge of a redacted relation event and take it out of its annotation group.
 * Returns null when the event was not an active relation.
 */
export async function unindexRelation(db: Querier, eventId: string): Promise<RelationEdge | null> {
  const edge = await RelationRepository.markRedacted(db, eventId)
  if (!edge) return null

  if (edge.relationType === RelationTypes.ANNOTATION && edge.aggregationKey !== null) {
    await AggregationRepository.decrement(db, {
      relatesToId: edge.relatesToId,
      eventType: edge.eventType,
      key: edge.aggregationKey,
    })
  }

  return edge
}
