import {
  EventTypes,
  MAX_AGGREGATION_KEY_LENGTH,
  REACTION_EVENT_TYPES,
  RELATES_TO_KEY,
  RelationTypes,
  type RelatesTo,
} from "@relatable/types"
import type { Querier } from "../../db"
import { EventNotFoundError, InvalidRelationError } from "../../lib/errors"
import { EventRepository, type RoomEvent } from "../events/repository"

/**
 * The relation an event declares under `content["m.relates_to"]`.
 */
export interface RelationDescriptor {
  eventId: string
  relationType: string
  key: string | null
}

export interface ValidateRelationParams {
  roomId: string
  /** Type of the event carrying the relation */
  eventType: string
  relation: RelationDescriptor
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Read the relation descriptor from event content.
 * Content without one, or with a descriptor this server does not index (such as a bare reply
 * fallback without `rel_type`), yields null and the event is stored as a plain event.
 */
export function parseRelatesTo(content: Record<string, unknown>): RelationDescriptor | null {
  const relatesTo = content[RELATES_TO_KEY]
  if (!isRecord(relatesTo)) return null

  const { event_id: eventId, rel_type: relationType, key } = relatesTo
  if (typeof eventId !== "string" || eventId.length === 0) return null
  if (typeof relationType !== "string" || relationType.length === 0) return null
  if (key !== undefined && typeof key !== "string") return null

  return { eventId, relationType, key: key ?? null }
}

export function buildRelatesTo(relation: RelationDescriptor): RelatesTo {
  return {
    event_id: relation.eventId,
    rel_type: relation.relationType,
    ...(relation.key !== null && { key: relation.key }),
  }
}

/**
 * Shape rules that need no storage access.
 */
export function checkRelationShape(eventType: string, relation: RelationDescriptor): void {
  const isAnnotation = relation.relationType === RelationTypes.ANNOTATION

  if (isAnnotation && REACTION_EVENT_TYPES.includes(eventType) && relation.key === null) {
    throw new InvalidRelationError(`Annotations of type ${eventType} require a key`)
  }

  if (relation.key !== null && relation.key.trim().length === 0) {
    throw new InvalidRelationError("Annotation keys must not be blank")
  }

  if (eventType === EventTypes.MEMBER) {
    throw new InvalidRelationError("Membership events cannot carry relations")
  }

  if (!isAnnotation && relation.key !== null) {
    throw new InvalidRelationError(`Only ${RelationTypes.ANNOTATION} relations may carry a key`)
  }

  if (relation.key !== null && relation.key.length > MAX_AGGREGATION_KEY_LENGTH) {
    throw new InvalidRelationError(`Annotation keys are limited to ${MAX_AGGREGATION_KEY_LENGTH} characters`)
  }
}

/**
 * Check a relation against its target before anything is written.
 * The target row stays share-locked until the caller's transaction ends.
 */
export async function validateRelation(db: Querier, params: ValidateRelationParams): Promise<RoomEvent> {
  const target = await EventRepository.findByIdForShare(db, params.relation.eventId)
  if (!target || target.roomId !== params.roomId) {
    throw new EventNotFoundError("Relation target not found")
  }

  if (target.type === EventTypes.MEMBER) {
    throw new InvalidRelationError("Relations to membership events are not allowed")
  }

  checkRelationShape(params.eventType, params.relation)

  if (target.redactedAt) {
    throw new InvalidRelationError("Relations to redacted events are not allowed")
  }

  return target
}
