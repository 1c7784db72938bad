// Relation types
export const RELATION_TYPES = ["m.annotation", "m.reference", "m.replace"] as const
export type KnownRelationType = (typeof RELATION_TYPES)[number]

export const RelationTypes = {
  ANNOTATION: "m.annotation",
  REFERENCE: "m.reference",
  REPLACE: "m.replace",
} as const satisfies Record<string, KnownRelationType>

// Event types the server gives meaning to. Any other non-empty string is a valid event type.
export const EventTypes = {
  CREATE: "m.room.create",
  MEMBER: "m.room.member",
  MESSAGE: "m.room.message",
  REDACTION: "m.room.redaction",
  REACTION: "m.reaction",
} as const

// Event types whose annotations must carry an aggregation key
export const REACTION_EVENT_TYPES: readonly string[] = [EventTypes.REACTION]

// Membership states
export const MEMBERSHIPS = ["join", "leave"] as const
export type Membership = (typeof MEMBERSHIPS)[number]

export const Memberships = {
  JOIN: "join",
  LEAVE: "leave",
} as const satisfies Record<string, Membership>

// Pagination direction: "b" walks from newest to oldest, "f" from oldest to newest
export const PAGINATION_DIRECTIONS = ["b", "f"] as const
export type PaginationDirection = (typeof PAGINATION_DIRECTIONS)[number]

// Reserved content and unsigned keys
export const RELATES_TO_KEY = "m.relates_to"
export const BUNDLED_RELATIONS_KEY = "m.relations"

export const MAX_AGGREGATION_KEY_LENGTH = 256
