// Constants and their types
export {
  // Relation types
  RELATION_TYPES,
  type KnownRelationType,
  RelationTypes,
  // Event types
  EventTypes,
  REACTION_EVENT_TYPES,
  // Membership
  MEMBERSHIPS,
  type Membership,
  Memberships,
  // Pagination
  PAGINATION_DIRECTIONS,
  type PaginationDirection,
  // Reserved keys
  RELATES_TO_KEY,
  BUNDLED_RELATIONS_KEY,
  MAX_AGGREGATION_KEY_LENGTH,
} from "./constants"

// API wire types
export type {
  RelatesTo,
  BundledReplacement,
  BundledRelations,
  UnsignedData,
  ClientEvent,
  AggregationGroup,
  ReferenceSummary,
  PaginationChunk,
  EventIdResponse,
  CreateRoomResponse,
  JoinRoomResponse,
  ErrorResponse,
} from "./api"
