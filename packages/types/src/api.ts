/**
 * Wire types shared by the server and its clients.
 *
 * Field names follow the chat protocol (snake_case), not the server's internal camelCase domain types.
 */

// ============================================================================
// Events
// ============================================================================

export interface RelatesTo {
  event_id: string
  rel_type: string
  key?: string
}

export interface BundledReplacement {
  event_id: string
  origin_server_ts: number
  sender: string
}

export interface BundledRelations {
  "m.annotation"?: PaginationChunk<AggregationGroup>
  "m.reference"?: PaginationChunk<ReferenceSummary>
  "m.replace"?: BundledReplacement
}

export interface UnsignedData {
  "m.relations"?: BundledRelations
  redacted_because?: string
}

export interface ClientEvent {
  event_id: string
  room_id: string
  type: string
  sender: string
  content: Record<string, unknown>
  origin_server_ts: number
  state_key?: string
  redacts?: string
  unsigned: UnsignedData
}

// ============================================================================
// Relations
// ============================================================================

export interface AggregationGroup {
  type: string
  key: string
  count: number
}

export interface ReferenceSummary {
  event_id: string
}

export interface PaginationChunk<T> {
  chunk: T[]
  next_batch?: string
}

// ============================================================================
// Responses
// ============================================================================

export interface EventIdResponse {
  event_id: string
}

export interface CreateRoomResponse {
  room_id: string
}

export interface JoinRoomResponse {
  room_id: string
  event_id: string
}

export interface ErrorResponse {
  error: string
  code?: string
  details?: Record<string, string[] | undefined>
}
