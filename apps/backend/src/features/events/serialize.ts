import { EventTypes, type ClientEvent, type UnsignedData } from "@relatable/types"
import type { RoomEvent } from "./repository"

/**
 * Content served for a redacted event. Membership keeps its `membership` field so room state
 * stays readable; everything else is emptied.
 */
function redactedContent(event: RoomEvent): Record<string, unknown> {
  if (event.type === EventTypes.MEMBER && typeof event.content.membership === "string") {
    return { membership: event.content.membership }
  }
  return {}
}

/**
 * Client representation of a stored event. `unsigned` is derived data and never persisted.
 */
export function toClientEvent(event: RoomEvent, unsigned: UnsignedData = {}): ClientEvent {
  return {
    event_id: event.id,
    room_id: event.roomId,
    type: event.type,
    sender: event.sender,
    content: event.redactedAt ? redactedContent(event) : event.content,
    origin_server_ts: event.originServerTs,
    ...(event.stateKey !== null && { state_key: event.stateKey }),
    ...(event.redacts !== null && { redacts: event.redacts }),
    unsigned: {
      ...(event.redactedBy !== null && { redacted_because: event.redactedBy }),
      ...unsigned,
    },
  }
}
