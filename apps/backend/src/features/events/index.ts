// Repository
export { EventRepository, eventPosition } from "./repository"
export type { RoomEvent, InsertEventParams, ListEventsParams } from "./repository"

// Service
export { EventService } from "./service"
export type { SendEventParams, RedactEventParams, ListMessagesParams, MessagesPage } from "./service"

// Serialization
export { toClientEvent } from "./serialize"

// Handlers
export { createEventHandlers } from "./handlers"
