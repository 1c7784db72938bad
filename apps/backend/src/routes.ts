import type { Express } from "express"
import { createAuthMiddleware } from "./middleware/auth"
import { errorHandler } from "./lib/error-handler"
import type { AuthService } from "./auth/auth-service"
import { createRoomHandlers, type RoomService } from "./features/rooms"
import { createEventHandlers, type EventService } from "./features/events"
import { createRelationHandlers, type RelationBundler, type RelationService } from "./features/relations"

interface Dependencies {
  authService: AuthService
  roomService: RoomService
  eventService: EventService
  relationService: RelationService
  bundler: RelationBundler
}

export function registerRoutes(app: Express, deps: Dependencies) {
  const { authService, roomService, eventService, relationService, bundler } = deps

  const auth = createAuthMiddleware({ authService })

  const room = createRoomHandlers({ roomService })
  const event = createEventHandlers({ eventService, bundler })
  const relation = createRelationHandlers({ relationService, bundler })

  app.post("/api/rooms", auth, room.create)
  app.post("/api/rooms/:roomId/join", auth, room.join)

  app.put("/api/rooms/:roomId/send/:eventType", auth, event.send)
  app.get("/api/rooms/:roomId/event/:eventId", auth, event.get)
  app.get("/api/rooms/:roomId/messages", auth, event.messages)
  app.put("/api/rooms/:roomId/redact/:eventId", auth, event.redact)

  app.post("/api/rooms/:roomId/send_relation/:parentId/:relationType/:eventType", auth, relation.send)

  app.get("/api/rooms/:roomId/relations/:parentId", auth, relation.list)
  app.get("/api/rooms/:roomId/relations/:parentId/:relationType", auth, relation.list)
  app.get("/api/rooms/:roomId/relations/:parentId/:relationType/:eventType", auth, relation.list)

  app.get("/api/rooms/:roomId/aggregations/:parentId", auth, relation.aggregations)
  app.get("/api/rooms/:roomId/aggregations/:parentId/:relationType", auth, relation.aggregations)
  app.get("/api/rooms/:roomId/aggregations/:parentId/:relationType/:eventType", auth, relation.aggregations)
  app.get("/api/rooms/:roomId/aggregations/:parentId/:relationType/:eventType/:key", auth, relation.group)

  app.use(errorHandler)
}
