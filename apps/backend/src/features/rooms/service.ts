import type { Pool } from "pg"
import { EventTypes, Memberships } from "@relatable/types"
import { withTransaction } from "../../db"
import { RoomNotFoundError } from "../../lib/errors"
import { eventId, roomId as generateRoomId } from "../../lib/id"
import { logger } from "../../lib/logger"
import { EventRepository } from "../events/repository"
import { RoomMemberRepository } from "./member-repository"
import { RoomRepository, type Room } from "./repository"

export interface JoinRoomResult {
  roomId: string
  eventId: string
}

export class RoomService {
  constructor(private pool: Pool) {}

  async createRoom(creatorId: string): Promise<Room> {
    const room = await withTransaction(this.pool, async (client) => {
      const room = await RoomRepository.insert(client, { id: generateRoomId(), createdBy: creatorId })

      await EventRepository.insert(client, {
        id: eventId(),
        roomId: room.id,
        type: EventTypes.CREATE,
        sender: creatorId,
        stateKey: "",
        content: { creator: creatorId },
        originServerTs: Date.now(),
      })

      const membership = await EventRepository.insert(client, {
        id: eventId(),
        roomId: room.id,
        type: EventTypes.MEMBER,
        sender: creatorId,
        stateKey: creatorId,
        content: { membership: Memberships.JOIN },
        originServerTs: Date.now(),
      })

      await RoomMemberRepository.upsert(client, {
        roomId: room.id,
        userId: creatorId,
        membership: Memberships.JOIN,
        eventId: membership.id,
      })

      return room
    })

    logger.info({ roomId: room.id, creatorId }, "Room created")
    return room
  }

  /**
   * Join a room. Joining a room the user is already in returns the existing membership event.
   */
  async joinRoom(roomId: string, userId: string): Promise<JoinRoomResult> {
    return withTransaction(this.pool, async (client) => {
      const room = await RoomRepository.findById(client, roomId)
      if (!room) {
        throw new RoomNotFoundError()
      }

      const existing = await RoomMemberRepository.find(client, roomId, userId)
      if (existing?.membership === Memberships.JOIN) {
        return { roomId, eventId: existing.eventId }
      }

      const membership = await EventRepository.insert(client, {
        id: eventId(),
        roomId,
        type: EventTypes.MEMBER,
        sender: userId,
        stateKey: userId,
        content: { membership: Memberships.JOIN },
        originServerTs: Date.now(),
      })

      await RoomMemberRepository.upsert(client, {
        roomId,
        userId,
        membership: Memberships.JOIN,
        eventId: membership.id,
      })

      return { roomId, eventId: membership.id }
    })
  }
}
