import type { Querier } from "../../db"
import { ForbiddenError, RoomNotFoundError } from "../../lib/errors"
import { RoomMemberRepository } from "./member-repository"
import { RoomRepository } from "./repository"

/**
 * Membership verdict used by every room-scoped read and write.
 * Unknown rooms are reported as not found; rooms the user has not joined as forbidden.
 */
export async function assertJoined(db: Querier, roomId: string, userId: string): Promise<void> {
  const room = await RoomRepository.findById(db, roomId)
  if (!room) {
    throw new RoomNotFoundError()
  }

  const joined = await RoomMemberRepository.isJoined(db, roomId, userId)
  if (!joined) {
    throw new ForbiddenError(`User ${userId} is not in room ${roomId}`)
  }
}
