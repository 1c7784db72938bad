import { z } from "zod"
import type { Request, Response } from "express"
import type { CreateRoomResponse, JoinRoomResponse } from "@relatable/types"
import { sendValidationError } from "../../lib/schemas"
import { requireUserId } from "../../middleware/auth"
import type { RoomService } from "./service"

const roomParamsSchema = z.object({
  roomId: z.string().min(1),
})

interface Dependencies {
  roomService: RoomService
}

export function createRoomHandlers({ roomService }: Dependencies) {
  return {
    async create(req: Request, res: Response) {
      const userId = requireUserId(req)

      const room = await roomService.createRoom(userId)

      const body: CreateRoomResponse = { room_id: room.id }
      res.status(201).json(body)
    },

    async join(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = roomParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const result = await roomService.joinRoom(params.data.roomId, userId)

      const body: JoinRoomResponse = { room_id: result.roomId, event_id: result.eventId }
      res.json(body)
    },
  }
}
