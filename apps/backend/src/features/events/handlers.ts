import { z } from "zod"
import type { Request, Response } from "express"
import { EventTypes, type ClientEvent, type EventIdResponse, type PaginationChunk } from "@relatable/types"
import { contentSchema, directionSchema, fromSchema, limitSchema, sendValidationError } from "../../lib/schemas"
import { requireUserId } from "../../middleware/auth"
import type { RelationBundler } from "../relations/bundler"
import { toClientEvent } from "./serialize"
import type { EventService } from "./service"

// State and redaction events have dedicated endpoints
const RESERVED_EVENT_TYPES: readonly string[] = [EventTypes.CREATE, EventTypes.MEMBER, EventTypes.REDACTION]

const sendParamsSchema = z.object({
  roomId: z.string().min(1),
  eventType: z
    .string()
    .min(1)
    .refine((type) => !RESERVED_EVENT_TYPES.includes(type), "event type cannot be sent through this endpoint"),
})

const eventParamsSchema = z.object({
  roomId: z.string().min(1),
  eventId: z.string().min(1),
})

const roomParamsSchema = z.object({
  roomId: z.string().min(1),
})

const messagesQuerySchema = z.object({
  from: fromSchema,
  limit: limitSchema,
  dir: directionSchema,
  bundle: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
})

const redactSchema = z.object({
  reason: z.string().optional(),
})

interface Dependencies {
  eventService: EventService
  bundler: RelationBundler
}

export function createEventHandlers({ eventService, bundler }: Dependencies) {
  return {
    async send(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = sendParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const content = contentSchema.safeParse(req.body)
      if (!content.success) {
        sendValidationError(res, content.error)
        return
      }

      const event = await eventService.sendEvent({
        roomId: params.data.roomId,
        sender: userId,
        type: params.data.eventType,
        content: content.data,
      })

      const body: EventIdResponse = { event_id: event.id }
      res.json(body)
    },

    async get(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = eventParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const event = await eventService.getEvent(params.data.roomId, params.data.eventId, userId)

      const body: ClientEvent = await bundler.bundle(event)
      res.json(body)
    },

    async messages(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = roomParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const query = messagesQuerySchema.safeParse(req.query)
      if (!query.success) {
        sendValidationError(res, query.error)
        return
      }

      const { from, limit, dir, bundle } = query.data
      const page = await eventService.listMessages(params.data.roomId, userId, { from, limit, direction: dir })

      const chunk = bundle ? await bundler.bundleMany(page.events) : page.events.map((event) => toClientEvent(event))

      const body: PaginationChunk<ClientEvent> = {
        chunk,
        ...(page.nextBatch !== null && { next_batch: page.nextBatch }),
      }
      res.json(body)
    },

    async redact(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = eventParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const result = redactSchema.safeParse(req.body ?? {})
      if (!result.success) {
        sendValidationError(res, result.error)
        return
      }

      const redaction = await eventService.redactEvent({
        roomId: params.data.roomId,
        sender: userId,
        eventId: params.data.eventId,
        reason: result.data.reason,
      })

      const body: EventIdResponse = { event_id: redaction.id }
      res.json(body)
    },
  }
}
