import { z } from "zod"
import type { Request, Response } from "express"
import type { AggregationGroup, ClientEvent, EventIdResponse, PaginationChunk } from "@relatable/types"
import { contentSchema, directionSchema, fromSchema, limitSchema, sendValidationError } from "../../lib/schemas"
import { requireUserId } from "../../middleware/auth"
import type { RelationBundler } from "./bundler"
import type { RelationService } from "./service"

const sendRelationParamsSchema = z.object({
  roomId: z.string().min(1),
  parentId: z.string().min(1),
  relationType: z.string().min(1),
  eventType: z.string().min(1),
})

const sendRelationQuerySchema = z.object({
  key: z.string().optional(),
})

const relationsParamsSchema = z.object({
  roomId: z.string().min(1),
  parentId: z.string().min(1),
  relationType: z.string().min(1).optional(),
  eventType: z.string().min(1).optional(),
})

const relationsQuerySchema = z.object({
  key: z.string().min(1).optional(),
  from: fromSchema,
  limit: limitSchema,
  dir: directionSchema,
})

const aggregationsQuerySchema = z.object({
  from: fromSchema,
  limit: limitSchema,
})

const groupParamsSchema = z.object({
  roomId: z.string().min(1),
  parentId: z.string().min(1),
  relationType: z.string().min(1),
  eventType: z.string().min(1),
  key: z.string().min(1),
})

const groupQuerySchema = z.object({
  from: fromSchema,
  limit: limitSchema,
  dir: directionSchema,
})

interface Dependencies {
  relationService: RelationService
  bundler: RelationBundler
}

export function createRelationHandlers({ relationService, bundler }: Dependencies) {
  return {
    async send(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = sendRelationParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const query = sendRelationQuerySchema.safeParse(req.query)
      if (!query.success) {
        sendValidationError(res, query.error)
        return
      }

      const content = contentSchema.safeParse(req.body ?? {})
      if (!content.success) {
        sendValidationError(res, content.error)
        return
      }

      const event = await relationService.submitRelation({
        roomId: params.data.roomId,
        sender: userId,
        parentId: params.data.parentId,
        relationType: params.data.relationType,
        eventType: params.data.eventType,
        key: query.data.key,
        content: content.data,
      })

      const body: EventIdResponse = { event_id: event.id }
      res.json(body)
    },

    async list(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = relationsParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const query = relationsQuerySchema.safeParse(req.query)
      if (!query.success) {
        sendValidationError(res, query.error)
        return
      }

      const page = await relationService.paginateRelations({
        roomId: params.data.roomId,
        viewerId: userId,
        parentId: params.data.parentId,
        relationType: params.data.relationType,
        eventType: params.data.eventType,
        key: query.data.key,
        direction: query.data.dir,
        limit: query.data.limit,
        from: query.data.from,
      })

      const body: PaginationChunk<ClientEvent> = {
        chunk: await bundler.bundleMany(page.events),
        ...(page.nextBatch !== null && { next_batch: page.nextBatch }),
      }
      res.json(body)
    },

    async aggregations(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = relationsParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const query = aggregationsQuerySchema.safeParse(req.query)
      if (!query.success) {
        sendValidationError(res, query.error)
        return
      }

      const page = await relationService.paginateAggregations({
        roomId: params.data.roomId,
        viewerId: userId,
        parentId: params.data.parentId,
        relationType: params.data.relationType,
        eventType: params.data.eventType,
        limit: query.data.limit,
        from: query.data.from,
      })

      const body: PaginationChunk<AggregationGroup> = {
        chunk: page.groups,
        ...(page.nextBatch !== null && { next_batch: page.nextBatch }),
      }
      res.json(body)
    },

    async group(req: Request, res: Response) {
      const userId = requireUserId(req)
      const params = groupParamsSchema.safeParse(req.params)
      if (!params.success) {
        sendValidationError(res, params.error)
        return
      }

      const query = groupQuerySchema.safeParse(req.query)
      if (!query.success) {
        sendValidationError(res, query.error)
        return
      }

      const page = await relationService.paginateGroup({
        roomId: params.data.roomId,
        viewerId: userId,
        parentId: params.data.parentId,
        relationType: params.data.relationType,
        eventType: params.data.eventType,
        key: params.data.key,
        direction: query.data.dir,
        limit: query.data.limit,
        from: query.data.from,
      })

      const body: PaginationChunk<ClientEvent> = {
        chunk: await bundler.bundleMany(page.events),
        ...(page.nextBatch !== null && { next_batch: page.nextBatch }),
      }
      res.json(body)
    },
  }
}
