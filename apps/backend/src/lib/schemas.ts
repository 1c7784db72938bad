import { z } from "zod"
import type { Response } from "express"
import { PAGINATION_DIRECTIONS } from "@relatable/types"
import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from "./pagination"

export const directionSchema = z.enum(PAGINATION_DIRECTIONS).default("b")

export const limitSchema = z.coerce.number().int().min(1).max(MAX_PAGE_LIMIT).default(DEFAULT_PAGE_LIMIT)

export const fromSchema = z.string().min(1).optional()

export const contentSchema = z.record(z.string(), z.unknown())

export function sendValidationError(res: Response, error: z.ZodError): void {
  res.status(400).json({
    error: "Validation failed",
    code: "VALIDATION_FAILED",
    details: z.flattenError(error).fieldErrors,
  })
}
