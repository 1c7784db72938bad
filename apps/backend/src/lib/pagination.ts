import type { PaginationDirection } from "@relatable/types"

/**
 * A point in a room's event order. Backward pagination walks (topological, stream) descending.
 */
export interface StreamPosition {
  topologicalOrdering: bigint
  streamOrdering: bigint
}

export interface Page<T, P = StreamPosition> {
  items: T[]
  /** Position of the last returned item, present only when more items remain beyond it */
  next: P | null
}

export const DEFAULT_PAGE_LIMIT = 5
export const MAX_PAGE_LIMIT = 100

/** SQL comparison operator selecting rows strictly beyond a watermark in the given direction */
export function watermarkOperator(direction: PaginationDirection): "<" | ">" {
  return direction === "b" ? "<" : ">"
}

/** SQL ORDER BY direction for the given pagination direction */
export function orderKeyword(direction: PaginationDirection): "DESC" | "ASC" {
  return direction === "b" ? "DESC" : "ASC"
}

/**
 * Trim a "limit + 1" fetch down to a page.
 * The extra row only signals that more remain; the cursor points at the last row actually returned.
 */
export function toPage<T, P>(rows: T[], limit: number, positionOf: (item: T) => P): Page<T, P> {
  if (rows.length <= limit) {
    return { items: rows, next: null }
  }
  const items = rows.slice(0, limit)
  return { items, next: positionOf(items[items.length - 1]) }
}
