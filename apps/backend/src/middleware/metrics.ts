import type { Request, Response, NextFunction } from "express"
import { httpRequestsTotal, httpRequestDuration, httpActiveConnections } from "../lib/observability"

/**
 * Map HTTP status code to error type label.
 */
function getErrorType(statusCode: number): string {
  if (statusCode < 400) return "-"
  if (statusCode === 401) return "not_authenticated"
  if (statusCode === 403) return "forbidden"
  if (statusCode === 404) return "not_found"
  if (statusCode < 500) return "client_error"
  return "server_error"
}

/**
 * Get normalized path from Express route with sorted query param names.
 *
 * Examples:
 * - /api/rooms/:roomId/relations/:parentId -> /api/rooms/:roomId/relations/:parentId
 * - With query ?limit=10&from=abc -> /api/rooms/:roomId/relations/:parentId?from&limit
 */
export function getNormalizedPath(req: Request): string {
  // Matched route pattern keeps ids and aggregation keys out of the label set
  const routePath: unknown = req.route?.path
  const basePath = typeof routePath === "string" ? routePath : "unmatched"

  const queryKeys = Object.keys(req.query).sort()
  if (queryKeys.length > 0) {
    return `${basePath}?${queryKeys.join("&")}`
  }

  return basePath
}

interface MetricsMiddlewareOptions {
  ignoredPaths: string[]
}

/**
 * HTTP metrics middleware.
 *
 * Tracks active connections, request count and duration labelled by method, path, status and error type.
 * Requests to `ignoredPaths` are not measured at all.
 */
export function createMetricsMiddleware({ ignoredPaths }: MetricsMiddlewareOptions) {
  const ignored = new Set(ignoredPaths)

  return function metricsMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (ignored.has(req.path)) {
      return next()
    }

    const startTime = process.hrtime.bigint()
    httpActiveConnections.inc()

    res.on("finish", () => {
      httpActiveConnections.dec()

      const durationNs = process.hrtime.bigint() - startTime
      const durationSeconds = Number(durationNs) / 1e9

      const labels = {
        method: req.method,
        normalized_path: getNormalizedPath(req),
        status_code: res.statusCode.toString(),
        error_type: getErrorType(res.statusCode),
      }

      httpRequestsTotal.inc(labels)
      httpRequestDuration.observe(labels, durationSeconds)
    })

    next()
  }
}
