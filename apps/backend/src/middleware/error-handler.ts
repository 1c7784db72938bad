import type { Request, Response, NextFunction } from "express"
import { logger } from "../lib/logger"

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  // express.json() rejects malformed bodies with a 400-status SyntaxError
  if (err instanceof SyntaxError && "status" in err && err.status === 400) {
    res.status(400).json({ error: "Malformed JSON body", code: "BAD_JSON" })
    return
  }

  logger.error({ err, path: req.path, method: req.method }, "Unhandled error")

  res.status(500).json({ error: "Internal server error" })
}
