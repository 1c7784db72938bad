import type { Request, Response, NextFunction } from "express"
import type { AuthService } from "../auth/auth-service"

const BEARER_PREFIX = "Bearer "

declare global {
  namespace Express {
    interface Request {
      userId?: string
    }
  }
}

interface Dependencies {
  authService: AuthService
}

export function createAuthMiddleware({ authService }: Dependencies) {
  return async function authMiddleware(req: Request, res: Response, next: NextFunction): Promise<void> {
    const header = req.headers.authorization

    if (!header || !header.startsWith(BEARER_PREFIX)) {
      res.status(401).json({ error: "Not authenticated", code: "NOT_AUTHENTICATED" })
      return
    }

    const user = await authService.authenticateToken(header.slice(BEARER_PREFIX.length).trim())
    if (!user) {
      res.status(401).json({ error: "Unknown access token", code: "NOT_AUTHENTICATED" })
      return
    }

    req.userId = user.userId
    next()
  }
}

/**
 * Read the authenticated user id set by the auth middleware.
 * Throws when a handler is mounted without it, which is a wiring bug rather than a client error.
 */
export function requireUserId(req: Request): string {
  if (!req.userId) {
    throw new Error("Auth middleware did not run for this route")
  }
  return req.userId
}
