import { createServer, type Server } from "http"
import type { Express } from "express"
import type { Pool } from "pg"
import { createApp } from "./app"
import { registerRoutes } from "./routes"
import { errorHandler } from "./middleware/error-handler"
import { createDatabasePool } from "./db"
import { createMigrator } from "./db/migrations"
import { StaticTokenAuthService, type AuthService } from "./auth/auth-service"
import { StubAuthService } from "./auth/auth-service.stub"
import { RoomService } from "./features/rooms"
import { EventService } from "./features/events"
import { RelationBundler, RelationService } from "./features/relations"
import { loadConfig } from "./lib/env"
import { logger } from "./lib/logger"

interface AppDependencies {
  pool: Pool
  authService: AuthService
}

/**
 * Wire services and routes onto a fresh Express app. Shared by the server and the HTTP tests.
 */
export function buildApp({ pool, authService }: AppDependencies): Express {
  const roomService = new RoomService(pool)
  const eventService = new EventService(pool)
  const relationService = new RelationService(pool, eventService)
  const bundler = new RelationBundler(relationService)

  const app = createApp()
  registerRoutes(app, { authService, roomService, eventService, relationService, bundler })
  app.use(errorHandler)

  return app
}

export interface ServerInstance {
  server: Server
  pool: Pool
  port: number
  stop: () => Promise<void>
}

export async function startServer(): Promise<ServerInstance> {
  const config = loadConfig()

  const pool = createDatabasePool(config.databaseUrl)

  logger.info("Running database migrations...")
  const migrator = createMigrator(pool)
  await migrator.up()
  logger.info("Database migrations complete")

  const authService: AuthService = config.auth.useStubAuth
    ? new StubAuthService()
    : new StaticTokenAuthService(config.auth.tokens)

  const app = buildApp({ pool, authService })
  const server = createServer(app)

  await new Promise<void>((resolve) => {
    server.listen(config.port, () => {
      logger.info({ port: config.port }, "Server started")
      resolve()
    })
  })

  const stop = async () => {
    logger.info("Shutting down server...")

    logger.info("Closing HTTP server...")
    if (server.listening) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      })
    }
    logger.info("Closing database pool...")
    await pool.end()
    logger.info("Server stopped")
  }

  return { server, pool, port: config.port, stop }
}
