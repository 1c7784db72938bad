import express, { type Express } from "express"
import cors from "cors"
import pinoHttp from "pino-http"
import { randomUUID } from "crypto"
import { logger } from "./lib/logger"
import { registry } from "./lib/observability"
import { createMetricsMiddleware } from "./middleware/metrics"

export function createApp(): Express {
  const app = express()

  app.use(cors({ origin: true }))
  app.use(express.json())
  app.use(createMetricsMiddleware({ ignoredPaths: ["/health", "/metrics"] }))

  app.use(
    pinoHttp({
      logger,
      autoLogging: {
        ignore: (req) => req.url === "/health",
      },
      customLogLevel: (_req, res, err) => {
        if (res.statusCode >= 500 || err) return "error"
        if (res.statusCode >= 400) return "warn"
        return "silent"
      },
      genReqId: (req) => {
        const requestId = req.headers["x-request-id"]
        return typeof requestId === "string" && requestId ? requestId : randomUUID()
      },
      redact: {
        paths: ["req.headers.authorization"],
        censor: "[REDACTED]",
      },
      customSuccessMessage: (req, res) => {
        return `${req.method} ${req.url} ${res.statusCode}`
      },
      customErrorMessage: (req, res, err) => {
        return `${req.method} ${req.url} ${res.statusCode} - ${err?.message || "Error"}`
      },
    })
  )

  app.get("/health", (_, res) => {
    res.json({ status: "ok" })
  })

  app.get("/metrics", async (_req, res) => {
    res.set("Content-Type", registry.contentType)
    res.end(await registry.metrics())
  })

  return app
}
