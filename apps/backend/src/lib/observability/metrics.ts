import { Registry, Gauge, Counter, Histogram } from "prom-client"

/**
 * Prometheus metrics registry for application observability.
 *
 * Provides metrics for:
 * - HTTP requests
 * - Relation ingest and aggregation reads
 */

// Create a dedicated registry (don't use default registry)
export const registry = new Registry()

// HTTP Metrics
// Labels: method, normalized_path, status_code, error_type
// error_type: "-" | "not_authenticated" | "forbidden" | "not_found" | "client_error" | "server_error"
export const httpRequestsTotal = new Counter({
  name: "http_requests_total",
  help: "Total number of HTTP requests",
  labelNames: ["method", "normalized_path", "status_code", "error_type"],
  registers: [registry],
})

export const httpRequestDuration = new Histogram({
  name: "http_request_duration_seconds",
  help: "HTTP request duration in seconds",
  labelNames: ["method", "normalized_path", "status_code", "error_type"],
  buckets: [0.005, 0.01, 0.02, 0.05, 0.1, 0.2, 0.5, 1, 5, 10], // 5ms to 10s
  registers: [registry],
})

export const httpActiveConnections = new Gauge({
  name: "http_active_connections",
  help: "Number of active HTTP connections being processed",
  registers: [registry],
})

// Relation Metrics
export const relationsIngestedTotal = new Counter({
  name: "relations_ingested_total",
  help: "Total number of relation edges indexed",
  labelNames: ["relation_type"],
  registers: [registry],
})

export const relationsRedactedTotal = new Counter({
  name: "relations_redacted_total",
  help: "Total number of relation edges soft-deleted by redaction",
  labelNames: ["relation_type"],
  registers: [registry],
})

export const relationQueriesTotal = new Counter({
  name: "relation_queries_total",
  help: "Total number of relation and aggregation page reads",
  labelNames: ["kind"], // kind: relations | aggregations | bundle
  registers: [registry],
})
