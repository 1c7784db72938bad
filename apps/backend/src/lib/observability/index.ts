export {
  registry,
  httpRequestsTotal,
  httpRequestDuration,
  httpActiveConnections,
  relationsIngestedTotal,
  relationsRedactedTotal,
  relationQueriesTotal,
} from "./metrics"
