// Repositories
export { RelationRepository, edgePosition } from "./repository"
export type { RelationEdge, InsertRelationParams, RelationFilter, ListRelationsParams } from "./repository"
export { AggregationRepository, groupWatermark } from "./aggregation-repository"
export type { AggregationCount, GroupKey, GroupWatermark, ListGroupsParams } from "./aggregation-repository"

// Ingest
export { parseRelatesTo, buildRelatesTo, checkRelationShape, validateRelation } from "./validator"
export type { RelationDescriptor, ValidateRelationParams } from "./validator"
export { indexRelation, unindexRelation } from "./indexer"

// Cursors
export {
  encodeCursor,
  decodeCursor,
  decodeRelationsCursor,
  decodeAggregationsCursor,
  decodeMessagesCursor,
} from "./cursor"
export type { PaginationCursor, RelationsCursorFilter } from "./cursor"

// Service and bundling
export { RelationService } from "./service"
export type {
  SubmitRelationParams,
  PaginateRelationsParams,
  PaginateAggregationsParams,
  PaginateGroupParams,
  RelationsPage,
  AggregationsPage,
} from "./service"
export { RelationBundler } from "./bundler"

// Handlers
export { createRelationHandlers } from "./handlers"
