/**
 * @roadnet/builder
 *
 * Builds routable road graphs from raw road segment records.
 *
 * Pipeline:
 * 1. Normalize raw records of a schema vintage -> Canonical edge records
 * 2. Expand records by travel direction -> Directed edges
 * 3. Fold edges into a multigraph -> Graph
 * 4. Keep the largest strongly connected component -> Routable graph
 * 5. Attach CRS and attribute keys -> Tagged graph
 *
 * Fetching records, reprojection and path-finding happen elsewhere.
 */

// Full pipeline
export {
  buildRoadGraph,
  type RoadGraphBuildOptions,
  type RoadGraphBuildResult,
  type RoadGraphBuildStats,
} from "./pipeline.js";

// Errors
export {
  GraphBuildError,
  UnsupportedVintageError,
  SchemaError,
  EmptyInputError,
  NotRoutableError,
  DuplicateEdgeKeyError,
} from "./errors.js";

// Schema normalization
export {
  normalize,
  getSchemaAdapter,
  listSchemaAdapters,
  type NormalizationResult,
  type NormalizationStats,
  DEFAULT_SPEED_KMH,
  travelMinutes,
  type AdaptedRecord,
  type SchemaAdapter,
  multinet2017Adapter,
  onewayDirection2017,
  multinet2021Adapter,
  trafficDirection2021,
  parseInteger,
  parseNumber,
  readGeometry,
  readInteger,
  readLength,
  readOptionalLength,
  readOptionalNumber,
  readRoadId,
} from "./ingestion/index.js";

// Graph construction
export {
  expandRecord,
  expandRecords,
  buildGraph,
  addToAdjacency,
  type GraphBuilderOptions,
  type GraphBuildResult,
  type GraphBuildStats,
  type KeyCollisionPolicy,
  stronglyConnectedComponents,
  largestComponent,
  reduceToLargestComponent,
  type ConnectivityResult,
  type ConnectivityStats,
  DEFAULT_GRAPH_METADATA,
  tagGraph,
  edgeDistance,
  edgeTime,
} from "./graph/index.js";

// Export
export {
  graphToGeoJson,
  graphToJson,
  type GeoJsonExportOptions,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
  type GraphJson,
  type GraphJsonEdge,
} from "./export/index.js";
