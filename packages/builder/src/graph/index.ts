/**
 * Graph construction module.
 *
 * Canonical records -> Directed edges -> Multigraph -> Largest SCC -> Tagged graph
 */

export { expandRecord, expandRecords } from "./edge-expander.js";
export {
  buildGraph,
  addToAdjacency,
  type GraphBuilderOptions,
  type GraphBuildResult,
  type GraphBuildStats,
  type KeyCollisionPolicy,
} from "./graph-builder.js";
export {
  stronglyConnectedComponents,
  largestComponent,
  reduceToLargestComponent,
  type ConnectivityResult,
  type ConnectivityStats,
} from "./connectivity.js";
export {
  DEFAULT_GRAPH_METADATA,
  tagGraph,
  edgeDistance,
  edgeTime,
} from "./metadata.js";
