/**
 * Graph-level descriptors.
 *
 * Tagging names the CRS and the edge attributes holding distance, time,
 * geometry and road id, so consumers can read weights without knowing the
 * edge schema.
 */

import type {
  DirectedEdge,
  Graph,
  GraphMetadata,
  TaggedGraph,
} from "@roadnet/types";
import { LATLON_CRS } from "@roadnet/types";

export const DEFAULT_GRAPH_METADATA: GraphMetadata = {
  crs: LATLON_CRS,
  distanceKey: "kilometers",
  timeKey: "minutes",
  geometryKey: "geometry",
  roadIdKey: "roadId",
};

/** Attach metadata to a graph. The structure is shared, not copied. */
export function tagGraph(
  graph: Graph,
  metadata: Partial<GraphMetadata> = {}
): TaggedGraph {
  return {
    nodes: graph.nodes,
    edges: graph.edges,
    adjacency: graph.adjacency,
    metadata: { ...DEFAULT_GRAPH_METADATA, ...metadata },
  };
}

/** Distance of an edge, read through the graph's distance key */
export function edgeDistance(graph: TaggedGraph, edge: DirectedEdge): number {
  return edge.attributes[graph.metadata.distanceKey];
}

/** Travel time of an edge, read through the graph's time key */
export function edgeTime(graph: TaggedGraph, edge: DirectedEdge): number {
  return edge.attributes[graph.metadata.timeKey];
}
