/**
 * Plain JSON form of a tagged graph, for HTTP responses and files.
 */

import type {
  EdgeAttributes,
  EdgeKey,
  GraphMetadata,
  NodeId,
  TaggedGraph,
  TravelDirection,
} from "@roadnet/types";

export interface GraphJsonEdge extends EdgeAttributes {
  from: NodeId;
  to: NodeId;
  key: EdgeKey;
  direction: TravelDirection;
}

export interface GraphJson {
  metadata: GraphMetadata;
  nodes: NodeId[];
  edges: GraphJsonEdge[];
}

/** Flatten a tagged graph into arrays, keeping node and edge order */
export function graphToJson(graph: TaggedGraph): GraphJson {
  const edges: GraphJsonEdge[] = [];
  for (const edge of graph.edges.values()) {
    edges.push({
      from: edge.from,
      to: edge.to,
      key: edge.key,
      direction: edge.direction,
      ...edge.attributes,
    });
  }

  return {
    metadata: { ...graph.metadata },
    nodes: [...graph.nodes],
    edges,
  };
}
