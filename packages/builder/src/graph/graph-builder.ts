/**
 * Assemble directed edges into a multigraph.
 *
 * Edges are stored under `(from, to, key)`. Parallel edges between the same
 * pair of junctions are kept as long as their keys differ.
 */

import type { DirectedEdge, EdgeId, Graph, NodeId } from "@roadnet/types";
import { edgeId } from "@roadnet/types";
import { DuplicateEdgeKeyError } from "../errors.js";

/** What to do when an edge arrives with an `(from, to, key)` already present */
export type KeyCollisionPolicy = "overwrite" | "throw";

export interface GraphBuilderOptions {
  /** Default: "overwrite" (the collision is still reported in stats) */
  onKeyCollision?: KeyCollisionPolicy;
}

/**
 * Statistics about the graph building process.
 */
export interface GraphBuildStats {
  /** Number of nodes in the graph */
  nodesCount: number;
  /** Number of edges in the graph */
  edgesCount: number;
  /** Number of edges offered to the builder */
  edgesReceived: number;
  /** Ids of edges that replaced an earlier edge with the same id */
  keyCollisions: EdgeId[];
}

/**
 * Result of building a graph from directed edges.
 */
export interface GraphBuildResult {
  graph: Graph;
  stats: GraphBuildStats;
}

/**
 * Add an edge ID to the adjacency list for a node.
 */
export function addToAdjacency(
  adjacency: Map<NodeId, EdgeId[]>,
  nodeId: NodeId,
  id: EdgeId
): void {
  const existing = adjacency.get(nodeId);
  if (existing) {
    existing.push(id);
  } else {
    adjacency.set(nodeId, [id]);
  }
}

/**
 * Build a Graph from directed edges.
 *
 * Nodes are added in order of first reference. On an id collision the later
 * edge wins and the id is listed in `stats.keyCollisions`, unless the
 * policy is "throw".
 *
 * @throws DuplicateEdgeKeyError on a collision under the "throw" policy
 */
export function buildGraph(
  edges: Iterable<DirectedEdge>,
  options: GraphBuilderOptions = {}
): GraphBuildResult {
  const policy = options.onKeyCollision ?? "overwrite";

  const nodes = new Set<NodeId>();
  const edgeMap = new Map<EdgeId, DirectedEdge>();
  const adjacency = new Map<NodeId, EdgeId[]>();
  const keyCollisions: EdgeId[] = [];
  let edgesReceived = 0;

  for (const edge of edges) {
    edgesReceived++;
    const id = edgeId(edge.from, edge.to, edge.key);

    nodes.add(edge.from);
    nodes.add(edge.to);

    if (edgeMap.has(id)) {
      if (policy === "throw") throw new DuplicateEdgeKeyError(id);
      keyCollisions.push(id);
      // Already listed in adjacency; only the stored edge changes
      edgeMap.set(id, edge);
      continue;
    }

    edgeMap.set(id, edge);
    addToAdjacency(adjacency, edge.from, id);
  }

  return {
    graph: { nodes, edges: edgeMap, adjacency },
    stats: {
      nodesCount: nodes.size,
      edgesCount: edgeMap.size,
      edgesReceived,
      keyCollisions,
    },
  };
}
