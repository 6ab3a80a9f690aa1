/**
 * Routable road graph.
 *
 * Nodes are junctions and edges are single directions of travel along a
 * road segment. Parallel edges between the same ordered pair of junctions
 * are allowed; each is told apart by its key.
 */

import type { Crs, LineGeometry } from "./geo.js";

/** Junction identifier */
export type NodeId = number;

/** Road segment identifier as supplied by the source schema */
export type RoadId = number | string;

/** Direction of travel relative to the segment's digitized geometry */
export type TravelDirection = "forward" | "backward";

/**
 * Edge key, unique per road and direction.
 *
 * The direction prefix keeps the synthesized reverse edge of one road from
 * colliding with any other road, whatever its id.
 */
export type EdgeKey = `${TravelDirection}:${string}`;

/** Identifier of an edge inside a graph: `<from>-><to>#<key>` */
export type EdgeId = `${NodeId}->${NodeId}#${EdgeKey}`;

/** Attributes carried by every directed edge */
export interface EdgeAttributes {
  /** Length in kilometers */
  kilometers: number;
  /** Travel time in minutes for this direction */
  minutes: number;
  /** Geometry oriented from the edge's `from` node to its `to` node */
  geometry: LineGeometry;
  /** Id of the road segment this edge was expanded from */
  roadId: RoadId;
}

/** A directed edge between two junctions */
export interface DirectedEdge {
  from: NodeId;
  to: NodeId;
  key: EdgeKey;
  direction: TravelDirection;
  attributes: EdgeAttributes;
}

/** The graph structure shared by every pipeline stage */
export interface Graph {
  nodes: ReadonlySet<NodeId>;
  edges: ReadonlyMap<EdgeId, DirectedEdge>;
  /** Adjacency list: nodeId -> outgoing edgeIds */
  adjacency: ReadonlyMap<NodeId, readonly EdgeId[]>;
}

/** Names of the attributes whose value is exactly of type `V` */
type KeysOfType<T, V> = {
  [K in keyof T]-?: [T[K]] extends [V] ? ([V] extends [T[K]] ? K : never) : never;
}[keyof T];

/** Attribute names holding a numeric weight */
export type WeightKey = KeysOfType<EdgeAttributes, number>;

/** Attribute names holding a geometry */
export type GeometryKey = KeysOfType<EdgeAttributes, LineGeometry>;

/** Attribute names holding a road id */
export type RoadIdKey = KeysOfType<EdgeAttributes, RoadId>;

/**
 * Graph-level descriptors.
 *
 * Consumers read weights through these keys
 * (`edge.attributes[graph.metadata.timeKey]`) instead of hard-coding the
 * attribute names.
 */
export interface GraphMetadata {
  crs: Crs;
  distanceKey: WeightKey;
  timeKey: WeightKey;
  geometryKey: GeometryKey;
  roadIdKey: RoadIdKey;
}

/** A graph together with its metadata */
export interface TaggedGraph extends Graph {
  metadata: GraphMetadata;
}

/** Build the key for one direction of a road */
export function edgeKey(roadId: RoadId, direction: TravelDirection): EdgeKey {
  return `${direction}:${roadId}`;
}

/** Build the id addressing an edge by `(from, to, key)` */
export function edgeId(from: NodeId, to: NodeId, key: EdgeKey): EdgeId {
  return `${from}->${to}#${key}`;
}

/** Look up an edge by `(from, to, key)` */
export function getEdge(
  graph: Graph,
  from: NodeId,
  to: NodeId,
  key: EdgeKey
): DirectedEdge | undefined {
  return graph.edges.get(edgeId(from, to, key));
}

/** All edges leaving a node, in insertion order */
export function outgoingEdges(graph: Graph, nodeId: NodeId): DirectedEdge[] {
  const result: DirectedEdge[] = [];
  for (const id of graph.adjacency.get(nodeId) ?? []) {
    const edge = graph.edges.get(id);
    if (edge) result.push(edge);
  }
  return result;
}
