/**
 * GeoJSON export for road graphs.
 *
 * Exports graph edges as a GeoJSON FeatureCollection of LineStrings, with
 * edge attributes as feature properties. Useful for visualization in QGIS,
 * geojson.io, Mapbox, etc.
 */

import type { DirectedEdge, Position, TaggedGraph } from "@roadnet/types";

/** GeoJSON types (subset we need) */
export interface GeoJsonFeatureCollection {
  type: "FeatureCollection";
  /**
   * roadnet extension, not a GeoJSON member: the graph's CRS identifier,
   * e.g. "EPSG:3857". RFC 7946 has no `crs` and readers that follow it
   * assume EPSG:4326, so check this before plotting projected graphs.
   */
  crs: string;
  features: GeoJsonFeature[];
}

export interface GeoJsonFeature {
  type: "Feature";
  geometry: GeoJsonLineString;
  properties: Record<string, string | number>;
}

interface GeoJsonLineString {
  type: "LineString";
  coordinates: [number, number][];
}

/** Options for GeoJSON export */
export interface GeoJsonExportOptions {
  /** Emit one feature per road, skipping the backward copy of two-way roads */
  deduplicateBidirectional?: boolean;
}

/**
 * Export a tagged graph to a GeoJSON FeatureCollection.
 *
 * Each edge becomes a LineString feature whose properties are the edge's
 * endpoints, key and direction plus its distance, time and road id under
 * the attribute names given by the graph metadata.
 */
export function graphToGeoJson(
  graph: TaggedGraph,
  options: GeoJsonExportOptions = {}
): GeoJsonFeatureCollection {
  const features: GeoJsonFeature[] = [];
  const seen = new Set<string>();

  for (const edge of graph.edges.values()) {
    if (options.deduplicateBidirectional) {
      const roadKey = String(edge.attributes.roadId);
      if (seen.has(roadKey)) continue;
      seen.add(roadKey);
    }
    features.push(edgeToFeature(graph, edge));
  }

  return {
    type: "FeatureCollection",
    crs: graph.metadata.crs,
    features,
  };
}

/**
 * Convert a single edge to a GeoJSON Feature.
 */
function edgeToFeature(graph: TaggedGraph, edge: DirectedEdge): GeoJsonFeature {
  const { distanceKey, timeKey, geometryKey, roadIdKey } = graph.metadata;
  const { attributes } = edge;

  return {
    type: "Feature",
    geometry: {
      type: "LineString",
      coordinates: attributes[geometryKey].map(toGeoJsonPosition),
    },
    properties: {
      from: edge.from,
      to: edge.to,
      key: edge.key,
      direction: edge.direction,
      [distanceKey]: attributes[distanceKey],
      [timeKey]: attributes[timeKey],
      [roadIdKey]: attributes[roadIdKey],
    },
  };
}

function toGeoJsonPosition(position: Position): [number, number] {
  return [position[0], position[1]];
}
