/**
 * @roadnet/types
 *
 * Shared domain types for the road graph builder.
 *
 * - Geo: positions, geometries, CRS
 * - Records: raw and canonical road segments
 * - Graph: directed edges, the multigraph and its metadata
 * - Vintages: supported source schemas
 */

export * from "./geo.js";
export * from "./records.js";
export * from "./graph.js";
export * from "./vintages.js";
