/**
 * Graph build service: raw records in, routable graph out.
 *
 * Runs the builder pipeline for one request and logs what each stage did.
 */

import {
  buildRoadGraph,
  graphToGeoJson,
  graphToJson,
  listSchemaAdapters,
} from "@roadnet/builder";
import type { ServerConfig } from "../config.js";
import type { BuildGraphRequest } from "../models/requests.js";
import type { BuildGraphResponse, VintageInfo } from "../models/responses.js";

/** Longest list of road ids printed in one log line */
const MAX_LOGGED_IDS = 10;

function fmtIds(ids: readonly (number | string)[]): string {
  const shown = ids.slice(0, MAX_LOGGED_IDS).join(", ");
  return ids.length > MAX_LOGGED_IDS
    ? `${shown}, ... (${ids.length - MAX_LOGGED_IDS} more)`
    : shown;
}

export class GraphBuildService {
  constructor(
    private readonly config: Pick<ServerConfig, "defaultCrs" | "keyCollisionPolicy">,
  ) {}

  /**
   * Build a graph from the request's records.
   * Pipeline errors propagate to the error handler untouched.
   */
  build(request: BuildGraphRequest): BuildGraphResponse {
    console.log(
      `[graph] Building vintage ${request.vintage} from ${request.records.length.toLocaleString()} records`,
    );

    const { graph, stats } = buildRoadGraph(request.records, {
      vintage: request.vintage,
      crs: request.crs ?? this.config.defaultCrs,
      onKeyCollision: request.onKeyCollision ?? this.config.keyCollisionPolicy,
    });

    if (stats.filteredRecords > 0) {
      console.log(`[graph] Dropped ${stats.filteredRecords.toLocaleString()} unusable records`);
    }
    if (stats.defaultedSpeedRoadIds.length > 0) {
      console.log(
        `[graph] Default speed used for ${stats.defaultedSpeedRoadIds.length} roads: ${fmtIds(stats.defaultedSpeedRoadIds)}`,
      );
    }
    if (stats.keyCollisions.length > 0) {
      console.warn(
        `[graph] ${stats.keyCollisions.length} duplicate edge keys, later edges kept: ${fmtIds(stats.keyCollisions)}`,
      );
    }
    console.log(
      `[graph] Built in ${stats.buildTimeMs}ms: ${stats.nodesCount.toLocaleString()} nodes, ` +
        `${stats.edgesCount.toLocaleString()} edges kept of ${stats.builtEdges.toLocaleString()} ` +
        `(${stats.componentCount.toLocaleString()} components)`,
    );

    if (request.format === "geojson") {
      return { format: "geojson", stats, geojson: graphToGeoJson(graph) };
    }
    return { format: "graph", stats, graph: graphToJson(graph) };
  }

  listVintages(): VintageInfo[] {
    return listSchemaAdapters().map((adapter) => ({
      vintage: adapter.vintage,
      description: adapter.description,
    }));
  }
}
