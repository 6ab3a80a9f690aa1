import type {
  GeoJsonFeatureCollection,
  GraphJson,
  RoadGraphBuildStats,
} from "@roadnet/builder";
import type { Vintage } from "@roadnet/types";

export interface HealthResponse {
  status: "ok";
  uptime: number;
}

export type BuildGraphResponse =
  | { format: "graph"; stats: RoadGraphBuildStats; graph: GraphJson }
  | {
      format: "geojson";
      stats: RoadGraphBuildStats;
      geojson: GeoJsonFeatureCollection;
    };

export interface VintageInfo {
  vintage: Vintage;
  description: string;
}

export interface VintageListResponse {
  vintages: VintageInfo[];
}

export interface ErrorResponse {
  message: string;
  /** Error class name for pipeline errors */
  error?: string;
  /** Validation issues */
  details?: unknown;
}
