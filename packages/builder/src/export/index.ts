/**
 * Export module.
 *
 * Serializes tagged graphs for transport and visualization.
 */

export {
  graphToGeoJson,
  type GeoJsonExportOptions,
  type GeoJsonFeature,
  type GeoJsonFeatureCollection,
} from "./geojson.js";
export { graphToJson, type GraphJson, type GraphJsonEdge } from "./json.js";
