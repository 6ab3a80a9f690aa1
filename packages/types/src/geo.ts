/**
 * Geographic utility types.
 */

/**
 * A point as `[x, y]`. For EPSG:4326 data this is `[lng, lat]`; for a
 * projected CRS it is easting/northing in the CRS units.
 */
export type Position = readonly [x: number, y: number];

/** Ordered polyline; at least two points once normalized */
export type LineGeometry = readonly Position[];

/** Coordinate reference system descriptor, e.g. "EPSG:4326" */
export type Crs = string;

/** Default CRS of raw segment records */
export const LATLON_CRS: Crs = "EPSG:4326";

/** Return a new geometry with the point order reversed */
export function reverseGeometry(geometry: LineGeometry): LineGeometry {
  return [...geometry].reverse();
}
