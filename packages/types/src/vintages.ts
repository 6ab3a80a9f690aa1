/**
 * Supported source schema vintages.
 *
 * The record types document the fields each vintage's adapter reads from a
 * {@link RawSegmentRecord}. Values arrive untyped (a database row or a JSON
 * body), so the adapters coerce and check every field they use.
 */

export const VINTAGES = ["2017", "2021"] as const;

export type Vintage = (typeof VINTAGES)[number];

export function isVintage(value: string): value is Vintage {
  return VINTAGES.some((v) => v === value);
}

/** Geometry as a bare coordinate array or a GeoJSON LineString */
export type RawGeometry =
  | number[][]
  | { type: "LineString"; coordinates: number[][] };

/** MultiNet 2021 `network` row */
export type MultinetRecord2021 = {
  netw_id: number | string;
  junction_id_from: number | string;
  junction_id_to: number | string;
  centimeters: number;
  /** Average speed along the geometry, km/h */
  speed_average_pos?: number | null;
  /** Average speed against the geometry, km/h */
  speed_average_neg?: number | null;
  /** 1 or 9: both ways, 2: forward only, 3: backward only */
  simple_traffic_direction: number;
  geom: RawGeometry;
};

/** MultiNet 2017 `multinet_2017` row */
export type MultinetRecord2017 = {
  id: number | string;
  f_jnctid: number | string;
  t_jnctid: number | string;
  /** Functional road class, 0 (motorway) to 8 (other) */
  frc: number | null;
  /** Road condition, 1 paved, 2 unpaved, 3 poor */
  rdcond: number | null;
  backrd?: number | null;
  privaterd?: number | null;
  roughrd?: number | null;
  meters: number | null;
  /** Travel time in minutes, same both ways */
  minutes: number | null;
  /** "FT", "TF", or anything else for two-way */
  oneway: string | number | null;
  wkb_geometry: RawGeometry;
};
