/**
 * Road segment records before and after schema normalization.
 */

import type { LineGeometry } from "./geo.js";
import type { NodeId, RoadId } from "./graph.js";

/**
 * A segment record as handed over by the data source.
 *
 * Field names and types depend on the schema vintage; only the adapter for
 * that vintage reads them.
 */
export type RawSegmentRecord = Readonly<Record<string, unknown>>;

/** Which directions of travel a segment is open to */
export type SegmentDirection = "forward" | "backward" | "both";

/**
 * Vintage-independent road segment.
 *
 * `geometry` runs from `fromNodeId` to `toNodeId`; "forward" means travel
 * in that digitized order.
 */
export interface CanonicalEdgeRecord {
  fromNodeId: NodeId;
  toNodeId: NodeId;
  roadId: RoadId;
  geometry: LineGeometry;
  kilometers: number;
  forwardMinutes: number;
  backwardMinutes: number;
  direction: SegmentDirection;
}
