/**
 * Expand canonical records into directed edges.
 *
 * A two-way segment becomes two independent edges, one per direction. The
 * backward edge runs to -> from with its geometry reversed.
 */

import type { CanonicalEdgeRecord, DirectedEdge } from "@roadnet/types";
import { edgeKey, reverseGeometry } from "@roadnet/types";

function forwardEdge(record: CanonicalEdgeRecord): DirectedEdge {
  return {
    from: record.fromNodeId,
    to: record.toNodeId,
    key: edgeKey(record.roadId, "forward"),
    direction: "forward",
    attributes: {
      kilometers: record.kilometers,
      minutes: record.forwardMinutes,
      geometry: record.geometry,
      roadId: record.roadId,
    },
  };
}

function backwardEdge(record: CanonicalEdgeRecord): DirectedEdge {
  return {
    from: record.toNodeId,
    to: record.fromNodeId,
    key: edgeKey(record.roadId, "backward"),
    direction: "backward",
    attributes: {
      kilometers: record.kilometers,
      minutes: record.backwardMinutes,
      geometry: reverseGeometry(record.geometry),
      roadId: record.roadId,
    },
  };
}

/**
 * Directed edges implied by a record's travel direction.
 *
 * @returns One edge for a one-way record, two (forward first) for a
 *   two-way record
 */
export function expandRecord(record: CanonicalEdgeRecord): DirectedEdge[] {
  switch (record.direction) {
    case "forward":
      return [forwardEdge(record)];
    case "backward":
      return [backwardEdge(record)];
    case "both":
      return [forwardEdge(record), backwardEdge(record)];
  }
}

/** Expand every record, keeping record order */
export function expandRecords(
  records: Iterable<CanonicalEdgeRecord>
): DirectedEdge[] {
  const edges: DirectedEdge[] = [];
  for (const record of records) {
    edges.push(...expandRecord(record));
  }
  return edges;
}
