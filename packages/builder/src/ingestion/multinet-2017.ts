/**
 * Adapter for the MultiNet 2017 schema.
 *
 * This vintage carries a precomputed travel time used for both directions.
 * Unpaved or worse roads (rdcond >= 2) and the lowest functional class
 * (frc 8) are dropped; remaining missing numbers read as zero.
 */

import type { RawSegmentRecord, SegmentDirection } from "@roadnet/types";
import type { AdaptedRecord, SchemaAdapter } from "./adapter.js";
import {
  readGeometry,
  readInteger,
  readOptionalLength,
  readOptionalNumber,
} from "./field-readers.js";

const METERS_PER_KILOMETER = 1000;
const MAX_ROAD_CONDITION = 2;
const MAX_FUNCTIONAL_CLASS = 8;

/**
 * Map the oneway column to a segment direction.
 * Only the exact codes "FT" and "TF" are one-way; any other value, or none,
 * is two-way.
 */
export function onewayDirection2017(oneway: unknown): SegmentDirection {
  switch (oneway) {
    case "FT":
      return "forward";
    case "TF":
      return "backward";
    default:
      return "both";
  }
}

export const multinet2017Adapter: SchemaAdapter = {
  vintage: "2017",
  description: "MultiNet 2017 (meters, precomputed minutes, oneway FT/TF)",

  accepts(raw: RawSegmentRecord, index: number): boolean {
    const rdcond = readOptionalNumber(raw, "rdcond", index);
    const frc = readOptionalNumber(raw, "frc", index);
    if (rdcond === undefined || frc === undefined) return false;
    return rdcond < MAX_ROAD_CONDITION && frc < MAX_FUNCTIONAL_CLASS;
  },

  toCanonical(raw: RawSegmentRecord, index: number): AdaptedRecord {
    const meters = readOptionalLength(raw, "meters", index) ?? 0;
    const minutes = readOptionalLength(raw, "minutes", index) ?? 0;

    return {
      record: {
        fromNodeId: readInteger(raw, "f_jnctid", index),
        toNodeId: readInteger(raw, "t_jnctid", index),
        roadId: readInteger(raw, "id", index),
        geometry: readGeometry(raw, "wkb_geometry", index),
        kilometers: meters / METERS_PER_KILOMETER,
        forwardMinutes: minutes,
        backwardMinutes: minutes,
        direction: onewayDirection2017(raw["oneway"]),
      },
      speedDefaulted: false,
    };
  },
};
