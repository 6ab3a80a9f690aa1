/**
 * Adapter for the MultiNet 2021 network schema.
 *
 * Length is stored in centimeters and travel time is derived from the
 * average speed in each direction.
 */

import type { RawSegmentRecord, SegmentDirection } from "@roadnet/types";
import { SchemaError } from "../errors.js";
import { travelMinutes, type AdaptedRecord, type SchemaAdapter } from "./adapter.js";
import {
  readGeometry,
  readInteger,
  readLength,
  readOptionalNumber,
  readRoadId,
} from "./field-readers.js";

const CENTIMETERS_PER_KILOMETER = 100_000;

/** simple_traffic_direction codes */
const TRAFFIC_DIRECTION: Record<number, SegmentDirection> = {
  1: "both",
  2: "forward",
  3: "backward",
  9: "both",
};

/**
 * Map a simple_traffic_direction code to a segment direction.
 *
 * @returns The direction, or undefined for an unknown code
 */
export function trafficDirection2021(code: number): SegmentDirection | undefined {
  return TRAFFIC_DIRECTION[code];
}

export const multinet2021Adapter: SchemaAdapter = {
  vintage: "2021",
  description: "MultiNet 2021 network (centimeters, average speeds per direction)",

  accepts(): boolean {
    return true;
  },

  toCanonical(raw: RawSegmentRecord, index: number): AdaptedRecord {
    const code = readInteger(raw, "simple_traffic_direction", index);
    const direction = trafficDirection2021(code);
    if (!direction) {
      throw new SchemaError(
        index,
        "simple_traffic_direction",
        `has unknown code ${code}; expected 1, 2, 3 or 9`
      );
    }

    const kilometers =
      readLength(raw, "centimeters", index) / CENTIMETERS_PER_KILOMETER;
    const forward = travelMinutes(
      kilometers,
      readOptionalNumber(raw, "speed_average_pos", index)
    );
    const backward = travelMinutes(
      kilometers,
      readOptionalNumber(raw, "speed_average_neg", index)
    );

    return {
      record: {
        fromNodeId: readInteger(raw, "junction_id_from", index),
        toNodeId: readInteger(raw, "junction_id_to", index),
        roadId: readRoadId(raw, "netw_id", index),
        geometry: readGeometry(raw, "geom", index),
        kilometers,
        forwardMinutes: forward.minutes,
        backwardMinutes: backward.minutes,
        direction,
      },
      speedDefaulted: forward.defaulted || backward.defaulted,
    };
  },
};
