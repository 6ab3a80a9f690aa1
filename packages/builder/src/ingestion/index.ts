/**
 * Data ingestion module.
 *
 * Responsible for turning raw segment records of a known schema vintage into
 * canonical edge records.
 *
 * Pipeline:
 * Raw records -> Vintage adapter (filter, coerce, derive) -> Canonical records
 */

import type {
  CanonicalEdgeRecord,
  RawSegmentRecord,
  RoadId,
  Vintage,
} from "@roadnet/types";
import { VINTAGES, isVintage } from "@roadnet/types";
import { EmptyInputError, UnsupportedVintageError } from "../errors.js";
import type { SchemaAdapter } from "./adapter.js";
import { multinet2017Adapter } from "./multinet-2017.js";
import { multinet2021Adapter } from "./multinet-2021.js";

export {
  DEFAULT_SPEED_KMH,
  travelMinutes,
  type AdaptedRecord,
  type SchemaAdapter,
} from "./adapter.js";
export { multinet2017Adapter, onewayDirection2017 } from "./multinet-2017.js";
export { multinet2021Adapter, trafficDirection2021 } from "./multinet-2021.js";
export {
  parseInteger,
  parseNumber,
  readGeometry,
  readInteger,
  readLength,
  readOptionalLength,
  readOptionalNumber,
  readRoadId,
} from "./field-readers.js";

const ADAPTERS: Record<Vintage, SchemaAdapter> = {
  "2017": multinet2017Adapter,
  "2021": multinet2021Adapter,
};

/** Statistics about a normalization run */
export interface NormalizationStats {
  /** Raw records received */
  inputCount: number;
  /** Records dropped by the vintage's usability filter */
  filteredCount: number;
  /** Canonical records produced */
  normalizedCount: number;
  /** Road ids whose speed fell back to the default */
  defaultedSpeedRoadIds: RoadId[];
}

/** Result of normalizing a batch of raw records */
export interface NormalizationResult {
  vintage: Vintage;
  records: CanonicalEdgeRecord[];
  stats: NormalizationStats;
}

/**
 * Get the adapter registered for a vintage tag.
 *
 * @throws UnsupportedVintageError if no adapter is registered for the tag
 */
export function getSchemaAdapter(vintage: string): SchemaAdapter {
  if (!isVintage(vintage)) {
    throw new UnsupportedVintageError(vintage, VINTAGES);
  }
  return ADAPTERS[vintage];
}

/** All registered adapters, in vintage order */
export function listSchemaAdapters(): SchemaAdapter[] {
  return VINTAGES.map((vintage) => ADAPTERS[vintage]);
}

/**
 * Normalize raw records of one vintage into canonical edge records.
 *
 * The vintage is checked before the input, so an unknown tag fails even
 * for an empty batch.
 *
 * @param rawRecords - Records as read from the source
 * @param vintage - Schema vintage tag, e.g. "2021"
 * @returns Canonical records and statistics
 * @throws UnsupportedVintageError, SchemaError, EmptyInputError
 */
export function normalize(
  rawRecords: readonly RawSegmentRecord[],
  vintage: string
): NormalizationResult {
  const adapter = getSchemaAdapter(vintage);

  if (rawRecords.length === 0) {
    throw new EmptyInputError(
      "road network has no links; check the source query boundaries"
    );
  }

  const records: CanonicalEdgeRecord[] = [];
  const defaultedSpeedRoadIds: RoadId[] = [];
  let filteredCount = 0;

  for (const [index, raw] of rawRecords.entries()) {
    if (!adapter.accepts(raw, index)) {
      filteredCount++;
      continue;
    }
    const { record, speedDefaulted } = adapter.toCanonical(raw, index);
    records.push(record);
    if (speedDefaulted) defaultedSpeedRoadIds.push(record.roadId);
  }

  if (records.length === 0) {
    throw new EmptyInputError(
      `all ${rawRecords.length} records were filtered out for vintage ${adapter.vintage}`
    );
  }

  return {
    vintage: adapter.vintage,
    records,
    stats: {
      inputCount: rawRecords.length,
      filteredCount,
      normalizedCount: records.length,
      defaultedSpeedRoadIds,
    },
  };
}
