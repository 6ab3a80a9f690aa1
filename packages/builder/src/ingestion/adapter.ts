/**
 * Schema adapter interface.
 *
 * One adapter per supported source vintage. The adapter is picked by the
 * caller's vintage tag; records are never inspected to guess their schema.
 */

import type {
  CanonicalEdgeRecord,
  RawSegmentRecord,
  Vintage,
} from "@roadnet/types";

/** Speed assumed when a record has none, in km/h */
export const DEFAULT_SPEED_KMH = 20;

/** Result of adapting a single raw record */
export interface AdaptedRecord {
  record: CanonicalEdgeRecord;
  /** True when at least one direction's speed fell back to the default */
  speedDefaulted: boolean;
}

/** Maps raw records of one vintage to canonical edge records */
export interface SchemaAdapter {
  readonly vintage: Vintage;
  /** Human-readable description of the source table */
  readonly description: string;
  /**
   * Whether a raw record is usable at all. Records rejected here are
   * dropped before normalization.
   */
  accepts(raw: RawSegmentRecord, index: number): boolean;
  /**
   * Convert an accepted raw record.
   *
   * @throws SchemaError if the record lacks a required field
   */
  toCanonical(raw: RawSegmentRecord, index: number): AdaptedRecord;
}

/**
 * Minutes needed to cover a distance at a speed.
 * A missing or non-positive speed is replaced by {@link DEFAULT_SPEED_KMH}.
 */
export function travelMinutes(
  kilometers: number,
  speedKmh: number | undefined
): { minutes: number; defaulted: boolean } {
  const defaulted = speedKmh === undefined || speedKmh <= 0;
  const speed = defaulted ? DEFAULT_SPEED_KMH : speedKmh;
  return { minutes: (kilometers / speed) * 60, defaulted };
}
