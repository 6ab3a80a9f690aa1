/**
 * Read typed values out of raw segment records.
 *
 * Raw records come from a database row or a JSON body, so numbers may arrive
 * as strings and missing values as null, undefined or "". These readers
 * coerce what can be coerced and raise {@link SchemaError} for the rest.
 */

import type {
  LineGeometry,
  NodeId,
  Position,
  RawSegmentRecord,
  RoadId,
} from "@roadnet/types";
import { SchemaError } from "../errors.js";

const INTEGER_PATTERN = /^-?\d+$/;

function isMissing(value: unknown): value is null | undefined | "" {
  return value === null || value === undefined || value === "";
}

function formatValue(value: unknown): string {
  if (typeof value === "string") return `"${value}"`;
  if (value === undefined) return "nothing";
  return JSON.stringify(value) ?? String(value);
}

/**
 * Parse an integer from a number or an integer string.
 *
 * @returns The integer, or undefined if the value is not one
 */
export function parseInteger(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isSafeInteger(value) ? value : undefined;
  }
  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!INTEGER_PATTERN.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Parse a finite number from a number or a numeric string.
 *
 * @returns The number, or undefined if the value is not one
 */
export function parseNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Read a required integer identifier */
export function readInteger(
  record: RawSegmentRecord,
  field: string,
  index: number
): NodeId {
  const value = record[field];
  if (isMissing(value)) {
    throw new SchemaError(index, field, "is required");
  }
  const parsed = parseInteger(value);
  if (parsed === undefined) {
    throw new SchemaError(index, field, `must be an integer, got ${formatValue(value)}`);
  }
  return parsed;
}

/**
 * Read a road id: an integer where the value is numeric, otherwise the
 * non-empty string as given.
 */
export function readRoadId(
  record: RawSegmentRecord,
  field: string,
  index: number
): RoadId {
  const value = record[field];
  if (isMissing(value)) {
    throw new SchemaError(index, field, "is required");
  }
  const parsed = parseInteger(value);
  if (parsed !== undefined) return parsed;
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  throw new SchemaError(index, field, `must be an integer or a string id, got ${formatValue(value)}`);
}

/**
 * Read an optional number.
 *
 * @returns The number, or undefined when the field is missing
 */
export function readOptionalNumber(
  record: RawSegmentRecord,
  field: string,
  index: number
): number | undefined {
  const value = record[field];
  if (isMissing(value)) return undefined;
  const parsed = parseNumber(value);
  if (parsed === undefined) {
    throw new SchemaError(index, field, `must be a number, got ${formatValue(value)}`);
  }
  return parsed;
}

/**
 * Read an optional non-negative number, such as a length or a duration.
 *
 * @returns The number, or undefined when the field is missing
 */
export function readOptionalLength(
  record: RawSegmentRecord,
  field: string,
  index: number
): number | undefined {
  const value = readOptionalNumber(record, field, index);
  if (value !== undefined && value < 0) {
    throw new SchemaError(index, field, `must not be negative, got ${value}`);
  }
  return value;
}

/** Read a required non-negative number */
export function readLength(
  record: RawSegmentRecord,
  field: string,
  index: number
): number {
  const value = readOptionalLength(record, field, index);
  if (value === undefined) {
    throw new SchemaError(index, field, "is required");
  }
  return value;
}

function toPosition(value: unknown): Position | undefined {
  if (!Array.isArray(value) || value.length < 2) return undefined;
  const [x, y] = value;
  if (typeof x !== "number" || typeof y !== "number") return undefined;
  if (!Number.isFinite(x) || !Number.isFinite(y)) return undefined;
  return [x, y];
}

function coordinatesOf(value: unknown): unknown {
  if (Array.isArray(value)) return value;
  if (typeof value === "object" && value !== null && "coordinates" in value) {
    if ("type" in value && value.type !== "LineString") return undefined;
    return value.coordinates;
  }
  return undefined;
}

/**
 * Read a line geometry given either as a coordinate array or as a GeoJSON
 * LineString. Extra ordinates (z, m) are dropped.
 */
export function readGeometry(
  record: RawSegmentRecord,
  field: string,
  index: number
): LineGeometry {
  const value = record[field];
  if (isMissing(value)) {
    throw new SchemaError(index, field, "is required");
  }
  const coordinates = coordinatesOf(value);
  if (!Array.isArray(coordinates)) {
    throw new SchemaError(index, field, "must be a LineString or a coordinate array");
  }

  const geometry: Position[] = [];
  for (const [i, coordinate] of coordinates.entries()) {
    const position = toPosition(coordinate);
    if (!position) {
      throw new SchemaError(index, field, `has an invalid point at position ${i}`);
    }
    geometry.push(position);
  }
  if (geometry.length < 2) {
    throw new SchemaError(index, field, `needs at least 2 points, got ${geometry.length}`);
  }
  return geometry;
}
