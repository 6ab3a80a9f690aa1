import { describe, it, expect } from "vitest";
import {
  parseInteger,
  parseNumber,
  readGeometry,
  readInteger,
  readLength,
  readOptionalLength,
  readOptionalNumber,
  readRoadId,
} from "./field-readers.js";
import { SchemaError } from "../errors.js";

describe("parseInteger", () => {
  it("accepts integer numbers", () => {
    expect(parseInteger(42)).toBe(42);
    expect(parseInteger(-7)).toBe(-7);
  });

  it("accepts integer strings", () => {
    expect(parseInteger("12280000000123")).toBe(12280000000123);
    expect(parseInteger(" 15 ")).toBe(15);
  });

  it("rejects fractions, unsafe integers and other values", () => {
    expect(parseInteger(1.5)).toBeUndefined();
    expect(parseInteger("1.5")).toBeUndefined();
    expect(parseInteger("abc")).toBeUndefined();
    expect(parseInteger(2 ** 60)).toBeUndefined();
    expect(parseInteger(null)).toBeUndefined();
    expect(parseInteger(true)).toBeUndefined();
  });
});

describe("parseNumber", () => {
  it("parses numbers and numeric strings", () => {
    expect(parseNumber(3.25)).toBe(3.25);
    expect(parseNumber("3.25")).toBe(3.25);
  });

  it("rejects non-finite and blank values", () => {
    expect(parseNumber(Number.NaN)).toBeUndefined();
    expect(parseNumber(Infinity)).toBeUndefined();
    expect(parseNumber("  ")).toBeUndefined();
    expect(parseNumber("fast")).toBeUndefined();
  });
});

describe("readInteger", () => {
  it("reads a numeric identifier", () => {
    expect(readInteger({ f_jnctid: "101" }, "f_jnctid", 0)).toBe(101);
  });

  it("throws SchemaError for a missing identifier", () => {
    expect(() => readInteger({}, "f_jnctid", 3)).toThrow(SchemaError);
    expect(() => readInteger({}, "f_jnctid", 3)).toThrow(
      'record 3: field "f_jnctid" is required'
    );
  });

  it("throws SchemaError for a non-numeric identifier", () => {
    expect(() => readInteger({ f_jnctid: "north" }, "f_jnctid", 1)).toThrow(
      'record 1: field "f_jnctid" must be an integer, got "north"'
    );
  });
});

describe("readRoadId", () => {
  it("returns numeric ids as integers", () => {
    expect(readRoadId({ netw_id: "77" }, "netw_id", 0)).toBe(77);
  });

  it("keeps non-numeric string ids", () => {
    expect(readRoadId({ netw_id: "a1b2-c3" }, "netw_id", 0)).toBe("a1b2-c3");
  });

  it("rejects missing and non-string ids", () => {
    expect(() => readRoadId({ netw_id: "" }, "netw_id", 0)).toThrow(SchemaError);
    expect(() => readRoadId({ netw_id: 1.5 }, "netw_id", 0)).toThrow(
      'record 0: field "netw_id" must be an integer or a string id, got 1.5'
    );
  });
});

describe("readOptionalNumber", () => {
  it("returns undefined for null, undefined and empty string", () => {
    expect(readOptionalNumber({ speed: null }, "speed", 0)).toBeUndefined();
    expect(readOptionalNumber({}, "speed", 0)).toBeUndefined();
    expect(readOptionalNumber({ speed: "" }, "speed", 0)).toBeUndefined();
  });

  it("throws on non-numeric values", () => {
    expect(() => readOptionalNumber({ speed: "fast" }, "speed", 2)).toThrow(
      'record 2: field "speed" must be a number, got "fast"'
    );
  });
});

describe("readOptionalLength and readLength", () => {
  it("reads non-negative values", () => {
    expect(readOptionalLength({ meters: "12.5" }, "meters", 0)).toBe(12.5);
    expect(readLength({ meters: 0 }, "meters", 0)).toBe(0);
  });

  it("rejects negative values", () => {
    expect(() => readOptionalLength({ meters: -1 }, "meters", 4)).toThrow(
      'record 4: field "meters" must not be negative, got -1'
    );
  });

  it("requires a value in readLength", () => {
    expect(() => readLength({}, "centimeters", 0)).toThrow(
      'record 0: field "centimeters" is required'
    );
  });
});

describe("readGeometry", () => {
  it("reads a coordinate array", () => {
    const geometry = readGeometry(
      { geom: [[-85.6, 42.9], [-85.61, 42.91]] },
      "geom",
      0
    );
    expect(geometry).toEqual([[-85.6, 42.9], [-85.61, 42.91]]);
  });

  it("reads a GeoJSON LineString and drops extra ordinates", () => {
    const geometry = readGeometry(
      {
        geom: {
          type: "LineString",
          coordinates: [[1, 2, 100], [3, 4, 101], [5, 6, 102]],
        },
      },
      "geom",
      0
    );
    expect(geometry).toEqual([[1, 2], [3, 4], [5, 6]]);
  });

  it("rejects other GeoJSON geometry types", () => {
    expect(() =>
      readGeometry({ geom: { type: "Point", coordinates: [1, 2] } }, "geom", 0)
    ).toThrow('record 0: field "geom" must be a LineString or a coordinate array');
  });

  it("rejects geometries with fewer than two points", () => {
    expect(() => readGeometry({ geom: [[1, 2]] }, "geom", 5)).toThrow(
      'record 5: field "geom" needs at least 2 points, got 1'
    );
  });

  it("rejects invalid points", () => {
    expect(() => readGeometry({ geom: [[1, 2], [3, "4"]] }, "geom", 0)).toThrow(
      'record 0: field "geom" has an invalid point at position 1'
    );
  });

  it("requires the field", () => {
    expect(() => readGeometry({}, "geom", 0)).toThrow(
      'record 0: field "geom" is required'
    );
  });
});
