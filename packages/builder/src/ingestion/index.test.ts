import { describe, it, expect } from "vitest";
import type { MultinetRecord2017, MultinetRecord2021 } from "@roadnet/types";
import { getSchemaAdapter, listSchemaAdapters, normalize } from "./index.js";
import {
  EmptyInputError,
  SchemaError,
  UnsupportedVintageError,
} from "../errors.js";

function record2021(overrides: Partial<MultinetRecord2021> = {}): MultinetRecord2021 {
  return {
    netw_id: 1,
    junction_id_from: 1,
    junction_id_to: 2,
    centimeters: 100_000,
    speed_average_pos: 60,
    speed_average_neg: 60,
    simple_traffic_direction: 1,
    geom: [[0, 0], [1, 0]],
    ...overrides,
  };
}

function record2017(overrides: Partial<MultinetRecord2017> = {}): MultinetRecord2017 {
  return {
    id: 1,
    f_jnctid: 1,
    t_jnctid: 2,
    frc: 3,
    rdcond: 1,
    meters: 1000,
    minutes: 1,
    oneway: null,
    wkb_geometry: [[0, 0], [1, 0]],
    ...overrides,
  };
}

describe("getSchemaAdapter", () => {
  it("returns the adapter for a registered vintage", () => {
    expect(getSchemaAdapter("2017").vintage).toBe("2017");
    expect(getSchemaAdapter("2021").vintage).toBe("2021");
  });

  it("throws UnsupportedVintageError for other tags", () => {
    expect(() => getSchemaAdapter("2019")).toThrow(UnsupportedVintageError);
    expect(() => getSchemaAdapter("2019")).toThrow(
      "vintage 2019 not supported; must be one of '2017', '2021'"
    );
  });
});

describe("listSchemaAdapters", () => {
  it("lists adapters in vintage order", () => {
    expect(listSchemaAdapters().map((a) => a.vintage)).toEqual(["2017", "2021"]);
  });
});

describe("normalize", () => {
  it("checks the vintage before the input", () => {
    expect(() => normalize([], "1999")).toThrow(UnsupportedVintageError);
  });

  it("throws EmptyInputError for empty input", () => {
    expect(() => normalize([], "2021")).toThrow(EmptyInputError);
  });

  it("throws EmptyInputError when every record is filtered out", () => {
    const records = [record2017({ rdcond: 2 }), record2017({ id: 2, frc: 8 })];
    expect(() => normalize(records, "2017")).toThrow(
      "all 2 records were filtered out for vintage 2017"
    );
  });

  it("normalizes records in order and reports stats", () => {
    const records = [
      record2017({ id: 1 }),
      record2017({ id: 2, rdcond: 3 }),
      record2017({ id: 3, oneway: "FT" }),
    ];

    const result = normalize(records, "2017");

    expect(result.vintage).toBe("2017");
    expect(result.records.map((r) => r.roadId)).toEqual([1, 3]);
    expect(result.records[1]?.direction).toBe("forward");
    expect(result.stats).toEqual({
      inputCount: 3,
      filteredCount: 1,
      normalizedCount: 2,
      defaultedSpeedRoadIds: [],
    });
  });

  it("lists the road ids whose speed was defaulted", () => {
    const records = [
      record2021({ netw_id: 1 }),
      record2021({ netw_id: 2, speed_average_neg: null }),
      record2021({ netw_id: 3, speed_average_pos: 0 }),
    ];

    const result = normalize(records, "2021");

    expect(result.stats.defaultedSpeedRoadIds).toEqual([2, 3]);
  });

  it("propagates SchemaError from the adapter", () => {
    const records = [record2021(), record2021({ simple_traffic_direction: 5 })];
    expect(() => normalize(records, "2021")).toThrow(SchemaError);
  });

  it("does not modify the raw records", () => {
    const raw = record2021();
    const snapshot = structuredClone(raw);
    normalize([raw], "2021");
    expect(raw).toEqual(snapshot);
  });
});
