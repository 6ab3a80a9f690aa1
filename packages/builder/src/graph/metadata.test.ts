import { describe, it, expect } from "vitest";
import type { DirectedEdge } from "@roadnet/types";
import { buildGraph } from "./graph-builder.js";
import { DEFAULT_GRAPH_METADATA, edgeDistance, edgeTime, tagGraph } from "./metadata.js";

const edge: DirectedEdge = {
  from: 1,
  to: 2,
  key: "forward:10",
  direction: "forward",
  attributes: {
    kilometers: 2.5,
    minutes: 4,
    geometry: [[0, 0], [1, 1]],
    roadId: 10,
  },
};

describe("tagGraph", () => {
  it("attaches the default metadata", () => {
    const { graph } = buildGraph([edge]);
    const tagged = tagGraph(graph);

    expect(tagged.metadata).toEqual({
      crs: "EPSG:4326",
      distanceKey: "kilometers",
      timeKey: "minutes",
      geometryKey: "geometry",
      roadIdKey: "roadId",
    });
  });

  it("overrides individual fields", () => {
    const { graph } = buildGraph([edge]);
    const tagged = tagGraph(graph, { crs: "EPSG:3857", distanceKey: "minutes" });

    expect(tagged.metadata.crs).toBe("EPSG:3857");
    expect(tagged.metadata.distanceKey).toBe("minutes");
    expect(tagged.metadata.timeKey).toBe(DEFAULT_GRAPH_METADATA.timeKey);
  });

  it("does not change the structure", () => {
    const { graph } = buildGraph([edge]);
    const tagged = tagGraph(graph);

    expect(tagged.nodes).toBe(graph.nodes);
    expect(tagged.edges).toBe(graph.edges);
    expect(tagged.adjacency).toBe(graph.adjacency);
  });
});

describe("edgeDistance and edgeTime", () => {
  it("read weights through the metadata keys", () => {
    const tagged = tagGraph(buildGraph([edge]).graph);

    expect(edgeDistance(tagged, edge)).toBe(2.5);
    expect(edgeTime(tagged, edge)).toBe(4);
  });

  it("follow remapped keys", () => {
    const tagged = tagGraph(buildGraph([edge]).graph, { timeKey: "kilometers" });
    expect(edgeTime(tagged, edge)).toBe(2.5);
  });
});
