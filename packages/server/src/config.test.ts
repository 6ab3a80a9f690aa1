import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("uses defaults for unset variables", () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      defaultCrs: "EPSG:4326",
      maxBodySize: "50mb",
      keyCollisionPolicy: "overwrite",
    });
  });

  it("reads variables from the environment", () => {
    const config = loadConfig({
      PORT: "8080",
      ROADNET_DEFAULT_CRS: "EPSG:3857",
      ROADNET_MAX_BODY: "200mb",
      ROADNET_KEY_COLLISIONS: "throw",
    });

    expect(config).toEqual({
      port: 8080,
      defaultCrs: "EPSG:3857",
      maxBodySize: "200mb",
      keyCollisionPolicy: "throw",
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadConfig({ PORT: "many" })).toThrow(ZodError);
    expect(() => loadConfig({ ROADNET_KEY_COLLISIONS: "ignore" })).toThrow(ZodError);
  });
});
