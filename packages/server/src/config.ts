/**
 * Server configuration from environment variables.
 */

import { LATLON_CRS } from "@roadnet/types";
import { z } from "zod";

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  /** CRS assumed for request geometries that do not name one */
  ROADNET_DEFAULT_CRS: z.string().min(1).default(LATLON_CRS),
  /** Largest accepted request body, in express body-parser notation */
  ROADNET_MAX_BODY: z.string().min(1).default("50mb"),
  /** What to do when two edges share (from, to, key) */
  ROADNET_KEY_COLLISIONS: z.enum(["overwrite", "throw"]).default("overwrite"),
});

export interface ServerConfig {
  port: number;
  defaultCrs: string;
  maxBodySize: string;
  keyCollisionPolicy: "overwrite" | "throw";
}

/**
 * Read the configuration once at startup.
 *
 * @throws ZodError if a variable is set to an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): ServerConfig {
  const parsed = EnvSchema.parse(env);
  return {
    port: parsed.PORT,
    defaultCrs: parsed.ROADNET_DEFAULT_CRS,
    maxBodySize: parsed.ROADNET_MAX_BODY,
    keyCollisionPolicy: parsed.ROADNET_KEY_COLLISIONS,
  };
}
