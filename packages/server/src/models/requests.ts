import { z } from "zod";

export const BuildGraphRequestSchema = z.object({
  /** Schema vintage of the records, e.g. "2021" */
  vintage: z.string().min(1),
  /** Raw segment records; each vintage checks its own fields */
  records: z.array(z.record(z.string(), z.unknown())),
  /** CRS of the record geometries (default from server config) */
  crs: z.string().min(1).optional(),
  /** Response body format */
  format: z.enum(["graph", "geojson"]).default("graph"),
  onKeyCollision: z.enum(["overwrite", "throw"]).optional(),
});

export type BuildGraphRequest = z.infer<typeof BuildGraphRequestSchema>;
