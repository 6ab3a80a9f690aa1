import { Router } from "express";
import { BuildGraphRequestSchema } from "../models/requests.js";
import type {
  BuildGraphResponse,
  VintageListResponse,
} from "../models/responses.js";
import type { GraphBuildService } from "../services/graph-build.service.js";

/**
 * Routes under /api/graphs.
 *
 * - POST /           build a graph from raw records
 * - GET  /vintages   list supported schema vintages
 */
export function createGraphRouter(service: GraphBuildService): Router {
  const router = Router();

  router.post("/", (req, res, next) => {
    try {
      const request = BuildGraphRequestSchema.parse(req.body);
      const body: BuildGraphResponse = service.build(request);
      res.json(body);
    } catch (err) {
      next(err);
    }
  });

  router.get("/vintages", (_req, res) => {
    const body: VintageListResponse = { vintages: service.listVintages() };
    res.json(body);
  });

  return router;
}
