import express from "express";
import cors from "cors";
import type { ServerConfig } from "./config.js";
import { createGraphRouter } from "./controllers/graph.controller.js";
import { createHealthRouter } from "./controllers/health.controller.js";
import { errorHandler } from "./middleware/error-handler.js";
import { GraphBuildService } from "./services/graph-build.service.js";

export function createApp(config: ServerConfig): express.Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json({ limit: config.maxBodySize }));

  // Routes
  app.use("/api/health", createHealthRouter());
  app.use("/api/graphs", createGraphRouter(new GraphBuildService(config)));

  // Error handler (must be after routes)
  app.use(errorHandler);

  return app;
}
