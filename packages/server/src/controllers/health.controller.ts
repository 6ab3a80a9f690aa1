import { Router } from "express";
import type { HealthResponse } from "../models/responses.js";

export function createHealthRouter(): Router {
  const router = Router();

  /** Health check */
  router.get("/", (_req, res) => {
    const body: HealthResponse = { status: "ok", uptime: process.uptime() };
    res.json(body);
  });

  return router;
}
