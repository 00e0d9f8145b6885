import type { Router } from "express";
import express from "express";
import type { AppConfig } from "../config.js";
import type { ScanDeps } from "../lib/pipeline.js";

export function buildMetaRouter(args: { config: AppConfig; deps: ScanDeps }): Router {
  const { config, deps } = args;
  const router = express.Router();

  router.get("/version", (_req, res) => {
    return res.status(200).json({
      version: config.VERSION,
      worker_version: deps.worker_version,
      schema_version: deps.schema_version,
      sandboxed: deps.sandbox !== null
    });
  });

  return router;
}
