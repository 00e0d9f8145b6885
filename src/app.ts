import fs from "node:fs";
import express from "express";
import type { NextFunction, Request, Response } from "express";
import helmet from "helmet";
import cors from "cors";
import rateLimit from "express-rate-limit";
import swaggerUi from "swagger-ui-express";
import YAML from "yaml";
import { resolveProjectFile, type AppConfig } from "./config.js";
import type { SqliteDb } from "./db/db.js";
import type { ScanDeps } from "./lib/pipeline.js";
import { errorMessage } from "./lib/errors.js";
import { buildScanRouter } from "./api/scan.js";
import { buildResultsRouter } from "./api/results.js";
import { buildMetaRouter } from "./api/meta.js";

export function buildApp(args: { config: AppConfig; db: SqliteDb; deps: ScanDeps }) {
  const { config, db, deps } = args;
  const app = express();

  if (config.TRUST_PROXY) {
    app.set("trust proxy", 1);
  }

  app.use(helmet());
  app.use(cors());
  app.use(
    rateLimit({
      windowMs: config.RATE_LIMIT_WINDOW_MS,
      max: config.RATE_LIMIT_MAX,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (_req, res) =>
        res.status(429).json({
          error: {
            error_code: "RATE_LIMITED",
            message: "too many requests"
          }
        })
    })
  );
  app.use(express.json({ limit: config.HTTP_JSON_BODY_LIMIT_BYTES }));

  const openapiYaml = fs.readFileSync(resolveProjectFile("openapi", "vulnscan.openapi.yaml"), "utf8");
  const openapiObj = YAML.parse(openapiYaml);
  app.get("/openapi.json", (_req, res) => res.json(openapiObj));
  app.use("/docs", swaggerUi.serve, swaggerUi.setup(openapiObj));

  app.use("/v1", buildScanRouter({ db, deps, allow_insecure: config.ALLOW_INSECURE }));
  app.use("/v1", buildResultsRouter({ db }));
  app.use("/v1", buildMetaRouter({ config, deps }));

  app.get("/healthz", (_req, res) => res.json({ ok: true }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = err instanceof SyntaxError ? 400 : 500;
    if (status === 500) console.error(`Unhandled request error: ${errorMessage(err)}`);
    res.status(status).json({
      error: {
        error_code: status === 400 ? "BAD_REQUEST" : "INTERNAL",
        message: status === 400 ? "malformed JSON body" : "internal error"
      }
    });
  });

  return app;
}
