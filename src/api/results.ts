import type { Router } from "express";
import express from "express";
import { z } from "zod";
import type { SqliteDb } from "../db/db.js";
import { getLatestResult } from "../db/repo.js";
import { serializeResult } from "./serialize.js";

const ResultQuery = z.object({
  module_path: z.string().min(1),
  version: z.string().min(1)
});

export function buildResultsRouter(args: { db: SqliteDb }): Router {
  const { db } = args;
  const router = express.Router();

  router.get("/results", (req, res) => {
    const parsed = ResultQuery.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).json({ error: { error_code: "BAD_REQUEST", message: parsed.error.message } });
    }
    const result = getLatestResult(db, parsed.data.module_path, parsed.data.version);
    if (!result) return res.status(404).json({ error: { error_code: "NOT_FOUND", message: "no result for module version" } });

    return res.status(200).json(serializeResult(result));
  });

  return router;
}
