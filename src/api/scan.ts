import type { Response, Router } from "express";
import express from "express";
import { v4 as uuidv4 } from "uuid";
import type { SqliteDb } from "../db/db.js";
import { createJob, getJobById } from "../db/repo.js";
import type { ScanJob } from "../db/types.js";
import { errorMessage } from "../lib/errors.js";
import { runScanPipeline, type ScanDeps } from "../lib/pipeline.js";
import { EnqueueRequestSchema, parseModuleUrlPath, ScanQuerySchema, type ModuleVersion } from "../lib/request.js";
import { serializeResult } from "./serialize.js";

export function buildScanRouter(args: { db: SqliteDb; deps: ScanDeps; allow_insecure: boolean }): Router {
  const { db, deps } = args;
  const router = express.Router();

  router.post(/^\/scan\/.+/, async (req, res) => {
    let target: ModuleVersion;
    try {
      target = parseModuleUrlPath(decodeURIComponent(req.path.slice("/scan/".length)));
    } catch (e) {
      return badRequest(res, errorMessage(e));
    }

    const query = ScanQuerySchema.safeParse(req.query);
    if (!query.success) return badRequest(res, query.error.message);
    if (query.data.insecure && !args.allow_insecure) {
      return res.status(403).json({ error: { error_code: "INSECURE_NOT_ALLOWED", message: "insecure scans are disabled" } });
    }

    if (!query.data.serve) {
      const job_id = uuidv4();
      createJob(db, {
        job_id,
        module_path: target.module_path,
        version: target.version,
        suffix: query.data.suffix,
        mode: query.data.mode,
        imported_by: query.data.importedby,
        insecure: query.data.insecure
      });
      return res.status(202).json({ job_id, status: "queued" });
    }

    try {
      const outcome = await runScanPipeline(deps, {
        ...target,
        suffix: query.data.suffix,
        mode: query.data.mode,
        imported_by: query.data.importedby,
        insecure: query.data.insecure,
        serve: true
      });
      if (outcome.kind === "compare") {
        return res.status(200).json({
          compare: outcome.response,
          results: outcome.results.map((r) => serializeResult(r))
        });
      }
      if (outcome.kind === "skipped") {
        return res.status(200).json({ status: "skipped" });
      }
      return res.status(200).json(serializeResult(outcome.result));
    } catch (e) {
      console.error(`Served scan failed target=${target.module_path}@${target.version}: ${errorMessage(e)}`);
      return res.status(500).json({ error: { error_code: "SCAN_FAILED", message: "scan failed" } });
    }
  });

  router.post("/enqueue", (req, res) => {
    const parsed = EnqueueRequestSchema.safeParse(req.body);
    if (!parsed.success) return badRequest(res, parsed.error.message);
    if (parsed.data.insecure && !args.allow_insecure) {
      return res.status(403).json({ error: { error_code: "INSECURE_NOT_ALLOWED", message: "insecure scans are disabled" } });
    }

    const selected = parsed.data.modules.filter((m) => m.imported_by >= parsed.data.min);
    const enqueue = db.transaction(() =>
      selected.map((m) => {
        const job_id = uuidv4();
        createJob(db, {
          job_id,
          module_path: m.module_path,
          version: m.version,
          suffix: parsed.data.suffix,
          mode: parsed.data.mode,
          imported_by: m.imported_by,
          insecure: parsed.data.insecure
        });
        return job_id;
      })
    );
    const jobIds = enqueue();
    console.log(`Enqueued jobs=${jobIds.length} skipped_below_min=${parsed.data.modules.length - jobIds.length} mode=${parsed.data.mode}`);
    return res.status(202).json({
      queued: jobIds.length,
      skipped: parsed.data.modules.length - jobIds.length,
      job_ids: jobIds
    });
  });

  router.get("/jobs/:job_id", (req, res) => {
    const job = getJobById(db, req.params.job_id);
    if (!job) return res.status(404).json({ error: { error_code: "NOT_FOUND", message: "job not found" } });
    return res.status(200).json(jobJson(job));
  });

  return router;
}

function badRequest(res: Response, message: string) {
  return res.status(400).json({ error: { error_code: "BAD_REQUEST", message } });
}

function jobJson(job: ScanJob) {
  return {
    job_id: job.job_id,
    module_path: job.module_path,
    version: job.version,
    suffix: job.suffix,
    mode: job.mode,
    imported_by: job.imported_by,
    insecure: job.insecure,
    status: job.status,
    attempt_count: job.attempt_count,
    result_count: job.result_count,
    created_at: toIso(job.created_at),
    updated_at: toIso(job.updated_at),
    completed_at: job.completed_at === null ? null : toIso(job.completed_at),
    ...(job.status === "failed" ? { error: { error_code: "JOB_FAILED", message: job.error_message || "job failed" } } : {})
  };
}

function toIso(ms: number): string {
  return new Date(ms).toISOString();
}
