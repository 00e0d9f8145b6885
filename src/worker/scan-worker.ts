import os from "node:os";
import type { AppConfig } from "../config.js";
import type { SqliteDb } from "../db/db.js";
import { claimNextJob, markJobCompleted, markJobFailed, markJobSkipped, nowMs, releaseExpiredLeases, renewLease } from "../db/repo.js";
import type { ScanJob } from "../db/types.js";
import { errorMessage } from "../lib/errors.js";
import { runScanPipeline, type PipelineOutcome, type ScanDeps } from "../lib/pipeline.js";

export type WorkerHandle = {
  stop: () => void;
  /** Resolves once the loop has exited and in-flight jobs have settled. */
  stopped: Promise<void>;
};

export function startWorkerLoop(args: {
  config: Pick<AppConfig, "WORKER_POLL_MS" | "WORKER_LEASE_MS" | "WORKER_CONCURRENCY">;
  db: SqliteDb;
  deps: ScanDeps;
  worker_id?: string;
}): WorkerHandle {
  const { config, db, deps } = args;
  const workerId = args.worker_id || `${os.hostname()}:${process.pid}`;
  const pollMs = config.WORKER_POLL_MS;
  const leaseMs = config.WORKER_LEASE_MS;
  const concurrency = Math.max(1, config.WORKER_CONCURRENCY);
  const inFlight = new Set<Promise<void>>();
  let stopped = false;

  const loop = async () => {
    while (!stopped) {
      releaseExpiredLeases(db, nowMs());

      let claimedAny = false;
      while (!stopped && inFlight.size < concurrency) {
        const claimed = claimNextJob(db, { worker_id: workerId, now_ms: nowMs(), lease_ms: leaseMs });
        if (!claimed) break;
        claimedAny = true;
        console.log(
          `Worker claimed job_id=${claimed.job_id} target=${claimed.module_path}@${claimed.version} mode=${claimed.mode} attempt=${claimed.attempt_count}`
        );
        const task = processClaimedJob({ db, deps, job: claimed, worker_id: workerId, lease_ms: leaseMs }).finally(() => {
          inFlight.delete(task);
        });
        inFlight.add(task);
      }

      if (!claimedAny) {
        await sleep(pollMs);
      }
    }
    await Promise.all(inFlight);
  };

  const stoppedPromise = loop().catch((e: unknown) => {
    console.error(`Worker loop crashed: ${errorMessage(e)}`);
    stopped = true;
  });

  return {
    stop: () => {
      stopped = true;
    },
    stopped: stoppedPromise
  };
}

export async function processClaimedJob(args: {
  db: SqliteDb;
  deps: ScanDeps;
  job: ScanJob;
  worker_id: string;
  lease_ms: number;
}): Promise<void> {
  const { db, deps, job } = args;
  const heartbeat = setInterval(() => {
    if (!renewLease(db, job.job_id, { worker_id: args.worker_id, now_ms: nowMs(), lease_ms: args.lease_ms })) {
      console.warn(`Worker lost lease job_id=${job.job_id}`);
    }
  }, Math.max(1, Math.floor(args.lease_ms / 3)));

  try {
    const outcome = await runScanPipeline(deps, {
      module_path: job.module_path,
      version: job.version,
      suffix: job.suffix,
      imported_by: job.imported_by,
      mode: job.mode,
      insecure: job.insecure,
      serve: false
    });
    if (outcome.kind === "skipped") {
      markJobSkipped(db, job.job_id, { now_ms: nowMs() });
      console.log(`Worker skipped job_id=${job.job_id}: work version unchanged`);
      return;
    }
    markJobCompleted(db, job.job_id, { now_ms: nowMs(), result_count: resultCount(outcome) });
    console.log(`Worker completed job_id=${job.job_id} ${summarize(outcome)}`);
  } catch (e) {
    markJobFailed(db, job.job_id, errorMessage(e), { now_ms: nowMs() });
    console.warn(`Worker failed job_id=${job.job_id}: ${errorMessage(e)}`);
  } finally {
    clearInterval(heartbeat);
  }
}

function resultCount(outcome: Exclude<PipelineOutcome, { kind: "skipped" }>): number {
  return outcome.kind === "result" ? 1 : outcome.results.length;
}

function summarize(outcome: Exclude<PipelineOutcome, { kind: "skipped" }>): string {
  const results = outcome.kind === "result" ? [outcome.result] : outcome.results;
  const vulns = results.reduce((n, r) => n + r.vulns.length, 0);
  const called = results.reduce((n, r) => n + r.vulns.filter((v) => v.called).length, 0);
  const errors = results.filter((r) => r.error !== "").map((r) => r.error_category);
  return `rows=${results.length} vulns=${vulns} called=${called}${errors.length > 0 ? ` errors=${errors.join(",")}` : ""}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
