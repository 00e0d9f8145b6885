import type { Result } from "../lib/aggregate.js";
import type { WorkState, WorkVersion } from "../lib/workVersion.js";
import type { SqliteDb } from "./db.js";
import type { JobRow, JobStatus, RequestMode, ResultRow, ScanJob, VulnRow } from "./types.js";

export function nowMs(): number {
  return Date.now();
}

export type CreateJobInput = Pick<ScanJob, "job_id" | "module_path" | "version" | "suffix" | "mode" | "imported_by" | "insecure">;

export function createJob(db: SqliteDb, job: CreateJobInput, now_ms = nowMs()): void {
  db.prepare(
    `INSERT INTO scan_jobs (job_id,module_path,version,suffix,mode,imported_by,insecure,status,created_at,updated_at,attempt_count)
     VALUES (@job_id,@module_path,@version,@suffix,@mode,@imported_by,@insecure,'queued',@now,@now,0)`
  ).run({ ...job, insecure: job.insecure ? 1 : 0, now: now_ms });
}

export function getJobById(db: SqliteDb, job_id: string): ScanJob | null {
  const row = db.prepare<[string], JobRow>(`SELECT * FROM scan_jobs WHERE job_id=?`).get(job_id);
  return row ? hydrateJob(row) : null;
}

/**
 * Claims the oldest runnable job: queued, or running under an expired lease. A job is never
 * claimed while another job for the same module version runs under a live lease, so at most
 * one scan per target is in flight.
 */
export function claimNextJob(
  db: SqliteDb,
  args: {
    worker_id: string;
    now_ms: number;
    lease_ms: number;
  }
): ScanJob | null {
  const runnable = `(
      status='queued'
      OR (status='running' AND lease_expires_at IS NOT NULL AND lease_expires_at <= @now)
    )`;
  const tx = db.transaction(() => {
    const candidate = db
      .prepare<{ now: number }, { job_id: string }>(
        `SELECT j.job_id
           FROM scan_jobs j
          WHERE (
              j.status='queued'
              OR (j.status='running' AND j.lease_expires_at IS NOT NULL AND j.lease_expires_at <= @now)
            )
            AND NOT EXISTS (
              SELECT 1 FROM scan_jobs other
               WHERE other.module_path = j.module_path
                 AND other.version = j.version
                 AND other.job_id <> j.job_id
                 AND other.status = 'running'
                 AND other.lease_expires_at > @now
            )
          ORDER BY j.created_at ASC, j.rowid ASC
          LIMIT 1`
      )
      .get({ now: args.now_ms });
    if (!candidate) return null;

    const update = db
      .prepare(
        `UPDATE scan_jobs
            SET status='running',
                updated_at=@now,
                lease_owner=@worker_id,
                lease_expires_at=@lease_expires_at,
                started_at=COALESCE(started_at, @now),
                attempt_count=attempt_count + 1
          WHERE job_id=@job_id AND ${runnable}`
      )
      .run({
        now: args.now_ms,
        worker_id: args.worker_id,
        lease_expires_at: args.now_ms + args.lease_ms,
        job_id: candidate.job_id
      });
    if (update.changes === 0) return null;
    return getJobById(db, candidate.job_id);
  });

  return tx();
}

export function releaseExpiredLeases(db: SqliteDb, now_ms: number): number {
  const result = db
    .prepare(
      `UPDATE scan_jobs
          SET status='queued',
              updated_at=?,
              lease_owner=NULL,
              lease_expires_at=NULL
        WHERE status='running'
          AND lease_expires_at IS NOT NULL
          AND lease_expires_at <= ?`
    )
    .run(now_ms, now_ms);
  return result.changes;
}

function finishJob(
  db: SqliteDb,
  job_id: string,
  status: Extract<JobStatus, "completed" | "skipped" | "failed">,
  args: { now_ms: number; result_count: number | null; error_message: string | null }
): void {
  db.prepare(
    `UPDATE scan_jobs
       SET status=?,
           updated_at=?,
           completed_at=?,
           lease_owner=NULL,
           lease_expires_at=NULL,
           result_count=?,
           error_message=?
     WHERE job_id=?`
  ).run(status, args.now_ms, args.now_ms, args.result_count, args.error_message, job_id);
}

export function markJobCompleted(db: SqliteDb, job_id: string, args: { now_ms: number; result_count: number }): void {
  finishJob(db, job_id, "completed", { ...args, error_message: null });
}

export function markJobSkipped(db: SqliteDb, job_id: string, args: { now_ms: number }): void {
  finishJob(db, job_id, "skipped", { now_ms: args.now_ms, result_count: 0, error_message: null });
}

export function markJobFailed(db: SqliteDb, job_id: string, error_message: string, args: { now_ms: number }): void {
  finishJob(db, job_id, "failed", { now_ms: args.now_ms, result_count: null, error_message });
}

/** Writes a result and its vulns in one transaction, so readers never see a partial row. */
export function insertResult(db: SqliteDb, result: Result): void {
  const insertRow = db.prepare(
    `INSERT INTO results (
      result_id,created_at,module_path,version,suffix,sort_version,imported_by,error,error_category,commit_time,
      scan_seconds,build_seconds,scan_memory,scan_mode,go_version,worker_version,schema_version,vulndb_last_modified
    ) VALUES (
      @result_id,@created_at,@module_path,@version,@suffix,@sort_version,@imported_by,@error,@error_category,@commit_time,
      @scan_seconds,@build_seconds,@scan_memory,@scan_mode,@go_version,@worker_version,@schema_version,@vulndb_last_modified
    )`
  );
  const insertVuln = db.prepare(
    `INSERT INTO result_vulns (result_id,ordinal,id,package_path,module_path,version)
     VALUES (@result_id,@ordinal,@id,@package_path,@module_path,@version)`
  );
  const wv = result.work_version;
  const tx = db.transaction(() => {
    insertRow.run({
      result_id: result.result_id,
      created_at: result.created_at.getTime(),
      module_path: result.module_path,
      version: result.version,
      suffix: result.suffix,
      sort_version: result.sort_version,
      imported_by: result.imported_by,
      error: result.error,
      error_category: result.error_category,
      commit_time: result.commit_time ? result.commit_time.getTime() : null,
      scan_seconds: result.scan_seconds,
      build_seconds: result.build_seconds,
      scan_memory: result.scan_memory,
      scan_mode: result.scan_mode,
      go_version: wv?.go_version ?? null,
      worker_version: wv?.worker_version ?? null,
      schema_version: wv?.schema_version ?? null,
      vulndb_last_modified: wv?.vulndb_last_modified ?? null
    });
    result.vulns.forEach((v, ordinal) => {
      insertVuln.run({
        result_id: result.result_id,
        ordinal,
        id: v.id,
        package_path: v.package_path,
        module_path: v.module_path,
        version: v.version
      });
    });
  });
  tx();
}

/** Work version and error category of the newest result for exactly this module version. */
export function readWorkState(db: SqliteDb, module_path: string, version: string): WorkState | null {
  const row = db
    .prepare<[string, string], ResultRow>(
      `SELECT * FROM results
        WHERE module_path=? AND version=?
        ORDER BY created_at DESC, rowid DESC
        LIMIT 1`
    )
    .get(module_path, version);
  if (!row) return null;
  return { work_version: hydrateWorkVersion(row), error_category: row.error_category };
}

export type StoredVuln = Omit<VulnRow, "result_id" | "ordinal">;

export type StoredResult = Omit<Result, "vulns" | "scan_mode"> & {
  scan_mode: string;
  vulns: StoredVuln[];
};

export function getLatestResult(db: SqliteDb, module_path: string, version: string): StoredResult | null {
  const row = db
    .prepare<[string, string], ResultRow>(
      `SELECT * FROM results WHERE module_path=? AND version=? ORDER BY created_at DESC, rowid DESC LIMIT 1`
    )
    .get(module_path, version);
  if (!row) return null;
  const vulns = db
    .prepare<[string], VulnRow>(`SELECT * FROM result_vulns WHERE result_id=? ORDER BY ordinal ASC`)
    .all(row.result_id)
    .map((v) => ({ id: v.id, package_path: v.package_path, module_path: v.module_path, version: v.version }));
  return {
    result_id: row.result_id,
    created_at: new Date(row.created_at),
    module_path: row.module_path,
    version: row.version,
    suffix: row.suffix,
    sort_version: row.sort_version,
    imported_by: row.imported_by,
    error: row.error,
    error_category: row.error_category,
    commit_time: row.commit_time === null ? null : new Date(row.commit_time),
    scan_seconds: row.scan_seconds,
    build_seconds: row.build_seconds,
    scan_memory: row.scan_memory,
    scan_mode: row.scan_mode,
    work_version: hydrateWorkVersion(row),
    vulns
  };
}

export function countResults(db: SqliteDb, module_path: string, version: string): number {
  const row = db
    .prepare<[string, string], { n: number }>(`SELECT COUNT(*) AS n FROM results WHERE module_path=? AND version=?`)
    .get(module_path, version);
  return row?.n ?? 0;
}

function hydrateWorkVersion(row: ResultRow): WorkVersion | null {
  if (row.go_version === null || row.worker_version === null || row.schema_version === null) return null;
  return {
    go_version: row.go_version,
    worker_version: row.worker_version,
    schema_version: row.schema_version,
    vulndb_last_modified: row.vulndb_last_modified
  };
}

const REQUEST_MODES: readonly RequestMode[] = ["source", "binary", "compare"];
const JOB_STATUSES: readonly JobStatus[] = ["queued", "running", "completed", "skipped", "failed"];

function hydrateJob(row: JobRow): ScanJob {
  const mode = REQUEST_MODES.find((m) => m === row.mode);
  const status = JOB_STATUSES.find((s) => s === row.status);
  if (!mode || !status) {
    throw new Error(`scan job ${row.job_id} has unknown mode or status (${row.mode}, ${row.status})`);
  }
  return {
    ...row,
    mode,
    status,
    insecure: Boolean(row.insecure)
  };
}

/** Pushes out the lease of a job still held by this worker. Returns false if the lease was lost. */
export function renewLease(db: SqliteDb, job_id: string, args: { worker_id: string; now_ms: number; lease_ms: number }): boolean {
  const result = db
    .prepare(
      `UPDATE scan_jobs
          SET lease_expires_at=?, updated_at=?
        WHERE job_id=? AND status='running' AND lease_owner=?`
    )
    .run(args.now_ms + args.lease_ms, args.now_ms, job_id, args.worker_id);
  return result.changes > 0;
}
