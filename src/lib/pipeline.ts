import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import type { AppConfig } from "../config.js";
import type { SqliteDb } from "../db/db.js";
import { insertResult, readWorkState } from "../db/repo.js";
import { RESULT_COLUMNS, schemaVersion } from "../db/schema.js";
import type { RequestMode } from "../db/types.js";
import { buildResult, type Result, type ScanModeLabel, type ScanTarget } from "./aggregate.js";
import { runCompare, type CompareResponse } from "./compare.js";
import { SandboxError, statsFromError } from "./errors.js";
import { ModuleCacheSource, type ModuleSource } from "./modules.js";
import { selectMemoryProbe } from "./process.js";
import { sandboxExecutor } from "./sandbox.js";
import { directExecutor, type ScanExecutor, type ScanOutcome } from "./scanner.js";
import { emptyStats } from "./stats.js";
import { GoToolchain, type Toolchain } from "./toolchain.js";
import { computeCurrentWorkVersion, shouldSkipScan, type WorkVersion } from "./workVersion.js";

export type ScanRequest = ScanTarget & {
  mode: RequestMode;
  /** Run the scanner directly instead of through the sandbox. */
  insecure: boolean;
  /** Return the result to the caller instead of storing it. */
  serve: boolean;
};

export type ScanDeps = {
  db: SqliteDb;
  toolchain: Toolchain;
  modules: ModuleSource;
  direct: ScanExecutor;
  sandbox: ScanExecutor | null;
  vulndb_dir: string;
  scratch_dir: string;
  worker_version: string;
  schema_version: string;
  now?: () => Date;
};

export type PipelineOutcome =
  | { kind: "skipped"; work_version: WorkVersion }
  | { kind: "result"; result: Result }
  | { kind: "compare"; response: CompareResponse | null; results: Result[] };

export function buildScanDeps(config: AppConfig, db: SqliteDb): ScanDeps {
  const [sandboxPath, ...sandboxArgs] = config.SANDBOX_COMMAND ?? [];
  return {
    db,
    toolchain: new GoToolchain({ path: config.TOOLCHAIN_PATH, timeout_ms: config.BUILD_TIMEOUT_MS }),
    modules: new ModuleCacheSource(config.MODULES_DIR),
    direct: directExecutor({
      scanner: { path: config.SCANNER_PATH },
      timeout_ms: config.SCAN_TIMEOUT_MS,
      memory_probe: selectMemoryProbe(config.MEMORY_PROBE)
    }),
    sandbox: sandboxPath ? sandboxExecutor({ sandbox: { path: sandboxPath, args: sandboxArgs }, timeout_ms: config.SCAN_TIMEOUT_MS }) : null,
    vulndb_dir: config.VULNDB_DIR,
    scratch_dir: config.SCRATCH_DIR,
    worker_version: config.WORKER_VERSION,
    // Derived once here and passed along, so every result of this process agrees on it.
    schema_version: schemaVersion(RESULT_COLUMNS)
  };
}

/**
 * Runs one scan request start to finish. Scan failures become error rows; only storage
 * failures are thrown.
 */
export async function runScanPipeline(deps: ScanDeps, request: ScanRequest): Promise<PipelineOutcome> {
  if (request.mode === "compare") {
    return runComparePipeline(deps, request);
  }

  const mode: ScanModeLabel = request.mode === "binary" ? "BINARY" : "SOURCE";
  const target = targetOf(request);
  let workVersion: WorkVersion | null = null;
  let commitTime: Date | null = null;
  const build: { seconds: number | null } = { seconds: null };
  let result: Result;
  try {
    workVersion = await computeCurrentWorkVersion({
      toolchain: deps.toolchain,
      worker_version: deps.worker_version,
      schema_version: deps.schema_version,
      vulndb_dir: deps.vulndb_dir
    });
    if (!request.serve) {
      const stored = readWorkState(deps.db, request.module_path, request.version);
      if (shouldSkipScan(stored, workVersion)) {
        return { kind: "skipped", work_version: workVersion };
      }
    }

    const prepared = deps.modules.prepare(request.module_path, request.version);
    commitTime = prepared.commit_time;
    const executor = selectExecutor(deps, request);
    const outcome = request.mode === "binary" ? await scanBinary(deps, executor, prepared.dir, build) : await scanSource(deps, executor, prepared.dir);
    result = buildResult({
      target,
      mode,
      work_version: workVersion,
      commit_time: commitTime,
      stats: outcome.stats,
      findings: outcome.findings,
      created_at: now(deps)
    });
  } catch (e) {
    const carried = statsFromError(e);
    result = buildResult({
      target,
      mode,
      work_version: workVersion,
      commit_time: commitTime,
      // A scan that fails after a successful build still reports the build time.
      stats: build.seconds === null ? carried : { ...(carried ?? emptyStats()), build_seconds: build.seconds },
      error: e,
      created_at: now(deps)
    });
  }

  if (!request.serve) {
    insertResult(deps.db, result);
  }
  return { kind: "result", result };
}

async function runComparePipeline(deps: ScanDeps, request: ScanRequest): Promise<PipelineOutcome> {
  const target = targetOf(request);
  let workVersion: WorkVersion | null = null;
  let commitTime: Date | null = null;
  let response: CompareResponse | null = null;
  let results: Result[];
  try {
    workVersion = await computeCurrentWorkVersion({
      toolchain: deps.toolchain,
      worker_version: deps.worker_version,
      schema_version: deps.schema_version,
      vulndb_dir: deps.vulndb_dir
    });
    const prepared = deps.modules.prepare(request.module_path, request.version);
    commitTime = prepared.commit_time;
    const run = await runCompare({
      toolchain: deps.toolchain,
      scan: selectExecutor(deps, request),
      module_dir: prepared.dir,
      vulndb_dir: deps.vulndb_dir,
      scratch_dir: deps.scratch_dir
    });
    response = run.response;

    results = [];
    for (const [pkg, pair] of Object.entries(run.response.findings_for_mod)) {
      const failures = run.failures.get(pkg);
      // Rows of a comparison are keyed by the main package, not the module.
      const pkgTarget = { ...target, module_path: pkg };
      const shared = { target: pkgTarget, work_version: workVersion, commit_time: commitTime, created_at: now(deps) };
      results.push(
        buildResult({
          ...shared,
          mode: "COMPARE - BINARY",
          stats: pair.binary_results.stats,
          findings: pair.binary_results.findings,
          error: failures?.binary
        }),
        buildResult({
          ...shared,
          mode: "COMPARE - SOURCE",
          stats: pair.source_results.stats,
          findings: pair.source_results.findings,
          error: failures?.source
        })
      );
    }
  } catch (e) {
    const shared = { target, work_version: workVersion, commit_time: commitTime, error: e, created_at: now(deps) };
    results = [buildResult({ ...shared, mode: "COMPARE - BINARY" }), buildResult({ ...shared, mode: "COMPARE - SOURCE" })];
  }

  if (!request.serve) {
    for (const result of results) insertResult(deps.db, result);
  }
  return { kind: "compare", response, results };
}

function selectExecutor(deps: ScanDeps, request: ScanRequest): ScanExecutor {
  if (request.insecure) return deps.direct;
  if (!deps.sandbox) throw new SandboxError("sandbox is not configured");
  return deps.sandbox;
}

function scanSource(deps: ScanDeps, executor: ScanExecutor, moduleDir: string): Promise<ScanOutcome> {
  return executor({ mode: "source", pattern: "./...", module_dir: moduleDir, vulndb_dir: deps.vulndb_dir });
}

async function scanBinary(
  deps: ScanDeps,
  executor: ScanExecutor,
  moduleDir: string,
  build: { seconds: number | null }
): Promise<ScanOutcome> {
  fs.mkdirSync(deps.scratch_dir, { recursive: true });
  const binaryPath = path.join(deps.scratch_dir, `bin-${uuidv4()}`);
  try {
    const buildSeconds = await deps.toolchain.buildBinary({ module_dir: moduleDir, pkg: ".", output_path: binaryPath });
    build.seconds = buildSeconds;
    const outcome = await executor({ mode: "binary", pattern: binaryPath, vulndb_dir: deps.vulndb_dir });
    return { ...outcome, stats: { ...outcome.stats, build_seconds: buildSeconds } };
  } finally {
    fs.rmSync(binaryPath, { force: true });
  }
}

function targetOf(request: ScanRequest): ScanTarget {
  return {
    module_path: request.module_path,
    version: request.version,
    suffix: request.suffix,
    imported_by: request.imported_by
  };
}

function now(deps: ScanDeps): Date {
  return deps.now ? deps.now() : new Date();
}
