import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { AppConfig } from "../src/config.js";
import { applyMigrations, openDb, type SqliteDb } from "../src/db/db.js";
import type { ModuleSource } from "../src/lib/modules.js";
import type { ScanDeps } from "../src/lib/pipeline.js";
import type { ScanExecutor, ScanInvocation } from "../src/lib/scanner.js";
import type { Toolchain } from "../src/lib/toolchain.js";
import type { Finding } from "../src/protocol/messages.js";

export const FIXTURES_DIR = path.join(process.cwd(), "tests", "fixtures");
export const FAKE_SCANNER = { path: process.execPath, args: [path.join(FIXTURES_DIR, "fake-scanner.mjs")] };
export const FAKE_SANDBOX = { path: process.execPath, args: [path.join(FIXTURES_DIR, "fake-sandbox.mjs")] };

export type TestDb = {
  db: SqliteDb;
  tmpDir: string;
  cleanup: () => void;
};

export function createTestDb(): TestDb {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "vulnscan-test-"));
  const db = openDb(path.join(tmpDir, "test.sqlite"));
  applyMigrations(db, path.join(process.cwd(), "migrations"));
  return {
    db,
    tmpDir,
    cleanup: () => {
      db.close();
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  };
}

export function writeVulnDb(dir: string, modified: string): string {
  fs.mkdirSync(path.join(dir, "index"), { recursive: true });
  fs.writeFileSync(path.join(dir, "index", "db.json"), JSON.stringify({ modified }));
  return dir;
}

export function finding(osv: string, frame: { module: string; package?: string; version?: string; function?: string }): Finding {
  return { osv, trace: [frame] };
}

export class FakeToolchain implements Toolchain {
  builds: { module_dir: string; pkg: string; output_path: string }[] = [];
  mainPackages: string[] = [];
  buildFailure: Error | null = null;
  goVersion = "go1.21.0";

  async version(): Promise<string> {
    return this.goVersion;
  }

  async listMainPackages(_moduleDir: string): Promise<string[]> {
    return this.mainPackages;
  }

  async buildBinary(args: { module_dir: string; pkg: string; output_path: string }): Promise<number> {
    this.builds.push(args);
    if (this.buildFailure) throw this.buildFailure;
    return 1.5;
  }
}

export class FakeModules implements ModuleSource {
  constructor(private readonly commitTime: Date | null = new Date("2023-05-01T10:00:00Z")) {}

  prepare(module_path: string, version: string) {
    return { dir: `/modcache/${module_path}@${version}`, commit_time: this.commitTime };
  }
}

/** Executor that records invocations and answers with a fixed outcome or error. */
export function fakeExecutor(answer: (invocation: ScanInvocation) => Finding[] | Error): ScanExecutor & { calls: ScanInvocation[] } {
  const calls: ScanInvocation[] = [];
  const executor = async (invocation: ScanInvocation) => {
    calls.push(invocation);
    const out = answer(invocation);
    if (out instanceof Error) throw out;
    return { findings: out, stats: { scan_seconds: 2, scan_memory_kb: 2048, build_seconds: null }, scanner_config: null };
  };
  return Object.assign(executor, { calls });
}

export function fakeDeps(db: SqliteDb, vulndbDir: string, overrides: Partial<ScanDeps> = {}): ScanDeps {
  return {
    db,
    toolchain: new FakeToolchain(),
    modules: new FakeModules(),
    direct: fakeExecutor(() => []),
    sandbox: fakeExecutor(() => []),
    vulndb_dir: vulndbDir,
    scratch_dir: path.join(vulndbDir, "..", "scratch"),
    worker_version: "worker-test",
    schema_version: "schema-test",
    now: () => new Date("2024-01-02T03:04:05.000Z"),
    ...overrides
  };
}

export function baseConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    PORT: 8080,
    BASE_URL: "http://localhost:8080",
    SQLITE_PATH: "./test.sqlite",
    MIGRATIONS_DIR: path.join(process.cwd(), "migrations"),
    SCANNER_PATH: "govulncheck",
    TOOLCHAIN_PATH: "go",
    VULNDB_DIR: "./vulndb",
    MODULES_DIR: "./modcache",
    SCRATCH_DIR: path.join(os.tmpdir(), "vulnscan-test-scratch"),
    SANDBOX_COMMAND: null,
    ALLOW_INSECURE: true,
    SCAN_TIMEOUT_MS: 60_000,
    BUILD_TIMEOUT_MS: 60_000,
    MEMORY_PROBE: "none",
    WORKER_VERSION: "worker-test",
    TRUST_PROXY: false,
    RATE_LIMIT_WINDOW_MS: 60_000,
    RATE_LIMIT_MAX: 5000,
    HTTP_JSON_BODY_LIMIT_BYTES: 1024 * 1024,
    WORKER_POLL_MS: 20,
    WORKER_LEASE_MS: 5_000,
    WORKER_CONCURRENCY: 1,
    VULNSCAN_ROLE: "all",
    VERSION: "test",
    ...overrides
  };
}
