import fs from "node:fs";
import path from "node:path";
import { v4 as uuidv4 } from "uuid";
import { errorMessage, statsFromError } from "./errors.js";
import type { SandboxResponse } from "./sandbox.js";
import type { ScanExecutor } from "./scanner.js";
import { emptyStats } from "./stats.js";
import type { Toolchain } from "./toolchain.js";

export type ComparePair = {
  binary_results: SandboxResponse;
  source_results: SandboxResponse;
  /** Failures of either side, joined; empty when both sides succeeded. */
  error: string;
};

export type CompareResponse = {
  /** Keyed by the import path of each main package. */
  findings_for_mod: Record<string, ComparePair>;
};

export type SideFailures = {
  binary: unknown;
  source: unknown;
};

export type CompareRun = {
  response: CompareResponse;
  /** The errors behind each pair's `error` string, for categorization. */
  failures: Map<string, SideFailures>;
};

/**
 * Scans every main package of a module twice: as a built binary and from source. The two
 * scans are independent; a failing side keeps whatever stats it captured.
 */
export async function runCompare(args: {
  toolchain: Toolchain;
  scan: ScanExecutor;
  module_dir: string;
  vulndb_dir: string;
  scratch_dir: string;
}): Promise<CompareRun> {
  const packages = await args.toolchain.listMainPackages(args.module_dir);
  const response: CompareResponse = { findings_for_mod: {} };
  const failures = new Map<string, SideFailures>();
  fs.mkdirSync(args.scratch_dir, { recursive: true });

  for (const pkg of packages) {
    const binary = await scanBinary(args, pkg);
    const source = await scanSide(() =>
      args.scan({ mode: "source", pattern: pkg, module_dir: args.module_dir, vulndb_dir: args.vulndb_dir })
    );

    const errors: string[] = [];
    if (binary.failure !== null) errors.push(`binary: ${errorMessage(binary.failure)}`);
    if (source.failure !== null) errors.push(`source: ${errorMessage(source.failure)}`);
    response.findings_for_mod[pkg] = {
      binary_results: binary.response,
      source_results: source.response,
      error: errors.join("; ")
    };
    failures.set(pkg, { binary: binary.failure, source: source.failure });
  }

  return { response, failures };
}

type SideResult = { response: SandboxResponse; failure: unknown };

async function scanBinary(
  args: { toolchain: Toolchain; scan: ScanExecutor; module_dir: string; vulndb_dir: string; scratch_dir: string },
  pkg: string
): Promise<SideResult> {
  const binaryPath = path.join(args.scratch_dir, `${path.basename(pkg)}-${uuidv4()}`);
  try {
    let buildSeconds: number;
    try {
      buildSeconds = await args.toolchain.buildBinary({ module_dir: args.module_dir, pkg, output_path: binaryPath });
    } catch (e) {
      return { response: { findings: [], stats: statsFromError(e) ?? emptyStats() }, failure: e };
    }
    const side = await scanSide(() => args.scan({ mode: "binary", pattern: binaryPath, vulndb_dir: args.vulndb_dir }));
    side.response.stats = { ...side.response.stats, build_seconds: buildSeconds };
    return side;
  } finally {
    fs.rmSync(binaryPath, { force: true });
  }
}

async function scanSide(run: () => ReturnType<ScanExecutor>): Promise<SideResult> {
  try {
    const outcome = await run();
    return { response: { findings: outcome.findings, stats: outcome.stats }, failure: null };
  } catch (e) {
    return { response: { findings: [], stats: statsFromError(e) ?? emptyStats() }, failure: e };
  }
}
