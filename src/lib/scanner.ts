import path from "node:path";
import { pathToFileURL } from "node:url";
import { FindingCollector, handleMessages } from "../protocol/decoder.js";
import type { Finding, ScannerConfig } from "../protocol/messages.js";
import { ScannerExecutionError, ScanTimeoutError } from "./errors.js";
import { startProcess, type MemoryProbe } from "./process.js";
import type { ScanStats } from "./stats.js";

export type ScanMode = "source" | "binary";

/** Executable plus any arguments that precede the scan arguments. */
export type CommandSpec = {
  path: string;
  args?: string[];
};

export type ScanInvocation = {
  mode: ScanMode;
  /** Package pattern in source mode, binary path in binary mode. */
  pattern: string;
  module_dir?: string;
  vulndb_dir: string;
};

export type ScanOutcome = {
  findings: Finding[];
  stats: ScanStats;
  scanner_config: ScannerConfig | null;
};

export type ScanExecutor = (invocation: ScanInvocation) => Promise<ScanOutcome>;

export function vulnDbUri(vulndbDir: string): string {
  return pathToFileURL(path.resolve(vulndbDir)).href;
}

export function buildScannerArgs(invocation: ScanInvocation): string[] {
  const args = ["-mode", invocation.mode, "-json", "-db", vulnDbUri(invocation.vulndb_dir)];
  if (invocation.module_dir) {
    args.push("-C", invocation.module_dir);
  }
  args.push(invocation.pattern);
  return args;
}

export async function runScanner(
  invocation: ScanInvocation,
  opts: {
    scanner: CommandSpec;
    timeout_ms: number;
    memory_probe?: MemoryProbe;
    env?: NodeJS.ProcessEnv;
  }
): Promise<ScanOutcome> {
  const proc = startProcess({
    command: opts.scanner.path,
    args: [...(opts.scanner.args ?? []), ...buildScannerArgs(invocation)],
    env: opts.env,
    timeout_ms: opts.timeout_ms,
    memory_probe: opts.memory_probe
  });

  const collector = new FindingCollector();
  const reader = { killed: false };
  const decoding = handleMessages(proc.stdout, collector).catch((err: unknown) => {
    // Stop a scanner whose output can no longer be read.
    reader.killed = proc.kill();
    throw err;
  });
  const [exit, decoded] = await Promise.allSettled([proc.done, decoding]);
  if (exit.status === "rejected") throw exit.reason;

  const outcome = exit.value;
  const stats: ScanStats = {
    scan_seconds: outcome.seconds,
    scan_memory_kb: outcome.peak_memory_kb,
    build_seconds: null
  };
  if (outcome.timed_out) throw new ScanTimeoutError(opts.timeout_ms, stats);
  // A child ended by the reader has no exit code of its own; the decode error is the cause.
  if (reader.killed && outcome.exit_code === null && decoded.status === "rejected") throw decoded.reason;
  // Output of a failed run is discarded, whatever was decoded.
  if (outcome.exit_code !== 0) throw new ScannerExecutionError(outcome.stderr, outcome.exit_code, stats);
  if (decoded.status === "rejected") throw decoded.reason;

  return { findings: collector.findings, stats, scanner_config: collector.scannerConfig };
}

export function directExecutor(opts: {
  scanner: CommandSpec;
  timeout_ms: number;
  memory_probe?: MemoryProbe;
}): ScanExecutor {
  return (invocation) => runScanner(invocation, opts);
}
