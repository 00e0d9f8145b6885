import { z } from "zod";
import { FindingSchema, type Finding } from "../protocol/messages.js";
import { SandboxError, ScanTimeoutError } from "./errors.js";
import { runProcess } from "./process.js";
import { vulnDbUri, type CommandSpec, type ScanExecutor, type ScanInvocation, type ScanOutcome } from "./scanner.js";
import type { ScanStats } from "./stats.js";

const StatsSchema = z.object({
  scan_seconds: z.number().nonnegative().default(0),
  scan_memory_kb: z.number().nonnegative().default(0),
  build_seconds: z.number().nonnegative().nullable().default(null)
});

const SandboxResponseSchema = z.object({
  findings: z.array(FindingSchema).default([]),
  stats: StatsSchema.default({})
});

const ErrorEnvelopeSchema = z.object({ error: z.string().optional() }).passthrough();

/** Raw scan result as returned across the isolation boundary. */
export type SandboxResponse = {
  findings: Finding[];
  stats: ScanStats;
};

export function parseSandboxResponse(output: string): SandboxResponse {
  const value = parseDocument(output);
  const parsed = SandboxResponseSchema.safeParse(value);
  if (!parsed.success) {
    throw new SandboxError(`invalid sandbox response: ${parsed.error.message}`);
  }
  return parsed.data;
}

function parseDocument(output: string): unknown {
  let value: unknown;
  try {
    value = JSON.parse(output);
  } catch (e) {
    throw new SandboxError(`sandbox output is not JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  const envelope = ErrorEnvelopeSchema.safeParse(value);
  if (!envelope.success) {
    throw new SandboxError(`invalid sandbox response: ${envelope.error.message}`);
  }
  if (envelope.data.error) {
    throw new SandboxError(envelope.data.error);
  }
  return value;
}

/**
 * Runs a scan through the sandbox command: `<sandbox> <mode> <pattern> <module dir> <db uri>`.
 * The command prints one JSON document, either a sandbox response or `{ "error": "..." }`.
 */
export async function runInSandbox(
  invocation: ScanInvocation,
  opts: { sandbox: CommandSpec; timeout_ms: number; env?: NodeJS.ProcessEnv }
): Promise<ScanOutcome> {
  const out = await runProcess({
    command: opts.sandbox.path,
    args: [
      ...(opts.sandbox.args ?? []),
      invocation.mode,
      invocation.pattern,
      invocation.module_dir ?? "",
      vulnDbUri(invocation.vulndb_dir)
    ],
    env: opts.env,
    timeout_ms: opts.timeout_ms
  });
  if (out.timed_out) {
    throw new ScanTimeoutError(opts.timeout_ms, { scan_seconds: out.seconds, scan_memory_kb: 0, build_seconds: null });
  }
  if (out.exit_code !== 0) {
    throw new SandboxError(out.stderr.trim() || `sandbox exited with code ${out.exit_code ?? "unknown"}`);
  }
  const response = parseSandboxResponse(out.stdout);
  return { findings: response.findings, stats: response.stats, scanner_config: null };
}

export function sandboxExecutor(opts: { sandbox: CommandSpec; timeout_ms: number }): ScanExecutor {
  return (invocation) => runInSandbox(invocation, opts);
}
