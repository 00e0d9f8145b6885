import { spawn } from "node:child_process";
import fs from "node:fs";
import { performance } from "node:perf_hooks";
import type { Readable } from "node:stream";

/** Returns the peak resident memory of a running process in kB, or 0 when unknown. */
export type MemoryProbe = (pid: number) => number;

export const noMemoryProbe: MemoryProbe = () => 0;

export const procStatusMemoryProbe: MemoryProbe = (pid) => {
  let status: string;
  try {
    status = fs.readFileSync(`/proc/${pid}/status`, "utf8");
  } catch {
    // The process may already have exited.
    return 0;
  }
  const m = /^VmHWM:\s+(\d+)\s+kB/m.exec(status);
  return m ? Number(m[1]) : 0;
};

export function selectMemoryProbe(kind: "auto" | "proc" | "none", platform: NodeJS.Platform = process.platform): MemoryProbe {
  if (kind === "none") return noMemoryProbe;
  if (kind === "proc" || platform === "linux") return procStatusMemoryProbe;
  return noMemoryProbe;
}

export type ProcessOutcome = {
  exit_code: number | null;
  signal: NodeJS.Signals | null;
  timed_out: boolean;
  stderr: string;
  seconds: number;
  peak_memory_kb: number;
};

export type RunningProcess = {
  stdout: Readable;
  done: Promise<ProcessOutcome>;
  /** Kills the child with SIGKILL. Returns false if it had already exited. */
  kill: () => boolean;
};

export type ProcessOptions = {
  command: string;
  args: string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout_ms: number;
  memory_probe?: MemoryProbe;
  memory_sample_ms?: number;
};

/**
 * Starts a subprocess with a hard timeout. On timeout the child is killed with SIGKILL and the
 * outcome is flagged `timed_out`. `done` rejects only when the process could not be spawned.
 */
export function startProcess(opts: ProcessOptions): RunningProcess {
  const started = performance.now();
  const child = spawn(opts.command, opts.args, {
    cwd: opts.cwd,
    env: { ...process.env, ...opts.env },
    stdio: ["ignore", "pipe", "pipe"]
  });

  const stderr: Buffer[] = [];
  child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

  const probe = opts.memory_probe ?? noMemoryProbe;
  let peakKb = 0;
  const sample = () => {
    if (child.pid !== undefined && child.exitCode === null) {
      peakKb = Math.max(peakKb, probe(child.pid));
    }
  };
  sample();
  const sampler = setInterval(sample, opts.memory_sample_ms ?? 100);

  let timedOut = false;
  const timer = setTimeout(() => {
    timedOut = true;
    child.kill("SIGKILL");
  }, opts.timeout_ms);

  const done = new Promise<ProcessOutcome>((resolve, reject) => {
    child.once("error", (err) => {
      clearInterval(sampler);
      clearTimeout(timer);
      reject(err);
    });
    child.once("close", (code, signal) => {
      clearInterval(sampler);
      clearTimeout(timer);
      resolve({
        exit_code: code,
        signal,
        timed_out: timedOut,
        stderr: Buffer.concat(stderr).toString("utf8"),
        seconds: (performance.now() - started) / 1000,
        peak_memory_kb: peakKb
      });
    });
  });

  return {
    stdout: child.stdout,
    done,
    kill: () => {
      if (child.exitCode !== null || child.signalCode !== null) return false;
      return child.kill("SIGKILL");
    }
  };
}

/** Runs a process to completion and buffers its standard output. */
export async function runProcess(opts: ProcessOptions): Promise<ProcessOutcome & { stdout: string }> {
  const proc = startProcess(opts);
  const chunks: Buffer[] = [];
  const reading = (async () => {
    for await (const chunk of proc.stdout) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
    }
  })();
  const [outcome] = await Promise.all([proc.done, reading]);
  return { ...outcome, stdout: Buffer.concat(chunks).toString("utf8") };
}
