import { describe, expect, test } from "vitest";
import { noMemoryProbe, procStatusMemoryProbe, runProcess, selectMemoryProbe, startProcess } from "../src/lib/process.js";
import { FAKE_SCANNER } from "./helpers.js";

// Far above any pid_max the kernel allows.
const MISSING_PID = 2 ** 30;

describe("memory measurement", () => {
  test("selects memory measurement from the configured kind and platform", () => {
    expect(selectMemoryProbe("none", "linux")).toBe(noMemoryProbe);
    expect(selectMemoryProbe("none")).toBe(noMemoryProbe);
    expect(selectMemoryProbe("auto", "linux")).toBe(procStatusMemoryProbe);
    expect(selectMemoryProbe("auto", "darwin")).toBe(noMemoryProbe);
    expect(selectMemoryProbe("proc", "darwin")).toBe(procStatusMemoryProbe);
  });

  test("reports 0 where memory cannot be measured", () => {
    expect(selectMemoryProbe("auto", "darwin")(process.pid)).toBe(0);
    expect(selectMemoryProbe("none")(process.pid)).toBe(0);
  });

  test("reads the peak resident size of a live process from /proc", () => {
    const peak = procStatusMemoryProbe(process.pid);
    if (process.platform === "linux") {
      expect(peak).toBeGreaterThan(0);
    } else {
      expect(peak).toBe(0);
    }
  });

  test("reports 0 for a process that does not exist", () => {
    expect(procStatusMemoryProbe(MISSING_PID)).toBe(0);
  });
});

describe("startProcess", () => {
  test("kill stops a running child and reports it", async () => {
    const proc = startProcess({
      command: FAKE_SCANNER.path,
      args: FAKE_SCANNER.args,
      env: { FAKE_SCANNER_SLEEP_MS: "20000" },
      timeout_ms: 10_000
    });
    proc.stdout.resume();
    expect(proc.kill()).toBe(true);
    const outcome = await proc.done;
    expect(outcome).toMatchObject({ exit_code: null, signal: "SIGKILL", timed_out: false });
  });

  test("kill after exit does nothing", async () => {
    const proc = startProcess({
      command: FAKE_SCANNER.path,
      args: FAKE_SCANNER.args,
      env: { FAKE_SCANNER_EXIT: "3" },
      timeout_ms: 10_000
    });
    proc.stdout.resume();
    const outcome = await proc.done;
    expect(outcome.exit_code).toBe(3);
    expect(proc.kill()).toBe(false);
  });

  test("runProcess buffers stdout and stderr", async () => {
    const out = await runProcess({
      command: process.execPath,
      args: ["-e", "process.stdout.write('out'); process.stderr.write('err')"],
      timeout_ms: 10_000
    });
    expect(out).toMatchObject({ stdout: "out", stderr: "err", exit_code: 0, timed_out: false });
  });
});
