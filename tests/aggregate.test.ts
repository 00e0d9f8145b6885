import { describe, expect, test } from "vitest";
import { buildResult, isBinaryLabel } from "../src/lib/aggregate.js";
import { ScannerExecutionError } from "../src/lib/errors.js";
import { sortVersion } from "../src/lib/sortVersion.js";
import type { WorkVersion } from "../src/lib/workVersion.js";
import { finding } from "./helpers.js";

const target = { module_path: "example.com/m", version: "v1.2.0", suffix: "cmd", imported_by: 7 };
const wv: WorkVersion = {
  go_version: "go1.21.0",
  worker_version: "w1",
  schema_version: "s1",
  vulndb_last_modified: "2023-08-01T00:00:00.000000000Z"
};

describe("buildResult", () => {
  test("builds a successful source row", () => {
    const created = new Date("2024-01-01T00:00:00Z");
    const result = buildResult({
      target,
      mode: "SOURCE",
      work_version: wv,
      commit_time: new Date("2023-05-01T10:00:00Z"),
      stats: { scan_seconds: 3.25, scan_memory_kb: 1024.6, build_seconds: 9 },
      findings: [
        finding("GO-1", { module: "example.com/dep", package: "example.com/dep/a", version: "v0.1.0" }),
        finding("GO-2", { module: "stdlib", package: "net/http", version: "v1.21.0", function: "Get" })
      ],
      created_at: created,
      result_id: "r-1"
    });

    expect(result).toEqual({
      module_path: "example.com/m",
      version: "v1.2.0",
      suffix: "cmd",
      imported_by: 7,
      result_id: "r-1",
      created_at: created,
      sort_version: sortVersion("v1.2.0"),
      error: "",
      error_category: "",
      commit_time: new Date("2023-05-01T10:00:00Z"),
      scan_seconds: 3.25,
      build_seconds: null,
      scan_memory: 1025,
      scan_mode: "SOURCE",
      work_version: wv,
      vulns: [
        { id: "GO-1", package_path: "example.com/dep/a", module_path: "example.com/dep", version: "v0.1.0", called: false },
        { id: "GO-2", package_path: "net/http", module_path: "stdlib", version: "v1.21.0", called: true }
      ]
    });
  });

  test("keeps build time only for binary rows", () => {
    const stats = { scan_seconds: 1, scan_memory_kb: 0, build_seconds: 4.5 };
    expect(buildResult({ target, mode: "BINARY", work_version: wv, commit_time: null, stats }).build_seconds).toBe(4.5);
    expect(buildResult({ target, mode: "COMPARE - BINARY", work_version: wv, commit_time: null, stats }).build_seconds).toBe(4.5);
    expect(buildResult({ target, mode: "COMPARE - SOURCE", work_version: wv, commit_time: null, stats }).build_seconds).toBeNull();
  });

  test("an error clears vulns and sets the category", () => {
    const result = buildResult({
      target,
      mode: "SOURCE",
      work_version: wv,
      commit_time: null,
      stats: { scan_seconds: 0.5, scan_memory_kb: 10, build_seconds: null },
      findings: [finding("GO-1", { module: "example.com/dep" })],
      error: new ScannerExecutionError("go.mod file not found in current directory", 1, {
        scan_seconds: 0.5,
        scan_memory_kb: 10,
        build_seconds: null
      })
    });
    expect(result.error).toBe("go.mod file not found in current directory");
    expect(result.error_category).toBe("BUILD_FAILURE");
    expect(result.vulns).toEqual([]);
    expect(result.scan_seconds).toBe(0.5);
  });

  test("an empty trace becomes an invariant violation row", () => {
    const result = buildResult({
      target,
      mode: "SOURCE",
      work_version: wv,
      commit_time: null,
      findings: [finding("GO-1", { module: "example.com/dep" }), { osv: "GO-9", trace: [] }]
    });
    expect(result.error).toBe("finding GO-9 has an empty trace");
    expect(result.error_category).toBe("INVARIANT_VIOLATION");
    expect(result.vulns).toEqual([]);
  });

  test("non-Error failures are stringified", () => {
    const result = buildResult({ target, mode: "SOURCE", work_version: null, commit_time: null, error: "disk full" });
    expect(result.error).toBe("disk full");
    expect(result.error_category).toBe("UNKNOWN");
    expect(result.scan_seconds).toBe(0);
    expect(result.scan_memory).toBe(0);
  });

  test("assigns fresh ids", () => {
    const a = buildResult({ target, mode: "SOURCE", work_version: wv, commit_time: null });
    const b = buildResult({ target, mode: "SOURCE", work_version: wv, commit_time: null });
    expect(a.result_id).not.toBe(b.result_id);
    expect(a.result_id).toMatch(/^[0-9a-f-]{36}$/);
  });

  test("binary labels", () => {
    expect(isBinaryLabel("BINARY")).toBe(true);
    expect(isBinaryLabel("COMPARE - BINARY")).toBe(true);
    expect(isBinaryLabel("SOURCE")).toBe(false);
    expect(isBinaryLabel("COMPARE - SOURCE")).toBe(false);
  });
});

describe("sortVersion", () => {
  test("encodes versions", () => {
    expect(sortVersion("v1.2.3")).toBe("11,12,13~");
    expect(sortVersion("v1.10.0-rc.2")).toBe("11,210,10-rc,#12");
    expect(sortVersion("v1.0.0+incompatible")).toBe("11,10,10~");
    expect(sortVersion("master")).toBe("!master");
  });

  test("string order follows semver precedence", () => {
    const ordered = [
      "not-a-version",
      "v0.9.0",
      "v1.0.0-alpha",
      "v1.0.0-alpha.1",
      "v1.0.0-alpha.beta",
      "v1.0.0-beta",
      "v1.0.0-beta.2",
      "v1.0.0-beta.11",
      "v1.0.0-rc.1",
      "v1.0.0",
      "v1.2.0",
      "v1.10.0",
      "v2.0.0"
    ];
    const shuffled = [...ordered].reverse();
    const sorted = shuffled.sort((a, b) => (sortVersion(a) < sortVersion(b) ? -1 : sortVersion(a) > sortVersion(b) ? 1 : 0));
    expect(sorted).toEqual(ordered);
  });
});
