import { v4 as uuidv4 } from "uuid";
import type { Finding } from "../protocol/messages.js";
import { categorizeError, errorMessage } from "./errors.js";
import { convertFinding, dedupeVulns, type Vuln } from "./normalize.js";
import { sortVersion } from "./sortVersion.js";
import { emptyStats, type ScanStats } from "./stats.js";
import type { WorkVersion } from "./workVersion.js";

export type ScanModeLabel = "SOURCE" | "BINARY" | "COMPARE - SOURCE" | "COMPARE - BINARY";

export type ScanTarget = {
  module_path: string;
  version: string;
  suffix: string;
  imported_by: number;
};

/** A row in the results table. Rows are never updated; the newest row for a target wins. */
export type Result = ScanTarget & {
  result_id: string;
  created_at: Date;
  sort_version: string;
  error: string;
  error_category: string;
  commit_time: Date | null;
  scan_seconds: number;
  /** Only set for binary scans. */
  build_seconds: number | null;
  scan_memory: number;
  scan_mode: ScanModeLabel;
  work_version: WorkVersion | null;
  vulns: Vuln[];
};

export function isBinaryLabel(mode: ScanModeLabel): boolean {
  return mode === "BINARY" || mode === "COMPARE - BINARY";
}

export function buildResult(input: {
  target: ScanTarget;
  mode: ScanModeLabel;
  work_version: WorkVersion | null;
  commit_time: Date | null;
  stats?: ScanStats | null;
  findings?: Finding[];
  error?: unknown;
  created_at?: Date;
  result_id?: string;
}): Result {
  const stats = input.stats ?? emptyStats();
  let failure = input.error;
  let vulns: Vuln[] = [];
  if (failure === undefined || failure === null) {
    try {
      vulns = dedupeVulns((input.findings ?? []).map(convertFinding));
    } catch (e) {
      failure = e;
    }
  }

  const hasError = failure !== undefined && failure !== null;
  return {
    ...input.target,
    result_id: input.result_id ?? uuidv4(),
    created_at: input.created_at ?? new Date(),
    sort_version: sortVersion(input.target.version),
    error: hasError ? errorMessage(failure) || "unknown error" : "",
    error_category: hasError ? categorizeError(failure) : "",
    commit_time: input.commit_time,
    scan_seconds: stats.scan_seconds,
    build_seconds: isBinaryLabel(input.mode) ? stats.build_seconds : null,
    scan_memory: Math.round(stats.scan_memory_kb),
    scan_mode: input.mode,
    work_version: input.work_version,
    vulns: hasError ? [] : vulns
  };
}
