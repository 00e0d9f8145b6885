import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { isRetryableCategory } from "./errors.js";
import type { Toolchain } from "./toolchain.js";

/**
 * Everything that can change a scan's outcome. Given two work versions for the same module
 * version, equal values mean the stored result is still valid.
 */
export type WorkVersion = {
  /** Toolchain version used for analysis; stdlib findings depend on it. */
  go_version: string;
  /** Version of the scanning and processing logic. */
  worker_version: string;
  /** Version of the results table schema. */
  schema_version: string;
  /** RFC 3339 UTC with nine fractional digits, as produced by `normalizeTimestamp`. */
  vulndb_last_modified: string | null;
};

export type WorkState = {
  work_version: WorkVersion | null;
  error_category: string;
};

export function workVersionsEqual(a: WorkVersion | null | undefined, b: WorkVersion | null | undefined): boolean {
  if (!a || !b) return false;
  return (
    a.go_version === b.go_version &&
    a.worker_version === b.worker_version &&
    a.schema_version === b.schema_version &&
    a.vulndb_last_modified === b.vulndb_last_modified
  );
}

export function shouldSkipScan(stored: WorkState | null, current: WorkVersion | null): boolean {
  if (!stored) return false;
  if (!workVersionsEqual(stored.work_version, current)) return false;
  return !isRetryableCategory(stored.error_category);
}

const RFC3339 = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2})(?:\.(\d{1,9}))?(Z|[+-]\d{2}:\d{2})$/i;

/**
 * Converts an RFC 3339 timestamp to UTC with exactly nine fractional digits, so that equal
 * instants compare equal as strings at nanosecond precision.
 */
export function normalizeTimestamp(value: string): string {
  const m = RFC3339.exec(value);
  if (!m) throw new Error(`invalid timestamp ${JSON.stringify(value)}`);
  const [, wholeSeconds, fraction = "", zone] = m;
  const utc = new Date(`${wholeSeconds}${zone.toUpperCase()}`);
  if (Number.isNaN(utc.getTime())) throw new Error(`invalid timestamp ${JSON.stringify(value)}`);
  return `${utc.toISOString().slice(0, 19)}.${fraction.padEnd(9, "0")}Z`;
}

const DbIndexSchema = z.object({
  modified: z.string().datetime({ offset: true })
});

/** Reads the last-modified time from a vulnerability database directory (`index/db.json`). */
export function readVulnDbLastModified(vulndbDir: string): string {
  const file = path.join(vulndbDir, "index", "db.json");
  const raw = fs.readFileSync(file, "utf8");
  const parsed = DbIndexSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid vulnerability database index ${file}: ${parsed.error.message}`);
  }
  return normalizeTimestamp(parsed.data.modified);
}

export async function computeCurrentWorkVersion(args: {
  toolchain: Pick<Toolchain, "version">;
  worker_version: string;
  schema_version: string;
  vulndb_dir: string;
}): Promise<WorkVersion> {
  return {
    go_version: await args.toolchain.version(),
    worker_version: args.worker_version,
    schema_version: args.schema_version,
    vulndb_last_modified: readVulnDbLastModified(args.vulndb_dir)
  };
}
