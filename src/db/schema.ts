import { createHash } from "node:crypto";

export type ColumnType = "STRING" | "INTEGER" | "FLOAT" | "TIMESTAMP" | "RECORD";

export type ColumnDef = {
  name: string;
  type: ColumnType;
  nullable: boolean;
  repeated?: boolean;
  fields?: ColumnDef[];
};

/**
 * Shape of a row in the results table. Changing it changes the schema version, which in turn
 * invalidates every stored work version.
 */
export const RESULT_COLUMNS: ColumnDef[] = [
  { name: "created_at", type: "TIMESTAMP", nullable: false },
  { name: "module_path", type: "STRING", nullable: false },
  { name: "version", type: "STRING", nullable: false },
  { name: "suffix", type: "STRING", nullable: false },
  { name: "sort_version", type: "STRING", nullable: false },
  { name: "imported_by", type: "INTEGER", nullable: false },
  { name: "error", type: "STRING", nullable: false },
  { name: "error_category", type: "STRING", nullable: false },
  { name: "commit_time", type: "TIMESTAMP", nullable: true },
  { name: "scan_seconds", type: "FLOAT", nullable: false },
  { name: "build_seconds", type: "FLOAT", nullable: true },
  { name: "scan_memory", type: "INTEGER", nullable: false },
  { name: "scan_mode", type: "STRING", nullable: false },
  { name: "go_version", type: "STRING", nullable: true },
  { name: "worker_version", type: "STRING", nullable: true },
  { name: "schema_version", type: "STRING", nullable: true },
  { name: "vulndb_last_modified", type: "TIMESTAMP", nullable: true },
  {
    name: "vulns",
    type: "RECORD",
    nullable: false,
    repeated: true,
    fields: [
      { name: "id", type: "STRING", nullable: false },
      { name: "package_path", type: "STRING", nullable: false },
      { name: "module_path", type: "STRING", nullable: false },
      { name: "version", type: "STRING", nullable: false }
    ]
  }
];

export function schemaVersion(columns: ColumnDef[]): string {
  return createHash("sha256").update(canonicalJson(columns), "utf8").digest("hex").slice(0, 16);
}

export function canonicalJson(value: unknown): string {
  if (value === null || value === undefined) return "null";
  if (Array.isArray(value)) {
    return "[" + value.map((v) => canonicalJson(v)).join(",") + "]";
  }
  if (typeof value === "object") {
    const entries: [string, unknown][] = Object.entries(value).filter(([, v]) => v !== undefined);
    entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return "{" + entries.map(([k, v]) => JSON.stringify(k) + ":" + canonicalJson(v)).join(",") + "}";
  }
  return JSON.stringify(value);
}
