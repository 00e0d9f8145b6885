export type JobStatus = "queued" | "running" | "completed" | "skipped" | "failed";
export type RequestMode = "source" | "binary" | "compare";

export interface ScanJob {
  job_id: string;
  module_path: string;
  version: string;
  suffix: string;
  mode: RequestMode;
  imported_by: number;
  insecure: boolean;
  status: JobStatus;
  created_at: number;
  updated_at: number;
  lease_owner: string | null;
  lease_expires_at: number | null;
  attempt_count: number;
  started_at: number | null;
  completed_at: number | null;
  result_count: number | null;
  error_message: string | null;
}

export interface JobRow {
  job_id: string;
  module_path: string;
  version: string;
  suffix: string;
  mode: string;
  imported_by: number;
  insecure: number;
  status: string;
  created_at: number;
  updated_at: number;
  lease_owner: string | null;
  lease_expires_at: number | null;
  attempt_count: number;
  started_at: number | null;
  completed_at: number | null;
  result_count: number | null;
  error_message: string | null;
}

export interface ResultRow {
  result_id: string;
  created_at: number;
  module_path: string;
  version: string;
  suffix: string;
  sort_version: string;
  imported_by: number;
  error: string;
  error_category: string;
  commit_time: number | null;
  scan_seconds: number;
  build_seconds: number | null;
  scan_memory: number;
  scan_mode: string;
  go_version: string | null;
  worker_version: string | null;
  schema_version: string | null;
  vulndb_last_modified: string | null;
}

export interface VulnRow {
  result_id: string;
  ordinal: number;
  id: string;
  package_path: string;
  module_path: string;
  version: string;
}
