import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const BooleanFromEnv = z.preprocess((value) => {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true" || normalized === "1" || normalized === "yes" || normalized === "on") return true;
    if (normalized === "false" || normalized === "0" || normalized === "no" || normalized === "off") return false;
  }
  return value;
}, z.boolean());

/** Finds a file shipped at the project root, from either `src/` or `dist/src/`. */
export function resolveProjectFile(...segments: string[]): string {
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const candidates = [path.resolve(moduleDir, "..", ...segments), path.resolve(moduleDir, "..", "..", ...segments)];
  return candidates.find((p) => fs.existsSync(p)) ?? candidates[0];
}

function resolveDefaultVersion(): string {
  if (process.env.npm_package_version) {
    return process.env.npm_package_version;
  }
  const packageJsonPath = resolveProjectFile("package.json");
  if (!fs.existsSync(packageJsonPath)) return "dev";
  const parsed = z.object({ version: z.string() }).safeParse(JSON.parse(fs.readFileSync(packageJsonPath, "utf8")));
  return parsed.success ? parsed.data.version : "dev";
}

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  BASE_URL: z.string().url().default("http://localhost:8080"),

  SQLITE_PATH: z.string().default("./vulnscan.sqlite"),
  MIGRATIONS_DIR: z.string().default(resolveProjectFile("migrations")),

  SCANNER_PATH: z.string().min(1).default("govulncheck"),
  TOOLCHAIN_PATH: z.string().min(1).default("go"),
  VULNDB_DIR: z.string().default("./vulndb"),
  MODULES_DIR: z.string().default("./modcache"),
  SCRATCH_DIR: z.string().default(path.join(os.tmpdir(), "vulnscan")),
  SANDBOX_COMMAND: z.string().optional(),
  ALLOW_INSECURE: BooleanFromEnv.default(false),
  SCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  BUILD_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),
  MEMORY_PROBE: z.enum(["auto", "proc", "none"]).default("auto"),
  WORKER_VERSION: z.string().optional(),

  TRUST_PROXY: BooleanFromEnv.default(false),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  HTTP_JSON_BODY_LIMIT_BYTES: z.coerce.number().int().positive().default(5 * 1024 * 1024),

  WORKER_POLL_MS: z.coerce.number().int().positive().default(500),
  WORKER_LEASE_MS: z.coerce.number().int().positive().default(120_000),
  WORKER_CONCURRENCY: z.coerce.number().int().positive().default(2),
  VULNSCAN_ROLE: z.enum(["api", "worker", "all"]).default("api"),

  VERSION: z.string().default(resolveDefaultVersion())
});

type ParsedEnv = z.infer<typeof EnvSchema>;

export type AppConfig = Omit<ParsedEnv, "SANDBOX_COMMAND" | "WORKER_VERSION"> & {
  /** Sandbox executable followed by its leading arguments; null runs every scan directly. */
  SANDBOX_COMMAND: string[] | null;
  WORKER_VERSION: string;
};

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid environment: ${parsed.error.message}`);
  }

  const sandbox = (parsed.data.SANDBOX_COMMAND ?? "")
    .split(/\s+/)
    .map((part) => part.trim())
    .filter(Boolean);
  if (sandbox.length === 0 && !parsed.data.ALLOW_INSECURE) {
    throw new Error("Invalid environment: SANDBOX_COMMAND must be set unless ALLOW_INSECURE=true");
  }

  return {
    ...parsed.data,
    SANDBOX_COMMAND: sandbox.length > 0 ? sandbox : null,
    WORKER_VERSION: parsed.data.WORKER_VERSION?.trim() || parsed.data.VERSION
  };
}
