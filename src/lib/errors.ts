import type { ScanStats } from "./stats.js";

export type ErrorCategory =
  | "TIMEOUT"
  | "MEMORY_LIMIT"
  | "BUILD_FAILURE"
  | "SCANNER_PANIC"
  | "SCANNER_FAILURE"
  | "PROTOCOL_ERROR"
  | "INVARIANT_VIOLATION"
  | "MODULE_NOT_FOUND"
  | "SANDBOX_FAILURE"
  | "UNKNOWN";

// A stored result with one of these categories is scanned again even when nothing changed.
export const RETRYABLE_CATEGORIES: ReadonlySet<string> = new Set<ErrorCategory>([
  "TIMEOUT",
  "MEMORY_LIMIT",
  "SANDBOX_FAILURE",
  "UNKNOWN"
]);

export class MalformedMessageError extends Error {
  override name = "MalformedMessageError";
}

export class TruncatedStreamError extends Error {
  override name = "TruncatedStreamError";
}

/** Programmer error: a caller broke a precondition. */
export class InvariantViolation extends Error {
  override name = "InvariantViolation";
}

export class ModuleNotFoundError extends Error {
  override name = "ModuleNotFoundError";
}

export class SandboxError extends Error {
  override name = "SandboxError";
}

export class ScannerExecutionError extends Error {
  override name = "ScannerExecutionError";

  constructor(
    readonly stderr: string,
    readonly exit_code: number | null,
    readonly stats: ScanStats
  ) {
    super(stderr.trim() || `scanner exited with code ${exit_code ?? "unknown"}`);
  }
}

export class ScanTimeoutError extends Error {
  override name = "ScanTimeoutError";

  constructor(
    readonly timeout_ms: number,
    readonly stats: ScanStats
  ) {
    super(`scan timed out after ${timeout_ms}ms`);
  }
}

export class BuildError extends Error {
  override name = "BuildError";

  constructor(
    message: string,
    readonly stats: ScanStats
  ) {
    super(message);
  }
}

const MEMORY_PATTERNS = [/out of memory/i, /signal: killed/i, /cannot allocate memory/i];
const BUILD_PATTERNS = [
  /go\.mod file not found/i,
  /no required module provides package/i,
  /build constraints exclude all go files/i,
  /cannot find (module|package)/i,
  /errors? loading packages?/i,
  /missing go\.sum entry/i,
  /undefined: /
];

export function categorizeError(err: unknown): ErrorCategory {
  if (err instanceof ScanTimeoutError) return "TIMEOUT";
  if (err instanceof MalformedMessageError || err instanceof TruncatedStreamError) return "PROTOCOL_ERROR";
  if (err instanceof InvariantViolation) return "INVARIANT_VIOLATION";
  if (err instanceof ModuleNotFoundError) return "MODULE_NOT_FOUND";
  if (err instanceof SandboxError) return "SANDBOX_FAILURE";
  if (err instanceof BuildError) {
    return MEMORY_PATTERNS.some((re) => re.test(err.message)) ? "MEMORY_LIMIT" : "BUILD_FAILURE";
  }
  if (err instanceof ScannerExecutionError) {
    if (/^panic: /m.test(err.stderr)) return "SCANNER_PANIC";
    if (MEMORY_PATTERNS.some((re) => re.test(err.stderr)) || err.exit_code === 137) return "MEMORY_LIMIT";
    if (BUILD_PATTERNS.some((re) => re.test(err.stderr))) return "BUILD_FAILURE";
    return "SCANNER_FAILURE";
  }
  return "UNKNOWN";
}

export function isRetryableCategory(category: string): boolean {
  return RETRYABLE_CATEGORIES.has(category);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Stats captured before a scan failed, when the error carries them. */
export function statsFromError(err: unknown): ScanStats | null {
  if (err instanceof ScannerExecutionError || err instanceof ScanTimeoutError || err instanceof BuildError) {
    return err.stats;
  }
  return null;
}
