export type ScanStats = {
  scan_seconds: number;
  /** Peak resident memory of the scanner, in kB; 0 where it cannot be measured. */
  scan_memory_kb: number;
  /** Time spent building the binary before a binary-mode scan. */
  build_seconds: number | null;
};

export function emptyStats(): ScanStats {
  return { scan_seconds: 0, scan_memory_kb: 0, build_seconds: null };
}
