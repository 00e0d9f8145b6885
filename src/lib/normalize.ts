import type { Finding } from "../protocol/messages.js";
import { InvariantViolation } from "./errors.js";

export type Vuln = {
  id: string;
  package_path: string;
  module_path: string;
  version: string;
  /** True when the vulnerable symbol is reachable, false when its package is only imported. Not persisted. */
  called: boolean;
};

export function convertFinding(finding: Finding): Vuln {
  const frame = finding.trace[0];
  if (!frame) {
    throw new InvariantViolation(`finding ${finding.osv || "(no id)"} has an empty trace`);
  }
  return {
    id: finding.osv,
    package_path: frame.package ?? "",
    module_path: frame.module,
    version: frame.version ?? "",
    called: Boolean(frame.function)
  };
}

/** Collapses vulns sharing a persisted key, keeping first-seen order. */
export function dedupeVulns(vulns: Vuln[]): Vuln[] {
  const byKey = new Map<string, Vuln>();
  for (const v of vulns) {
    const key = [v.id, v.package_path, v.module_path, v.version].join("\u0000");
    const seen = byKey.get(key);
    if (seen) {
      seen.called = seen.called || v.called;
      continue;
    }
    byKey.set(key, { ...v });
  }
  return [...byKey.values()];
}
