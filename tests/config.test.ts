import { describe, expect, test } from "vitest";
import { loadConfig } from "../src/config.js";

describe("loadConfig", () => {
  test("requires a sandbox unless insecure scans are allowed", () => {
    expect(() => loadConfig({})).toThrow("Invalid environment: SANDBOX_COMMAND must be set unless ALLOW_INSECURE=true");
    expect(() => loadConfig({ SANDBOX_COMMAND: "   " })).toThrow("SANDBOX_COMMAND must be set");
    expect(loadConfig({ ALLOW_INSECURE: "yes" }).SANDBOX_COMMAND).toBeNull();
  });

  test("splits the sandbox command into executable and arguments", () => {
    const config = loadConfig({ SANDBOX_COMMAND: "/usr/bin/runsc  --rootless do" });
    expect(config.SANDBOX_COMMAND).toEqual(["/usr/bin/runsc", "--rootless", "do"]);
    expect(config.ALLOW_INSECURE).toBe(false);
  });

  test("applies defaults and coerces numbers", () => {
    const config = loadConfig({ ALLOW_INSECURE: "true", PORT: "9090", WORKER_CONCURRENCY: "4", VERSION: "1.4.0" });
    expect(config.PORT).toBe(9090);
    expect(config.WORKER_CONCURRENCY).toBe(4);
    expect(config.WORKER_LEASE_MS).toBe(120_000);
    expect(config.SCANNER_PATH).toBe("govulncheck");
    expect(config.MEMORY_PROBE).toBe("auto");
    expect(config.VULNSCAN_ROLE).toBe("api");
    expect(config.WORKER_VERSION).toBe("1.4.0");
  });

  test("an explicit worker version wins over the release version", () => {
    expect(loadConfig({ ALLOW_INSECURE: "1", VERSION: "1.4.0", WORKER_VERSION: " scan-7 " }).WORKER_VERSION).toBe("scan-7");
  });

  test("rejects invalid values", () => {
    expect(() => loadConfig({ ALLOW_INSECURE: "maybe" })).toThrow(/^Invalid environment/);
    expect(() => loadConfig({ ALLOW_INSECURE: "true", PORT: "-1" })).toThrow(/^Invalid environment/);
    expect(() => loadConfig({ ALLOW_INSECURE: "true", MEMORY_PROBE: "cgroup" })).toThrow(/^Invalid environment/);
  });
});
