import { BuildError, ScanTimeoutError } from "./errors.js";
import { runProcess } from "./process.js";

export interface Toolchain {
  version(): Promise<string>;
  /** Import paths of the main packages under a module directory. */
  listMainPackages(moduleDir: string): Promise<string[]>;
  /** Builds `pkg` into `output_path`; resolves to the build time in seconds. */
  buildBinary(args: { module_dir: string; pkg: string; output_path: string }): Promise<number>;
}

export class GoToolchain implements Toolchain {
  private cachedVersion: Promise<string> | null = null;

  constructor(private readonly opts: { path: string; timeout_ms: number }) {}

  version(): Promise<string> {
    if (!this.cachedVersion) {
      this.cachedVersion = this.run(["env", "GOVERSION"]).then((out) => out.trim());
      this.cachedVersion.catch(() => {
        this.cachedVersion = null;
      });
    }
    return this.cachedVersion;
  }

  async listMainPackages(moduleDir: string): Promise<string[]> {
    const out = await this.run(["list", "-f", '{{if eq .Name "main"}}{{.ImportPath}}{{end}}', "./..."], moduleDir);
    return out
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  async buildBinary(args: { module_dir: string; pkg: string; output_path: string }): Promise<number> {
    const out = await runProcess({
      command: this.opts.path,
      args: ["build", "-o", args.output_path, args.pkg],
      cwd: args.module_dir,
      timeout_ms: this.opts.timeout_ms
    });
    const stats = { scan_seconds: 0, scan_memory_kb: 0, build_seconds: out.seconds };
    if (out.timed_out) throw new ScanTimeoutError(this.opts.timeout_ms, stats);
    if (out.exit_code !== 0) {
      throw new BuildError(out.stderr.trim() || `go build exited with code ${out.exit_code ?? "unknown"}`, stats);
    }
    return out.seconds;
  }

  private async run(args: string[], cwd?: string): Promise<string> {
    const out = await runProcess({ command: this.opts.path, args, cwd, timeout_ms: this.opts.timeout_ms });
    if (out.timed_out || out.exit_code !== 0) {
      const stats = { scan_seconds: 0, scan_memory_kb: 0, build_seconds: null };
      throw new BuildError(`go ${args[0]}: ${out.stderr.trim() || (out.timed_out ? "timed out" : `exit code ${out.exit_code}`)}`, stats);
    }
    return out.stdout;
  }
}
