import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ModuleNotFoundError } from "./errors.js";

export type PreparedModule = {
  dir: string;
  commit_time: Date | null;
};

export interface ModuleSource {
  prepare(module_path: string, version: string): PreparedModule;
}

const InfoSchema = z.object({
  Version: z.string(),
  Time: z.string().datetime({ offset: true }).optional()
});

/**
 * Escapes a module path the way the Go module cache does: every upper-case letter becomes "!"
 * followed by its lower-case form.
 */
export function escapeModulePath(modulePath: string): string {
  return modulePath.replace(/[A-Z]/g, (c) => "!" + c.toLowerCase());
}

/** Resolves modules already extracted in a Go module cache (GOMODCACHE layout). */
export class ModuleCacheSource implements ModuleSource {
  constructor(private readonly root: string) {}

  prepare(module_path: string, version: string): PreparedModule {
    const root = path.resolve(this.root);
    const escaped = escapeModulePath(module_path);
    const dir = path.resolve(root, `${escaped}@${escapeModulePath(version)}`);
    if (!dir.startsWith(root + path.sep)) {
      throw new ModuleNotFoundError(`module path ${module_path}@${version} escapes the module cache`);
    }
    if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
      throw new ModuleNotFoundError(`module ${module_path}@${version} is not in the module cache`);
    }
    return { dir, commit_time: this.readCommitTime(root, escaped, version) };
  }

  private readCommitTime(root: string, escaped: string, version: string): Date | null {
    const infoFile = path.join(root, "cache", "download", escaped, "@v", `${escapeModulePath(version)}.info`);
    if (!fs.existsSync(infoFile)) return null;
    const parsed = InfoSchema.safeParse(JSON.parse(fs.readFileSync(infoFile, "utf8")));
    if (!parsed.success || !parsed.data.Time) return null;
    return new Date(parsed.data.Time);
  }
}
