import { z } from "zod";

export type ModuleVersion = {
  module_path: string;
  version: string;
};

const MODULE_PATH = /^[A-Za-z0-9.~_+-]+(\/[A-Za-z0-9.~_+-]+)*$/;
const VERSION = /^v[0-9A-Za-z.+-]+$/;

export class RequestError extends Error {
  override name = "RequestError";
}

/**
 * Parses a module version from a URL path in one of the forms the module proxy accepts:
 * `<module>/@v/<version>`, `<module>@<version>` or `<module>/@latest`.
 */
export function parseModuleUrlPath(urlPath: string): ModuleVersion {
  const trimmed = urlPath.replace(/^\/+/, "").replace(/\/+$/, "");
  let modulePath: string;
  let version: string;

  const proxyForm = trimmed.indexOf("/@v/");
  if (proxyForm >= 0) {
    modulePath = trimmed.slice(0, proxyForm);
    version = trimmed.slice(proxyForm + "/@v/".length);
  } else if (trimmed.endsWith("/@latest")) {
    throw new RequestError("@latest cannot be resolved here; request an explicit version");
  } else {
    const at = trimmed.lastIndexOf("@");
    if (at <= 0) {
      throw new RequestError(`invalid module path ${JSON.stringify(urlPath)}: missing version`);
    }
    modulePath = trimmed.slice(0, at);
    version = trimmed.slice(at + 1);
  }

  if (!MODULE_PATH.test(modulePath) || modulePath.split("/").some((seg) => seg === "." || seg === "..")) {
    throw new RequestError(`invalid module path ${JSON.stringify(modulePath)}`);
  }
  if (!VERSION.test(version)) {
    throw new RequestError(`invalid version ${JSON.stringify(version)}`);
  }
  return { module_path: modulePath, version };
}

const BooleanParam = z
  .enum(["true", "false", "1", "0", ""])
  .optional()
  .transform((v) => v === "true" || v === "1");

export const ScanQuerySchema = z.object({
  importedby: z.coerce.number({ required_error: 'missing "importedby" query param' }).int().nonnegative(),
  mode: z.enum(["source", "binary", "compare"]).default("source"),
  insecure: BooleanParam,
  serve: BooleanParam,
  suffix: z.string().max(200).default("")
});

export type ScanQuery = z.infer<typeof ScanQuerySchema>;

export const EnqueueRequestSchema = z
  .object({
    mode: z.enum(["source", "binary", "compare"]).default("source"),
    /** Minimum imported-by count for a module to be queued. */
    min: z.number().int().nonnegative().default(0),
    suffix: z.string().max(200).default(""),
    insecure: z.boolean().default(false),
    modules: z
      .array(
        z
          .object({
            module_path: z.string().regex(MODULE_PATH),
            version: z.string().regex(VERSION),
            imported_by: z.number().int().nonnegative().default(0)
          })
          .strict()
      )
      .min(1)
      .max(10_000)
  })
  .strict();

export type EnqueueRequest = z.infer<typeof EnqueueRequestSchema>;
