import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "@argroute/sdk";
import { validateInput } from "@argroute/shared";

const __dirname = dirname(fileURLToPath(import.meta.url));

const PackageInfoSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1),
});

export type PackageInfo = z.infer<typeof PackageInfoSchema>;

/** Name and version from a package.json; defaults to the demo's own. */
export function readPackageInfo(pkgPath = resolve(__dirname, "../../package.json")): PackageInfo {
  const raw: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  const result = validateInput(PackageInfoSchema, raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid package.json at ${pkgPath}: ${result.error}`);
  }
  return result.data;
}
