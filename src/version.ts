/**
 * Package version, read from package.json at startup
 */
import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { parseJsonSafe } from "./utils/validation.js";

const PackageJsonSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
});

const PACKAGE_NAME = "intake-engine";

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function findPackageVersion(): string {
  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 10; i++) {
    let content: string | undefined;
    try {
      content = readFileSync(join(dir, "package.json"), "utf-8");
    } catch (error) {
      if (!isNotFound(error)) throw error;
    }
    if (content !== undefined) {
      const pkg = parseJsonSafe(content, PackageJsonSchema);
      if (pkg.success && pkg.data.name === PACKAGE_NAME) return pkg.data.version;
    }
    dir = dirname(dir);
  }
  return "0.0.0";
}

export const VERSION: string = findPackageVersion();
