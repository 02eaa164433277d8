import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

let cachedRoot: string | null = null;

/**
 * Directory holding package.json, found by walking up from this module.
 * Resolves the same way from `src/` under vitest and from `dist/src/` after a build.
 */
export function packageRoot(): string {
  if (cachedRoot) return cachedRoot;
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (!fs.existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) throw new Error("package.json not found above " + fileURLToPath(import.meta.url));
    dir = parent;
  }
  cachedRoot = dir;
  return dir;
}

export const defaultConfigDir = (): string => path.join(packageRoot(), "config");
export const defaultSchemaDir = (): string => path.join(packageRoot(), "schemas");
