import fs from "node:fs";
import path from "node:path";
import YAML from "yaml";
import { ConfigurationError, errorMessage } from "../errors.js";
import { defaultConfigDir } from "../paths.js";

export const ENV_PREFIX = "SCHEMAGOV_";

type Tree = Record<string, unknown>;

function isTree(value: unknown): value is Tree {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Tree, override: Tree): Tree {
  const result: Tree = { ...base };
  for (const [key, val] of Object.entries(override)) {
    const prev = result[key];
    if (isTree(val)) {
      result[key] = deepMerge(isTree(prev) ? prev : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if not found. */
function loadYaml(filePath: string): Tree {
  if (!fs.existsSync(filePath)) return {};
  const raw = fs.readFileSync(filePath, "utf8");
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigurationError(`Failed to parse ${filePath}: ${errorMessage(e)}`, { path: filePath });
  }
  if (parsed === null || parsed === undefined) return {};
  if (!isTree(parsed)) throw new ConfigurationError(`Expected a mapping at the top of ${filePath}`, { path: filePath });
  return parsed;
}

function coerce(value: string): unknown {
  if (value === "true") return true;
  if (value === "false") return false;
  if (/^-?\d+$/.test(value)) return Number(value);
  return value;
}

/**
 * Apply SCHEMAGOV_ prefixed environment variable overrides.
 * A double underscore descends one level:
 * SCHEMAGOV_CLASSIFIER__TIMEOUT_MS → classifier.timeout_ms
 */
export function applyEnvOverrides(config: Tree, env: NodeJS.ProcessEnv = process.env): Tree {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let patch: Tree = { [segments[segments.length - 1]]: coerce(value) };
    for (let i = segments.length - 2; i >= 0; i--) patch = { [segments[i]]: patch };
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered config: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateConfig` before use.
 */
export function loadConfigTree(envName?: string, configDir?: string): Tree {
  const dir = configDir ?? defaultConfigDir();

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged);
}
