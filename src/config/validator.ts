import { ConfigurationError } from "../errors.js";
import { createRegistry } from "../schema/registry.js";
import type { GovernanceConfig } from "../types/config.js";
import { loadConfigTree } from "./loader.js";

export type ConfigValidationResult =
  | { valid: true; config: GovernanceConfig; errors: null }
  | { valid: false; config: null; errors: string };

/** Validate a loaded config tree against governance-config.schema.json. */
export async function validateConfig(tree: unknown, schemaDir?: string): Promise<ConfigValidationResult> {
  const registry = await createRegistry(schemaDir);
  const validate = await registry.compile<GovernanceConfig>("governance-config");
  if (validate(tree)) return { valid: true, config: tree, errors: null };
  return { valid: false, config: null, errors: await registry.errorsText(validate) };
}

/** Load, merge and validate; throws ConfigurationError when the result is invalid. */
export async function loadConfig(opts: { env?: string; configDir?: string; schemaDir?: string } = {}): Promise<GovernanceConfig> {
  const tree = loadConfigTree(opts.env, opts.configDir);
  const res = await validateConfig(tree, opts.schemaDir);
  if (!res.valid) {
    throw new ConfigurationError(`Invalid governance configuration: ${res.errors}`, {
      env: opts.env ?? null,
      config_dir: opts.configDir ?? null,
    });
  }
  return res.config;
}
