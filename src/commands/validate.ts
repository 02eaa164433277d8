import fs from "node:fs";
import path from "node:path";
import { loadConfigTree } from "../config/loader.js";
import { errorMessage } from "../errors.js";
import { defaultSchemaDir } from "../paths.js";
import { isBreakingPolicyValue, ownEntry } from "../policy/resolve.js";
import { createRegistry, type RecordSchemaName, type SchemaRegistry } from "../schema/registry.js";
import type { GovernanceConfig } from "../types/config.js";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export type ValidateResult = { ok: true; warnings: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

/** Store collection directory → schema its records follow. */
const STORE_COLLECTIONS: ReadonlyArray<[string, RecordSchemaName]> = [
  ["changes", "change-record"],
  ["reviews", "review-request"],
  ["breaking_approvals", "breaking-approval"],
  ["dependencies", "schema-dependents"],
  ["services", "service-catalog-entry"],
  ["migration_plans", "migration-plan"],
];

function diag(
  level: Diagnostic["level"],
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

function rel(p: string): string {
  return path.relative(process.cwd(), p) || p;
}

/** Cross-references the schema cannot express. */
function checkPolicyReferences(config: GovernanceConfig): Diagnostic[] {
  const out: Diagnostic[] = [];
  const section = config.schema_governance;

  for (const [key, value] of Object.entries(section.breaking_change_policies)) {
    if (!isBreakingPolicyValue(value)) {
      out.push(
        diag("error", "POLICY_VALUE_INVALID", `Unknown breaking change policy for ${key}: ${value}`, {
          details: { key, value }
        })
      );
    }
  }

  for (const [team, override] of Object.entries(section.team_overrides ?? {})) {
    if (override.review_policy && !ownEntry(section.review_policies, override.review_policy)) {
      out.push(
        diag("error", "POLICY_REF_UNKNOWN", `Team ${team} references unknown review policy: ${override.review_policy}`, {
          details: { team, review_policy: override.review_policy }
        })
      );
    }
    if (config.teams && !Object.hasOwn(config.teams, team)) {
      out.push(diag("warn", "TEAM_UNKNOWN", `Team override for ${team}, which is not in teams`, { details: { team } }));
    }
  }

  if (!ownEntry(section.review_policies, "default")) {
    out.push(diag("warn", "POLICY_DEFAULT_MISSING", "No default review policy; the built-in policy applies"));
  }
  return out;
}

function parseEnvelope(raw: string): unknown {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== "object" || parsed === null || !("version" in parsed) || !("value" in parsed)) {
    throw new Error("missing version envelope");
  }
  return parsed.value;
}

async function validateStore(registry: SchemaRegistry, storeDir: string): Promise<Diagnostic[]> {
  const out: Diagnostic[] = [];

  for (const [collection, schema] of STORE_COLLECTIONS) {
    const dir = path.join(storeDir, collection);
    if (!fs.existsSync(dir)) continue;
    for (const name of fs.readdirSync(dir).filter((f) => f.endsWith(".json")).sort()) {
      const file = path.join(dir, name);
      let value: unknown;
      try {
        value = parseEnvelope(fs.readFileSync(file, "utf8"));
      } catch (e) {
        out.push(diag("error", "STORE_RECORD_CORRUPT", `Corrupt record (${rel(file)}): ${errorMessage(e)}`, { path: file }));
        continue;
      }
      const { valid, errors } = await registry.validate(schema, value);
      if (!valid) {
        out.push(diag("error", "STORE_RECORD_INVALID", `Invalid ${collection} record (${rel(file)}): ${errors}`, { path: file }));
      }
    }
  }

  const auditFile = path.join(storeDir, "audit.jsonl");
  if (fs.existsSync(auditFile)) {
    const lines = fs.readFileSync(auditFile, "utf8").split("\n");
    for (const [i, line] of lines.entries()) {
      if (!line.trim()) continue;
      let record: unknown;
      try {
        record = JSON.parse(line);
      } catch (e) {
        out.push(
          diag("error", "AUDIT_LINE_CORRUPT", `Corrupt audit line ${i + 1}: ${errorMessage(e)}`, { path: auditFile, details: { line: i + 1 } })
        );
        continue;
      }
      const { valid, errors } = await registry.validate("audit-record", record);
      if (!valid) {
        out.push(
          diag("error", "AUDIT_RECORD_INVALID", `Invalid audit record on line ${i + 1}: ${errors}`, { path: auditFile, details: { line: i + 1 } })
        );
      }
    }
  }
  return out;
}

/**
 * Validate the layered configuration and, when a store is given (or the
 * configured one exists), every record in it.
 */
export async function validateAll(opts: {
  configDir: string;
  env?: string;
  storeDir?: string;
  schemaDir?: string;
}): Promise<ValidateResult> {
  const diagnostics: Diagnostic[] = [];

  const configDir = path.resolve(opts.configDir);
  const schemaDir = path.resolve(opts.schemaDir ?? defaultSchemaDir());

  if (!fs.existsSync(configDir)) {
    return { ok: false, errors: [diag("error", "CONFIG_DIR_MISSING", `Config directory not found: ${configDir}`)] };
  }
  if (!fs.existsSync(schemaDir)) {
    return { ok: false, errors: [diag("error", "SCHEMA_DIR_MISSING", `Schema directory not found: ${schemaDir}`)] };
  }

  const registry = await createRegistry(schemaDir);
  const missing = registry.missing();
  if (missing.length > 0) {
    return {
      ok: false,
      errors: missing.map((name) => diag("error", "SCHEMA_MISSING", `Missing schema: ${name}.schema.json`, { path: schemaDir }))
    };
  }

  const basePath = path.join(configDir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    diagnostics.push(diag("error", "CONFIG_BASE_MISSING", `Missing base config: ${rel(basePath)}`, { path: basePath }));
  }
  if (opts.env && !fs.existsSync(path.join(configDir, `${opts.env}.yaml`))) {
    diagnostics.push(diag("warn", "CONFIG_ENV_MISSING", `No config layer for environment ${opts.env}`, { path: configDir }));
  }

  let config: GovernanceConfig | null = null;
  try {
    const tree = loadConfigTree(opts.env, configDir);
    const validateConfig = await registry.compile<GovernanceConfig>("governance-config");
    if (validateConfig(tree)) {
      config = tree;
    } else {
      diagnostics.push(
        diag("error", "CONFIG_INVALID", `Config invalid (${rel(configDir)}): ${await registry.errorsText(validateConfig)}`, {
          path: configDir
        })
      );
    }
  } catch (e) {
    diagnostics.push(diag("error", "CONFIG_READ_FAILED", `Failed to read config (${rel(configDir)}): ${errorMessage(e)}`, { path: configDir }));
  }

  if (config) diagnostics.push(...checkPolicyReferences(config));

  if (opts.storeDir) {
    const storeDir = path.resolve(opts.storeDir);
    if (!fs.existsSync(storeDir)) {
      diagnostics.push(diag("error", "STORE_DIR_MISSING", `Store directory not found: ${storeDir}`, { path: storeDir }));
    } else {
      diagnostics.push(...(await validateStore(registry, storeDir)));
    }
  } else if (config && fs.existsSync(path.resolve(config.store_dir))) {
    diagnostics.push(...(await validateStore(registry, path.resolve(config.store_dir))));
  }

  const errors = diagnostics.filter((d) => d.level === "error");
  if (errors.length > 0) return { ok: false, errors: diagnostics };
  return { ok: true, warnings: diagnostics };
}
