import fs from "node:fs";
import path from "node:path";
import { defaultSchemaDir } from "../paths.js";
import { loadAjv, type AjvValidateFn, type AjvInstance } from "./ajv.js";

export type SchemaEntry = {
  name: string;
  version: string;
  filePath: string;
  schema: unknown;
};

/** Record schemas the store and the `validate` command rely on. */
export const RECORD_SCHEMAS = [
  "audit-record",
  "breaking-approval",
  "change-record",
  "governance-config",
  "migration-plan",
  "review-request",
  "schema-dependents",
  "service-catalog-entry",
] as const;

export type RecordSchemaName = (typeof RECORD_SCHEMAS)[number];

/**
 * Discovers and loads every JSON Schema in a directory.
 * Provides compile-on-demand validation functions.
 */
export class SchemaRegistry {
  private entries = new Map<string, SchemaEntry>();
  private validators = new Map<string, AjvValidateFn>();
  private ajv: AjvInstance | null = null;

  constructor(private readonly schemaDir: string) {}

  /** Discover all *.schema.json files in the schema directory. */
  async load(): Promise<void> {
    if (!fs.existsSync(this.schemaDir)) {
      throw new Error(`Schema directory not found: ${this.schemaDir}`);
    }

    const files = fs.readdirSync(this.schemaDir).filter((f) => f.endsWith(".schema.json"));

    for (const file of files) {
      const filePath = path.join(this.schemaDir, file);
      const schema: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));

      // "change-record.schema.json" → "change-record"
      const name = file.replace(/\.schema\.json$/, "");
      this.entries.set(name, { name, version: extractVersion(schema) ?? "1.0.0", filePath, schema });
    }

    this.ajv = await loadAjv();
  }

  get(name: string): SchemaEntry | undefined {
    return this.entries.get(name);
  }

  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  /** Name → version map. */
  versions(): Record<string, string> {
    const result: Record<string, string> = {};
    for (const [name, entry] of this.entries) {
      result[name] = entry.version;
    }
    return result;
  }

  /** Names from RECORD_SCHEMAS with no schema file in the directory. */
  missing(): string[] {
    return RECORD_SCHEMAS.filter((name) => !this.entries.has(name));
  }

  /**
   * Compile a validator that narrows to the record type the named schema describes.
   * Not cached: callers hold on to the result.
   */
  async compile<T>(name: RecordSchemaName): Promise<AjvValidateFn<T>> {
    const entry = this.entries.get(name);
    if (!entry) throw new Error(`Schema not found: ${name}`);
    const ajv = await this.instance();
    return ajv.compile<T>(entry.schema);
  }

  /** Validate data against a named schema. */
  async validate(name: string, data: unknown): Promise<{ valid: boolean; errors: string | null }> {
    const ajv = await this.instance();
    let validate = this.validators.get(name);
    if (!validate) {
      const entry = this.entries.get(name);
      if (!entry) throw new Error(`Schema not found: ${name}`);
      validate = ajv.compile(entry.schema);
      this.validators.set(name, validate);
    }

    const valid = validate(data);
    return { valid, errors: valid ? null : ajv.errorsText(validate.errors) };
  }

  /** Text of the last failure of a validator compiled by this registry. */
  async errorsText(validate: AjvValidateFn<unknown>): Promise<string> {
    const ajv = await this.instance();
    return ajv.errorsText(validate.errors);
  }

  private async instance(): Promise<AjvInstance> {
    if (!this.ajv) this.ajv = await loadAjv();
    return this.ajv;
  }
}

function extractVersion(schema: unknown): string | null {
  if (typeof schema !== "object" || schema === null) return null;
  const version: unknown = Reflect.get(schema, "version");
  if (typeof version === "string") return version;

  // "...@1.0.0" in $id
  const id: unknown = Reflect.get(schema, "$id");
  if (typeof id === "string") {
    const m = /@(\d+\.\d+\.\d+)/.exec(id);
    if (m) return m[1];
  }

  return null;
}

export async function createRegistry(schemaDir?: string): Promise<SchemaRegistry> {
  const registry = new SchemaRegistry(schemaDir ?? defaultSchemaDir());
  await registry.load();
  return registry;
}
