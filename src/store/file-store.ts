import fs from "node:fs";
import { appendFile, mkdir, readdir, readFile, unlink } from "node:fs/promises";
import path from "node:path";
import { ConcurrencyConflictError, StoreError, errorMessage } from "../errors.js";
import type { AjvValidateFn } from "../schema/ajv.js";
import { createRegistry, type RecordSchemaName, type SchemaRegistry } from "../schema/registry.js";
import type { ChangeRecord } from "../types/change.js";
import type { MigrationPlan, SchemaDependents, ServiceCatalogEntry } from "../types/dependency.js";
import type { AuditRecord, BreakingApproval } from "../types/governance.js";
import type { ReviewRequest } from "../types/review.js";
import { atomicWriteJson, errnoCode, withFsLock } from "./fs-lock.js";
import type { Collection, GovernanceStore, Versioned } from "./store.js";

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

const AUDIT_FILE = "audit.jsonl";

function fileNameFor(key: string): string {
  if (key.length === 0) throw new StoreError("Store keys must not be empty");
  // "/" and ":" are escaped, so every key maps to a single file inside the collection dir
  return `${encodeURIComponent(key)}.json`;
}

function isEnvelope(raw: unknown): raw is { version: number; value: unknown } {
  return (
    typeof raw === "object" &&
    raw !== null &&
    "version" in raw &&
    "value" in raw &&
    typeof raw.version === "number" &&
    Number.isInteger(raw.version) &&
    raw.version >= 1
  );
}

/**
 * One JSON file per key: `<root>/<collection>/<encoded key>.json` holding
 * `{ version, value }`. Writes go through a per-key lock file and an atomic
 * rename; reads take no lock and validate against the collection's schema.
 */
export class FileCollection<T> implements Collection<T> {
  private readonly dir: string;

  constructor(
    readonly name: string,
    root: string,
    private readonly validate: AjvValidateFn<T>,
    private readonly describe: (v: AjvValidateFn<T>) => Promise<string>,
    private readonly lockTimeoutMs: number,
  ) {
    this.dir = path.join(root, name);
  }

  async get(key: string): Promise<Versioned<T> | null> {
    return this.load(path.join(this.dir, fileNameFor(key)));
  }

  async list(): Promise<Array<{ key: string; entry: Versioned<T> }>> {
    let files: string[];
    try {
      files = await readdir(this.dir);
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw new StoreError(`Failed to list ${this.name}: ${errorMessage(e)}`, { collection: this.name }, e);
    }

    const out: Array<{ key: string; entry: Versioned<T> }> = [];
    for (const file of files.filter((f) => f.endsWith(".json")).sort()) {
      const entry = await this.load(path.join(this.dir, file));
      if (entry) out.push({ key: decodeURIComponent(file.slice(0, -".json".length)), entry });
    }
    return out;
  }

  async getOrCreate(key: string, init: () => T): Promise<{ entry: Versioned<T>; created: boolean }> {
    const file = path.join(this.dir, fileNameFor(key));
    return this.locked(file, async () => {
      const existing = await this.load(file);
      if (existing) return { entry: existing, created: false };
      const entry: Versioned<T> = { version: 1, value: init() };
      await this.write(file, entry);
      return { entry, created: true };
    });
  }

  async compareAndSwap(key: string, expectedVersion: number, next: T): Promise<Versioned<T>> {
    const file = path.join(this.dir, fileNameFor(key));
    return this.locked(file, async () => {
      const actual = (await this.load(file))?.version ?? 0;
      if (actual !== expectedVersion) {
        throw new ConcurrencyConflictError(this.name, key, expectedVersion, actual === 0 ? null : actual);
      }
      const entry: Versioned<T> = { version: actual + 1, value: next };
      await this.write(file, entry);
      return entry;
    });
  }

  async delete(key: string, expectedVersion: number): Promise<void> {
    const file = path.join(this.dir, fileNameFor(key));
    await this.locked(file, async () => {
      const actual = (await this.load(file))?.version ?? 0;
      if (actual === 0 || actual !== expectedVersion) {
        throw new ConcurrencyConflictError(this.name, key, expectedVersion, actual === 0 ? null : actual);
      }
      await unlink(file);
    });
  }

  private async locked<R>(file: string, fn: () => Promise<R>): Promise<R> {
    await mkdir(this.dir, { recursive: true });
    return withFsLock(`${file}.lock`, this.lockTimeoutMs, fn);
  }

  private async write(file: string, entry: Versioned<T>): Promise<void> {
    if (!this.validate(entry.value)) {
      throw new StoreError(`Refusing to write invalid ${this.name} record: ${await this.describe(this.validate)}`, {
        collection: this.name,
        file,
      });
    }
    await atomicWriteJson(file, entry);
  }

  private async load(file: string): Promise<Versioned<T> | null> {
    let raw: string;
    try {
      raw = await readFile(file, "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return null;
      throw new StoreError(`Failed to read ${file}: ${errorMessage(e)}`, { collection: this.name, file }, e);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new StoreError(`Corrupt record ${file}: ${errorMessage(e)}`, { collection: this.name, file }, e);
    }
    if (!isEnvelope(parsed)) {
      throw new StoreError(`Corrupt record ${file}: missing version envelope`, { collection: this.name, file });
    }
    const value = parsed.value;
    if (!this.validate(value)) {
      throw new StoreError(`Invalid ${this.name} record ${file}: ${await this.describe(this.validate)}`, {
        collection: this.name,
        file,
      });
    }
    return { version: parsed.version, value };
  }
}

export type FileStoreOptions = {
  lockTimeoutMs?: number;
  schemaDir?: string;
};

export class FileStore implements GovernanceStore {
  private constructor(
    readonly root: string,
    readonly changes: Collection<ChangeRecord>,
    readonly reviews: Collection<ReviewRequest>,
    readonly breakingApprovals: Collection<BreakingApproval>,
    readonly dependencies: Collection<SchemaDependents>,
    readonly services: Collection<ServiceCatalogEntry>,
    readonly migrationPlans: Collection<MigrationPlan>,
    private readonly auditValidate: AjvValidateFn<AuditRecord>,
    private readonly lockTimeoutMs: number,
  ) {}

  static async open(root: string, opts: FileStoreOptions = {}): Promise<FileStore> {
    const registry = await createRegistry(opts.schemaDir);
    const lockTimeoutMs = opts.lockTimeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    const absRoot = path.resolve(root);
    fs.mkdirSync(absRoot, { recursive: true });

    async function collection<T>(name: string, schema: RecordSchemaName): Promise<Collection<T>> {
      const validate = await registry.compile<T>(schema);
      return new FileCollection<T>(name, absRoot, validate, (v) => describe(registry, v), lockTimeoutMs);
    }

    return new FileStore(
      absRoot,
      await collection<ChangeRecord>("changes", "change-record"),
      await collection<ReviewRequest>("reviews", "review-request"),
      await collection<BreakingApproval>("breaking_approvals", "breaking-approval"),
      await collection<SchemaDependents>("dependencies", "schema-dependents"),
      await collection<ServiceCatalogEntry>("services", "service-catalog-entry"),
      await collection<MigrationPlan>("migration_plans", "migration-plan"),
      await registry.compile<AuditRecord>("audit-record"),
      lockTimeoutMs,
    );
  }

  async appendAudit(record: AuditRecord): Promise<void> {
    const action = record.action;
    if (!this.auditValidate(record)) {
      throw new StoreError(`Refusing to append invalid audit record for ${action}`, { action });
    }
    const file = path.join(this.root, AUDIT_FILE);
    await withFsLock(`${file}.lock`, this.lockTimeoutMs, () => appendFile(file, JSON.stringify(record) + "\n", "utf8"));
  }

  async readAudit(): Promise<AuditRecord[]> {
    let raw: string;
    try {
      raw = await readFile(path.join(this.root, AUDIT_FILE), "utf8");
    } catch (e) {
      if (errnoCode(e) === "ENOENT") return [];
      throw new StoreError(`Failed to read audit trail: ${errorMessage(e)}`, {}, e);
    }

    const records: AuditRecord[] = [];
    const lines = raw.split("\n");
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line.length === 0) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch (e) {
        console.warn(`[store] Skipping unreadable audit line ${i + 1}: ${errorMessage(e)}`);
        continue;
      }
      if (this.auditValidate(parsed)) records.push(parsed);
      else console.warn(`[store] Skipping invalid audit line ${i + 1}`);
    }
    return records;
  }
}

function describe<T>(registry: SchemaRegistry, validate: AjvValidateFn<T>): Promise<string> {
  return registry.errorsText(validate);
}
