import { ConcurrencyConflictError } from "../errors.js";
import type { ChangeRecord } from "../types/change.js";
import type { MigrationPlan, SchemaDependents, ServiceCatalogEntry } from "../types/dependency.js";
import type { AuditRecord, BreakingApproval } from "../types/governance.js";
import type { ReviewRequest } from "../types/review.js";
import type { Collection, GovernanceStore, Versioned } from "./store.js";

/**
 * In-process collection. Each compare-and-swap checks and writes without an
 * intervening await, so it is atomic with respect to other callers.
 * Values are cloned on the way in and out.
 */
export class MemoryCollection<T> implements Collection<T> {
  private readonly entries = new Map<string, Versioned<T>>();

  constructor(readonly name: string) {}

  async get(key: string): Promise<Versioned<T> | null> {
    const entry = this.entries.get(key);
    return entry ? structuredClone(entry) : null;
  }

  async list(): Promise<Array<{ key: string; entry: Versioned<T> }>> {
    return [...this.entries].map(([key, entry]) => ({ key, entry: structuredClone(entry) }));
  }

  async getOrCreate(key: string, init: () => T): Promise<{ entry: Versioned<T>; created: boolean }> {
    const existing = this.entries.get(key);
    if (existing) return { entry: structuredClone(existing), created: false };
    const entry: Versioned<T> = { version: 1, value: structuredClone(init()) };
    this.entries.set(key, entry);
    return { entry: structuredClone(entry), created: true };
  }

  async compareAndSwap(key: string, expectedVersion: number, next: T): Promise<Versioned<T>> {
    const actual = this.entries.get(key)?.version ?? 0;
    if (actual !== expectedVersion) {
      throw new ConcurrencyConflictError(this.name, key, expectedVersion, actual === 0 ? null : actual);
    }
    const entry: Versioned<T> = { version: actual + 1, value: structuredClone(next) };
    this.entries.set(key, entry);
    return structuredClone(entry);
  }

  async delete(key: string, expectedVersion: number): Promise<void> {
    const actual = this.entries.get(key)?.version ?? 0;
    if (actual === 0 || actual !== expectedVersion) {
      throw new ConcurrencyConflictError(this.name, key, expectedVersion, actual === 0 ? null : actual);
    }
    this.entries.delete(key);
  }
}

export class MemoryStore implements GovernanceStore {
  readonly changes = new MemoryCollection<ChangeRecord>("changes");
  readonly reviews = new MemoryCollection<ReviewRequest>("reviews");
  readonly breakingApprovals = new MemoryCollection<BreakingApproval>("breaking_approvals");
  readonly dependencies = new MemoryCollection<SchemaDependents>("dependencies");
  readonly services = new MemoryCollection<ServiceCatalogEntry>("services");
  readonly migrationPlans = new MemoryCollection<MigrationPlan>("migration_plans");

  private readonly audit: AuditRecord[] = [];

  async appendAudit(record: AuditRecord): Promise<void> {
    this.audit.push(structuredClone(record));
  }

  async readAudit(): Promise<AuditRecord[]> {
    return structuredClone(this.audit);
  }
}
