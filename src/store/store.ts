import { ConcurrencyConflictError } from "../errors.js";
import type { ChangeRecord } from "../types/change.js";
import type { MigrationPlan, SchemaDependents, ServiceCatalogEntry } from "../types/dependency.js";
import type { AuditRecord, BreakingApproval } from "../types/governance.js";
import type { ReviewRequest } from "../types/review.js";

/** Logical persistence contract. Versions start at 1; 0 means "absent". */
export type Versioned<T> = {
  version: number;
  value: T;
};

export interface Collection<T> {
  readonly name: string;
  get(key: string): Promise<Versioned<T> | null>;
  list(): Promise<Array<{ key: string; entry: Versioned<T> }>>;
  /** Insert `init()` unless the key exists; never overwrites. */
  getOrCreate(key: string, init: () => T): Promise<{ entry: Versioned<T>; created: boolean }>;
  /**
   * Replace the value if the stored version equals `expectedVersion`
   * (0 inserts a new key). Throws ConcurrencyConflictError otherwise.
   */
  compareAndSwap(key: string, expectedVersion: number, next: T): Promise<Versioned<T>>;
  /** Remove the entry if its stored version equals `expectedVersion`. Throws ConcurrencyConflictError otherwise. */
  delete(key: string, expectedVersion: number): Promise<void>;
}

export interface GovernanceStore {
  readonly changes: Collection<ChangeRecord>;
  readonly reviews: Collection<ReviewRequest>;
  readonly breakingApprovals: Collection<BreakingApproval>;
  readonly dependencies: Collection<SchemaDependents>;
  readonly services: Collection<ServiceCatalogEntry>;
  readonly migrationPlans: Collection<MigrationPlan>;
  appendAudit(record: AuditRecord): Promise<void>;
  readAudit(): Promise<AuditRecord[]>;
}

export const DEFAULT_MAX_RETRIES = 5;

/**
 * `null` from a mutation leaves the entry untouched (no write, no version bump).
 * Mutations may run more than once and must not have side effects.
 */
export type Mutation<T> = (current: T | null) => T | null;

export type MutateResult<T> = {
  value: T | null;
  version: number;
  written: boolean;
};

/**
 * Optimistic read-modify-write: read, apply, compare-and-swap, and on a lost
 * race re-read and re-apply. Gives up after `maxRetries` conflicts.
 */
export async function mutate<T>(
  collection: Collection<T>,
  key: string,
  fn: Mutation<T>,
  maxRetries = DEFAULT_MAX_RETRIES,
): Promise<MutateResult<T>> {
  let attempt = 0;
  for (;;) {
    const current = await collection.get(key);
    const next = fn(current ? current.value : null);
    if (next === null) {
      return { value: current ? current.value : null, version: current ? current.version : 0, written: false };
    }

    try {
      const stored = await collection.compareAndSwap(key, current ? current.version : 0, next);
      return { value: stored.value, version: stored.version, written: true };
    } catch (e) {
      if (!(e instanceof ConcurrencyConflictError)) throw e;
      attempt++;
      if (attempt >= maxRetries) throw e;
      console.warn(`[store] ${collection.name}/${key}: ${e.message}, retrying (${attempt}/${maxRetries})`);
    }
  }
}
