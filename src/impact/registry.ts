import { DependencyAnalysisError } from "../errors.js";
import { mutate, DEFAULT_MAX_RETRIES, type GovernanceStore } from "../store/store.js";
import type {
  DependencyKind,
  DependencyStrength,
  SchemaDependents,
  ServiceCatalogEntry,
  ServiceDependency,
  UsagePattern,
} from "../types/dependency.js";
import type { ImpactTier } from "../types/governance.js";

export type RegisterDependencyInput = {
  service_name: string;
  service_repository?: string;
  dependency_type?: DependencyKind;
  usage_pattern?: UsagePattern;
  strength?: DependencyStrength;
  team_owner?: string | null;
  schema_files?: string[];
  migration_complexity?: ImpactTier;
  contact?: string | null;
};

export type RegisterServiceInput = {
  system?: string;
  team_owner?: string | null;
  schema_dependencies?: string[];
  metadata?: Record<string, string>;
};

/** A service's registration on one schema, as seen from the consumer side. */
export type ConsumedSchema = {
  schema_target: string;
  dependency: ServiceDependency;
};

/**
 * Read-only view of the registry: the forward index as stored, the backward
 * index (consumer → schemas) derived from it, and the service catalog.
 */
export type RegistrySnapshot = {
  forward: ReadonlyMap<string, readonly ServiceDependency[]>;
  backward: ReadonlyMap<string, readonly ConsumedSchema[]>;
  catalog: ReadonlyMap<string, ServiceCatalogEntry>;
};

export function buildSnapshot(rows: readonly SchemaDependents[], catalog: readonly ServiceCatalogEntry[]): RegistrySnapshot {
  const forward = new Map<string, ServiceDependency[]>();
  const backward = new Map<string, ConsumedSchema[]>();
  for (const row of rows) {
    forward.set(row.schema_target, row.dependents);
    for (const dependency of row.dependents) {
      const consumed = backward.get(dependency.service_name) ?? [];
      consumed.push({ schema_target: row.schema_target, dependency });
      backward.set(dependency.service_name, consumed);
    }
  }
  return { forward, backward, catalog: new Map(catalog.map((e) => [e.service_name, e])) };
}

export class DependencyRegistry {
  private readonly clock: () => Date;
  private readonly maxRetries: number;

  constructor(
    private readonly store: GovernanceStore,
    opts: { clock?: () => Date; maxRetries?: number } = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /** Upsert by service name: re-registering a service on the same schema replaces it in place. */
  async registerServiceDependency(schemaTarget: string, input: RegisterDependencyInput): Promise<ServiceDependency> {
    if (!input.service_name.trim()) throw new DependencyAnalysisError("service_name is required", { schema_target: schemaTarget });

    const dependency: ServiceDependency = {
      service_name: input.service_name,
      service_repository: input.service_repository ?? "",
      dependency_type: input.dependency_type ?? "direct",
      usage_pattern: input.usage_pattern ?? "consumer",
      strength: input.strength ?? "medium",
      team_owner: input.team_owner ?? null,
      schema_files: input.schema_files ?? [],
      migration_complexity: input.migration_complexity ?? "medium",
      contact: input.contact ?? null,
      registered_at: this.clock().toISOString(),
    };

    let updated = false;
    await mutate(
      this.store.dependencies,
      schemaTarget,
      (current) => {
        const dependents = [...(current?.dependents ?? [])];
        const idx = dependents.findIndex((d) => d.service_name === dependency.service_name);
        updated = idx >= 0;
        if (updated) dependents[idx] = dependency;
        else dependents.push(dependency);
        return { schema_target: schemaTarget, dependents };
      },
      this.maxRetries,
    );

    console.info(`[deps] ${updated ? "Updated" : "Registered"} dependency: ${dependency.service_name} -> ${schemaTarget}`);
    return dependency;
  }

  /** Add or replace a service catalog entry. */
  async registerService(serviceName: string, input: RegisterServiceInput = {}): Promise<ServiceCatalogEntry> {
    const now = this.clock().toISOString();
    const res = await mutate(
      this.store.services,
      serviceName,
      (current) => ({
        service_name: serviceName,
        system: input.system ?? current?.system ?? "unknown",
        team_owner: input.team_owner ?? current?.team_owner ?? null,
        schema_dependencies: input.schema_dependencies ?? current?.schema_dependencies ?? [],
        metadata: { ...(current?.metadata ?? {}), ...(input.metadata ?? {}) },
        registered_at: current?.registered_at ?? now,
      }),
      this.maxRetries,
    );
    if (!res.value) throw new DependencyAnalysisError(`Failed to register service ${serviceName}`);
    console.info(`[deps] Registered service: ${serviceName}`);
    return res.value;
  }

  async snapshot(): Promise<RegistrySnapshot> {
    const rows = await this.store.dependencies.list();
    const services = await this.store.services.list();
    return buildSnapshot(
      rows.map((r) => r.entry.value),
      services.map((s) => s.entry.value),
    );
  }

  /** Catalog entry plus every schema the service is registered against. */
  async describeService(serviceName: string): Promise<{ catalog: ServiceCatalogEntry | null; consumes: ConsumedSchema[] }> {
    const snap = await this.snapshot();
    const catalog = snap.catalog.get(serviceName) ?? null;
    const consumes = [...(snap.backward.get(serviceName) ?? [])];
    if (!catalog && consumes.length === 0) {
      throw new DependencyAnalysisError(`Service not registered: ${serviceName}`, { service_name: serviceName });
    }
    return { catalog, consumes };
  }
}
