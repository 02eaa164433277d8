import { beforeEach, describe, expect, it, vi } from "vitest";
import { DependencyAnalysisError } from "../src/errors.js";
import { buildDependencyGraph, complexityScore } from "../src/impact/graph.js";
import { DependencyRegistry, buildSnapshot } from "../src/impact/registry.js";
import { MemoryStore } from "../src/store/memory-store.js";
import type { DependencyStrength, ServiceDependency } from "../src/types/dependency.js";
import { T0, dependency as dep, fixedClock } from "./helpers.js";

const PAYMENTS = "buf.build/acme/payments";
const ORDERS = "buf.build/acme/orders";

describe("dependency registry", () => {
  let store: MemoryStore;
  let registry: DependencyRegistry;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    store = new MemoryStore();
    registry = new DependencyRegistry(store, { clock: fixedClock() });
    return () => vi.restoreAllMocks();
  });

  it("fills defaults for a bare registration", async () => {
    const registered = await registry.registerServiceDependency(PAYMENTS, { service_name: "ledger" });
    expect(registered).toEqual({
      service_name: "ledger",
      service_repository: "",
      dependency_type: "direct",
      usage_pattern: "consumer",
      strength: "medium",
      team_owner: null,
      schema_files: [],
      migration_complexity: "medium",
      contact: null,
      registered_at: T0,
    });
    expect(console.info).toHaveBeenCalledWith(`[deps] Registered dependency: ledger -> ${PAYMENTS}`);
  });

  it("replaces a service registered twice on the same schema", async () => {
    await registry.registerServiceDependency(PAYMENTS, { service_name: "ledger", strength: "weak" });
    await registry.registerServiceDependency(PAYMENTS, { service_name: "refunds" });
    await registry.registerServiceDependency(PAYMENTS, { service_name: "ledger", strength: "critical" });

    const row = await store.dependencies.get(PAYMENTS);
    expect(row?.value.dependents.map((d) => [d.service_name, d.strength])).toEqual([
      ["ledger", "critical"],
      ["refunds", "medium"],
    ]);
    expect(console.info).toHaveBeenLastCalledWith(`[deps] Updated dependency: ledger -> ${PAYMENTS}`);
  });

  it("rejects a blank service name", async () => {
    await expect(registry.registerServiceDependency(PAYMENTS, { service_name: "  " })).rejects.toBeInstanceOf(
      DependencyAnalysisError,
    );
  });

  it("keeps earlier catalog fields when re-registering a service", async () => {
    await registry.registerService("ledger", { system: "billing", metadata: { tier: "1" } });
    const updated = await registry.registerService("ledger", { team_owner: "payments", metadata: { oncall: "pager" } });
    expect(updated).toEqual({
      service_name: "ledger",
      system: "billing",
      team_owner: "payments",
      schema_dependencies: [],
      metadata: { tier: "1", oncall: "pager" },
      registered_at: T0,
    });
  });

  it("describes a service from both the catalog and the backward index", async () => {
    await registry.registerServiceDependency(PAYMENTS, { service_name: "ledger" });
    await registry.registerServiceDependency(ORDERS, { service_name: "ledger", strength: "strong" });
    const described = await registry.describeService("ledger");
    expect(described.catalog).toBeNull();
    expect(described.consumes.map((c) => [c.schema_target, c.dependency.strength])).toEqual([
      [PAYMENTS, "medium"],
      [ORDERS, "strong"],
    ]);
    await expect(registry.describeService("ghost")).rejects.toThrow("Service not registered: ghost");
  });
});

describe("dependency graph", () => {
  const now = new Date(T0);

  it("scores three critical dependents across two teams at 10", () => {
    const snapshot = buildSnapshot(
      [
        {
          schema_target: PAYMENTS,
          dependents: [dep("checkout", "critical", "payments"), dep("orders-api", "critical", "orders"), dep("fulfilment", "critical", "orders")],
        },
      ],
      [],
    );
    const graph = buildDependencyGraph(PAYMENTS, snapshot, now);
    expect(graph.metadata).toEqual({
      total_affected_services: 3,
      critical_dependencies: 3,
      teams_affected: 2,
      complexity_score: 10,
    });
  });

  it("follows direct dependents one level to their other schemas", () => {
    const snapshot = buildSnapshot(
      [
        { schema_target: PAYMENTS, dependents: [dep("orders-api", "strong", "orders")] },
        { schema_target: ORDERS, dependents: [dep("orders-api", "medium", "orders"), dep("shipping-worker", "critical", "logistics")] },
      ],
      [],
    );
    const graph = buildDependencyGraph(PAYMENTS, snapshot, now);

    expect(graph.direct_dependencies.map((d) => d.service_name)).toEqual(["orders-api"]);
    expect(graph.transitive_dependencies).toEqual([
      { ...dep("shipping-worker", "weak", "logistics"), dependency_type: "transitive" },
    ]);
    expect(graph.dependency_matrix).toEqual({ [PAYMENTS]: ["orders-api"], "orders-api": [PAYMENTS, ORDERS] });
    // 1 direct + 0.5 transitive + 0.5 for one team
    expect(graph.metadata.complexity_score).toBe(2);
    expect(graph.generated_at).toBe(T0);
  });

  it("scores every path through a shared schema while listing each service once", () => {
    const consumes = (name: string) => ({
      service_name: name,
      system: "commerce",
      team_owner: null,
      schema_dependencies: [PAYMENTS, ORDERS],
      metadata: {},
      registered_at: T0,
    });
    const snapshot = buildSnapshot(
      [
        { schema_target: PAYMENTS, dependents: [dep("checkout", "medium"), dep("refunds", "medium")] },
        { schema_target: ORDERS, dependents: [dep("shipping-worker", "medium")] },
      ],
      [consumes("checkout"), consumes("refunds")],
    );
    const graph = buildDependencyGraph(PAYMENTS, snapshot, now);

    expect(graph.transitive_dependencies.map((d) => d.service_name)).toEqual(["shipping-worker"]);
    // 2 direct + 0.5 for each of the two paths to shipping-worker
    expect(graph.metadata.complexity_score).toBe(3);
    expect(graph.metadata.total_affected_services).toBe(3);
  });

  it("lists catalog schema dependencies ahead of registry entries", () => {
    const snapshot = buildSnapshot(
      [{ schema_target: PAYMENTS, dependents: [dep("orders-api", "medium")] }],
      [
        {
          service_name: "orders-api",
          system: "commerce",
          team_owner: null,
          schema_dependencies: ["buf.build/acme/catalog"],
          metadata: {},
          registered_at: T0,
        },
      ],
    );
    expect(buildDependencyGraph(PAYMENTS, snapshot, now).dependency_matrix["orders-api"]).toEqual([
      "buf.build/acme/catalog",
      PAYMENTS,
    ]);
  });

  it("reports the schemas a service target consumes as reverse dependencies", () => {
    const snapshot = buildSnapshot([{ schema_target: PAYMENTS, dependents: [dep("orders-api", "strong", "orders")] }], []);
    expect(buildDependencyGraph("orders-api", snapshot, now).reverse_dependencies).toEqual([
      { schema_target: PAYMENTS, strength: "strong", team_owner: "orders" },
    ]);
  });

  it("does not match services by substring", () => {
    const snapshot = buildSnapshot([{ schema_target: PAYMENTS, dependents: [dep("orders-api-v2", "strong")] }], []);
    expect(buildDependencyGraph("orders-api", snapshot, now).reverse_dependencies).toEqual([]);
  });

  it("is empty for a target nobody depends on", () => {
    const graph = buildDependencyGraph("buf.build/acme/unused", buildSnapshot([], []), now);
    expect(graph.direct_dependencies).toEqual([]);
    expect(graph.metadata.complexity_score).toBe(0);
  });

  it("never lowers the score when a dependency is added", () => {
    const direct: ServiceDependency[] = [];
    let previous = complexityScore(direct, 0);
    const strengths: DependencyStrength[] = ["weak", "critical", "medium", "critical", "strong"];
    strengths.forEach((strength, i) => {
      direct.push(dep(`svc-${i}`, strength, i % 2 === 0 ? "payments" : `team-${i}`));
      const score = complexityScore(direct, i);
      expect(score).toBeGreaterThanOrEqual(previous);
      previous = score;
    });
  });
});
