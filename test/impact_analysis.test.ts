import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  analyzeCrossSystemImpact,
  analyzeTeamImpacts,
  identifyAffectedServices,
  migrationRecommendations,
  serviceImpact,
} from "../src/impact/analyzer.js";
import { buildDependencyGraph } from "../src/impact/graph.js";
import { buildMigrationPlan, chooseStrategy, migrationPhases, overallRisk } from "../src/impact/migration-plan.js";
import { buildSnapshot, type RegistrySnapshot } from "../src/impact/registry.js";
import { ImpactAnalyzer, analyzeSnapshot } from "../src/impact/service.js";
import { MemoryStore } from "../src/store/memory-store.js";
import type { ServiceCatalogEntry } from "../src/types/dependency.js";
import { T0, breaking, dependency, fixedClock } from "./helpers.js";

const TARGET = "buf.build/acme/payments";
const now = new Date(T0);

function catalog(name: string, system: string): ServiceCatalogEntry {
  return { service_name: name, system, team_owner: null, schema_dependencies: [], metadata: {}, registered_at: T0 };
}

// checkout and reporting are the critical-tier consumers; audit-log has no owner
const snapshot: RegistrySnapshot = buildSnapshot(
  [
    {
      schema_target: TARGET,
      dependents: [
        dependency("checkout", "critical", "payments"),
        dependency("orders-api", "medium", "orders"),
        dependency("audit-log", "weak"),
        dependency("reporting", "strong", "orders"),
      ],
    },
  ],
  [catalog("checkout", "commerce"), catalog("orders-api", "fulfilment")],
);
const graph = buildDependencyGraph(TARGET, snapshot, now);
const changes = [breaking()];

describe("service impact", () => {
  it("is low for every dependent without breaking changes", () => {
    const affected = identifyAffectedServices(graph, []);
    expect(affected.map((a) => a.impact_level)).toEqual(["low", "low", "low", "low"]);
    expect(affected.every((a) => !a.migration_required && !a.testing_required)).toBe(true);
  });

  it("rates dependents by strength and sorts the worst first", () => {
    const affected = identifyAffectedServices(graph, changes);
    expect(affected.map((a) => [a.service_name, a.impact_level])).toEqual([
      ["checkout", "critical"],
      ["reporting", "critical"],
      ["orders-api", "high"],
      ["audit-log", "medium"],
    ]);
  });

  it("requires migration only from direct dependents", () => {
    const optional = serviceImpact({ ...dependency("batch", "strong"), dependency_type: "optional" }, changes);
    expect(optional).toMatchObject({ impact_level: "critical", migration_required: false, testing_required: true });
  });
});

describe("team impact", () => {
  it("groups services by owner and skips unowned services", () => {
    const teams = analyzeTeamImpacts(TARGET, identifyAffectedServices(graph, changes), changes);
    expect(teams.map((t) => t.team_name)).toEqual(["payments", "orders"]);
    expect(teams[0]).toEqual({
      team_name: "payments",
      impact_level: "critical",
      affected_services: ["checkout"],
      required_actions: ["Migrate checkout", "Test checkout"],
      risk_factors: [`Breaking changes in ${TARGET}`, "Service checkout affected"],
      mitigation_strategies: [
        "Prioritize immediate team coordination",
        "Assign dedicated migration lead",
        "Create detailed migration timeline",
        "Prepare rollback plan for each service",
        "Set up monitoring for migration progress",
      ],
      estimated_effort: "medium",
      contact_priority: "urgent",
    });
    expect(teams[1].required_actions).toEqual(["Migrate reporting", "Test reporting", "Migrate orders-api", "Test orders-api"]);
  });

  it("stays quiet without breaking changes", () => {
    const teams = analyzeTeamImpacts(TARGET, identifyAffectedServices(graph, []), []);
    expect(teams.map((t) => [t.team_name, t.impact_level, t.contact_priority])).toEqual([
      ["payments", "low", "normal"],
      ["orders", "low", "normal"],
    ]);
    expect(teams.every((t) => t.required_actions.length === 0 && t.mitigation_strategies.length === 0)).toBe(true);
  });
});

describe("cross-system impact", () => {
  it("collects systems, owners, external services and cascades", () => {
    expect(analyzeCrossSystemImpact(graph, snapshot, changes)).toEqual({
      affected_systems: ["commerce", "fulfilment", "unknown"],
      cross_team_dependencies: { payments: ["checkout"], orders: ["orders-api", "reporting"] },
      external_dependencies: ["audit-log", "reporting"],
      cascade_effects: [
        {
          service: "checkout",
          effect_type: "service_disruption",
          probability: "high",
          impact_scope: "team",
          mitigation: "Coordinate migration for checkout",
        },
        {
          service: "reporting",
          effect_type: "service_disruption",
          probability: "medium",
          impact_scope: "team",
          mitigation: "Coordinate migration for reporting",
        },
      ],
      coordination_requirements: [
        "Cross-system coordination required",
        "External dependency coordination required",
        "Cascade effect monitoring required",
      ],
    });
  });

  it("has no cascade effects without breaking changes", () => {
    expect(analyzeCrossSystemImpact(graph, snapshot, []).cascade_effects).toEqual([]);
  });
});

describe("migration recommendations", () => {
  it("follows criticality, team impact and complexity", () => {
    const teams = analyzeTeamImpacts(TARGET, identifyAffectedServices(graph, changes), changes);
    expect(migrationRecommendations(graph, teams, changes)).toEqual([
      "Exercise extreme caution: 1 critical dependencies identified",
      "Coordinate with 2 high-impact teams before migration",
      "Implement comprehensive testing due to breaking changes",
      "Prepare detailed migration documentation for affected teams",
      "Priority coordination with payments team required",
      "Priority coordination with orders team required",
      "Medium complexity migration - ensure adequate planning time",
    ]);
  });
});

describe("migration plan", () => {
  it("coordinates team by team when a critical dependent exists", () => {
    const analysis = analyzeSnapshot(TARGET, snapshot, changes, now);
    const plan = buildMigrationPlan({
      changeId: "CHG_1",
      graph: analysis.graph,
      teams: analysis.team_impacts,
      crossSystem: analysis.cross_system,
      breaking: changes,
      now,
    });

    expect(plan.strategy).toBe("coordinated");
    expect(plan.phases.map((p) => [p.phase, p.name, p.services])).toEqual([
      [1, "Team payments Migration", ["checkout"]],
      [2, "Team orders Migration", ["orders-api", "reporting"]],
      [3, "Unowned Services Migration", ["audit-log"]],
    ]);
    expect(plan.dependencies_order).toEqual(["checkout", "reporting", "orders-api", "audit-log"]);
    expect(plan.rollback_plan.order).toEqual(["reporting", "audit-log", "orders-api", "checkout"]);
    expect(plan.timeline).toEqual({
      preparation_time: "1-2 days",
      migration_window: "6 hours",
      testing_time: "4-8 hours",
      rollback_window: "1 hour",
      coordination_time: "2-4 hours",
    });
    expect(plan.testing_strategy.critical_test_cases).toEqual([
      "Backward compatibility validation",
      "Breaking change impact verification",
      "Migration data integrity check",
      "Service checkout functionality validation",
      "Service reporting functionality validation",
    ]);
    expect(plan.communication_plan.channels).toEqual(["slack", "email", "teams"]);
    expect(plan.risk_assessment.overall_risk_level).toBe("high");
    expect(plan.risk_assessment.risks.map((r) => r.risk)).toEqual([
      "Critical service disruption",
      "Compatibility issues",
      "Cross-system coordination failure",
    ]);
    expect(plan.generated_at).toBe(T0);
  });

  it("phases a wide non-critical fan-out and drops empty phases", () => {
    const wide = buildSnapshot(
      [{ schema_target: TARGET, dependents: ["a", "b", "c", "d", "e", "f"].map((n) => dependency(n, "medium")) }],
      [],
    );
    const g = buildDependencyGraph(TARGET, wide, now);
    const cross = analyzeCrossSystemImpact(g, wide, []);
    const strategy = chooseStrategy(g, [], cross, []);
    expect(strategy).toBe("phased");
    expect(migrationPhases(strategy, g)).toEqual([
      {
        phase: 1,
        name: "High Impact Services Migration",
        description: "Migrate high impact services",
        services: ["a", "b", "c", "d", "e", "f"],
        team: null,
        duration: "2-4 hours",
        parallel: true,
      },
    ]);
  });

  it("migrates a small low-risk fan-out immediately", () => {
    const small = buildSnapshot([{ schema_target: TARGET, dependents: [dependency("cache", "weak")] }], []);
    const g = buildDependencyGraph(TARGET, small, now);
    const plan = buildMigrationPlan({ changeId: "CHG_2", graph: g, teams: [], crossSystem: analyzeCrossSystemImpact(g, small, []), breaking: [], now });
    expect(plan.strategy).toBe("immediate");
    expect(plan.phases.map((p) => p.name)).toEqual(["Immediate Migration"]);
    expect(plan.timeline.migration_window).toBe("1 hours");
    expect(plan.timeline.coordination_time).toBeUndefined();
    expect(plan.risk_assessment.overall_risk_level).toBe("low");
  });

  it("rates two likely medium risks as medium", () => {
    const likely = { risk: "r", probability: "high", impact: "medium", mitigation: "m" } as const;
    expect(overallRisk([likely])).toBe("low");
    expect(overallRisk([likely, likely])).toBe("medium");
  });
});

describe("impact analyzer", () => {
  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    return () => vi.restoreAllMocks();
  });

  it("stores the plan under the change id and replaces it on regeneration", async () => {
    const store = new MemoryStore();
    const analyzer = new ImpactAnalyzer(store, { clock: fixedClock() });
    await analyzer.registry.registerServiceDependency(TARGET, { service_name: "checkout", strength: "critical", team_owner: "payments" });

    const plan = await analyzer.generateMigrationPlan("CHG_1", TARGET, changes);
    expect(plan.strategy).toBe("coordinated");
    expect(await analyzer.getMigrationPlan("CHG_1")).toEqual(plan);

    await analyzer.generateMigrationPlan("CHG_1", TARGET, []);
    expect((await store.migrationPlans.get("CHG_1"))?.version).toBe(2);
    expect(console.info).toHaveBeenCalledWith("[deps] Saved coordinated migration plan for change CHG_1 (1 phases)");
  });

  it("throws for a change without a plan", async () => {
    const analyzer = new ImpactAnalyzer(new MemoryStore());
    await expect(analyzer.getMigrationPlan("CHG_0")).rejects.toThrow("No migration plan for change CHG_0");
  });

  it("answers the individual questions from one registry", async () => {
    const analyzer = new ImpactAnalyzer(new MemoryStore(), { clock: fixedClock() });
    await analyzer.registry.registerServiceDependency(TARGET, { service_name: "checkout", strength: "strong", team_owner: "payments" });

    expect((await analyzer.analyzeDependencyGraph(TARGET)).metadata.total_affected_services).toBe(1);
    expect((await analyzer.identifyAffectedServices(TARGET, changes))[0].impact_level).toBe("critical");
    expect((await analyzer.analyzeTeamImpacts(TARGET, changes)).map((t) => t.team_name)).toEqual(["payments"]);
    expect((await analyzer.analyzeCrossSystemImpact(TARGET, changes)).external_dependencies).toEqual(["checkout"]);
    expect(await analyzer.getMigrationRecommendations(TARGET, [])).toEqual([]);
  });
});
