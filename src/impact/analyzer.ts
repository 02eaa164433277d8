import type {
  AffectedService,
  CascadeEffect,
  CrossSystemImpact,
  DependencyGraph,
  ServiceDependency,
  TeamImpact,
} from "../types/dependency.js";
import type { BreakingChange, ImpactLevel } from "../types/governance.js";
import { IMPACT_RANK, isHighImpact, maxImpact } from "./levels.js";
import type { RegistrySnapshot } from "./registry.js";

export function serviceImpact(dep: ServiceDependency, breaking: readonly BreakingChange[]): AffectedService {
  const hasBreaking = breaking.length > 0;
  let impact: ImpactLevel = "low";
  if (hasBreaking && (dep.strength === "critical" || dep.strength === "strong")) impact = "critical";
  else if (hasBreaking && dep.strength === "medium") impact = "high";
  else if (hasBreaking) impact = "medium";

  return {
    service_name: dep.service_name,
    service_repository: dep.service_repository,
    team_owner: dep.team_owner,
    dependency_type: dep.dependency_type,
    usage_pattern: dep.usage_pattern,
    strength: dep.strength,
    impact_level: impact,
    migration_required: hasBreaking && dep.dependency_type === "direct",
    testing_required: hasBreaking,
    migration_complexity: dep.migration_complexity,
  };
}

/** Direct and transitive dependents, most severe first; ties keep registration order. */
export function identifyAffectedServices(graph: DependencyGraph, breaking: readonly BreakingChange[]): AffectedService[] {
  return [...graph.direct_dependencies, ...graph.transitive_dependencies]
    .map((d) => serviceImpact(d, breaking))
    .sort((a, b) => IMPACT_RANK[b.impact_level] - IMPACT_RANK[a.impact_level]);
}

function mitigationStrategies(impact: TeamImpact): string[] {
  const out: string[] = [];
  if (isHighImpact(impact.impact_level)) {
    out.push("Prioritize immediate team coordination", "Assign dedicated migration lead", "Create detailed migration timeline");
  }
  if (impact.affected_services.length > 3) {
    out.push("Consider parallel migration of services", "Implement comprehensive testing strategy");
  }
  if (impact.impact_level === "critical") {
    out.push("Prepare rollback plan for each service", "Set up monitoring for migration progress");
  }
  return out;
}

/** Group affected services by owning team, keeping each team's worst impact. Unowned services are skipped. */
export function analyzeTeamImpacts(
  target: string,
  affected: readonly AffectedService[],
  breaking: readonly BreakingChange[],
): TeamImpact[] {
  const teams = new Map<string, TeamImpact>();
  for (const svc of affected) {
    if (!svc.team_owner) continue;
    let t = teams.get(svc.team_owner);
    if (!t) {
      t = {
        team_name: svc.team_owner,
        impact_level: "none",
        affected_services: [],
        required_actions: [],
        risk_factors: [],
        mitigation_strategies: [],
        estimated_effort: null,
        contact_priority: "normal",
      };
      teams.set(svc.team_owner, t);
    }

    t.affected_services.push(svc.service_name);
    t.impact_level = maxImpact(t.impact_level, svc.impact_level);
    if (svc.migration_required) t.required_actions.push(`Migrate ${svc.service_name}`);
    if (svc.testing_required) t.required_actions.push(`Test ${svc.service_name}`);
    t.estimated_effort ??= svc.migration_complexity;
    if (breaking.length > 0) {
      t.risk_factors.push(`Breaking changes in ${target}`, `Service ${svc.service_name} affected`);
    }
  }

  return [...teams.values()].map((t) => ({
    ...t,
    mitigation_strategies: mitigationStrategies(t),
    contact_priority: isHighImpact(t.impact_level) ? "urgent" : "normal",
  }));
}

function cascadeEffects(graph: DependencyGraph, breaking: readonly BreakingChange[]): CascadeEffect[] {
  if (breaking.length === 0) return [];
  return graph.direct_dependencies
    .filter((d) => d.strength === "critical" || d.strength === "strong")
    .map((d) => ({
      service: d.service_name,
      effect_type: "service_disruption",
      probability: d.strength === "critical" ? "high" : "medium",
      impact_scope: d.team_owner ? "team" : "unknown",
      mitigation: `Coordinate migration for ${d.service_name}`,
    }));
}

export function analyzeCrossSystemImpact(
  graph: DependencyGraph,
  snapshot: RegistrySnapshot,
  breaking: readonly BreakingChange[],
): CrossSystemImpact {
  const systems: string[] = [];
  for (const d of [...graph.direct_dependencies, ...graph.transitive_dependencies]) {
    const system = snapshot.catalog.get(d.service_name)?.system ?? "unknown";
    if (!systems.includes(system)) systems.push(system);
  }

  const crossTeam: Record<string, string[]> = {};
  for (const d of graph.direct_dependencies) {
    if (d.team_owner) (crossTeam[d.team_owner] ??= []).push(d.service_name);
  }

  const impact: CrossSystemImpact = {
    affected_systems: systems,
    cross_team_dependencies: crossTeam,
    external_dependencies: graph.direct_dependencies
      .filter((d) => !snapshot.catalog.has(d.service_name))
      .map((d) => d.service_name),
    cascade_effects: cascadeEffects(graph, breaking),
    coordination_requirements: [],
  };

  if (impact.affected_systems.length > 1) impact.coordination_requirements.push("Cross-system coordination required");
  if (Object.keys(crossTeam).length > 2) impact.coordination_requirements.push("Multi-team coordination meeting recommended");
  if (impact.external_dependencies.length > 0) impact.coordination_requirements.push("External dependency coordination required");
  if (impact.cascade_effects.length > 0) impact.coordination_requirements.push("Cascade effect monitoring required");
  return impact;
}

export function migrationRecommendations(
  graph: DependencyGraph,
  teams: readonly TeamImpact[],
  breaking: readonly BreakingChange[],
): string[] {
  const out: string[] = [];
  const meta = graph.metadata;
  if (meta.total_affected_services > 10) out.push("Consider phased migration due to high number of affected services");
  if (meta.critical_dependencies > 0) {
    out.push(`Exercise extreme caution: ${meta.critical_dependencies} critical dependencies identified`);
  }

  const highTeams = teams.filter((t) => isHighImpact(t.impact_level));
  if (highTeams.length > 0) out.push(`Coordinate with ${highTeams.length} high-impact teams before migration`);
  if (breaking.length > 0) {
    out.push("Implement comprehensive testing due to breaking changes");
    out.push("Prepare detailed migration documentation for affected teams");
  }
  for (const t of highTeams) out.push(`Priority coordination with ${t.team_name} team required`);

  if (meta.complexity_score > 7) out.push("High complexity migration - consider external coordination support");
  else if (meta.complexity_score > 5) out.push("Medium complexity migration - ensure adequate planning time");
  return out;
}
