import type { DependencyGraph, ReverseDependency, ServiceDependency } from "../types/dependency.js";
import type { RegistrySnapshot } from "./registry.js";

/**
 * complexity = direct + 0.5·transitive + 2·critical_direct + 0.5·distinct_direct_teams,
 * truncated toward zero.
 */
export function complexityScore(direct: readonly ServiceDependency[], transitiveCount: number): number {
  const critical = direct.filter((d) => d.strength === "critical").length;
  const teams = distinctTeams(direct).length;
  return Math.trunc(direct.length + 0.5 * transitiveCount + 2 * critical + 0.5 * teams);
}

export function distinctTeams(deps: readonly ServiceDependency[]): string[] {
  const teams: string[] = [];
  for (const d of deps) {
    if (d.team_owner && !teams.includes(d.team_owner)) teams.push(d.team_owner);
  }
  return teams;
}

/** Schemas a service consumes: catalog declarations first, then registry entries. */
export function schemasConsumedBy(snapshot: RegistrySnapshot, serviceName: string): string[] {
  const out: string[] = [];
  const add = (s: string) => {
    if (!out.includes(s)) out.push(s);
  };
  for (const s of snapshot.catalog.get(serviceName)?.schema_dependencies ?? []) add(s);
  for (const c of snapshot.backward.get(serviceName) ?? []) add(c.schema_target);
  return out;
}

/**
 * One level past the direct dependents: for each direct dependent, the other
 * schemas it consumes and their dependents. Always tagged `weak`.
 *
 * `dependencies` lists each indirect service once and never repeats a direct
 * one; `paths` counts every (direct dependent, schema, indirect dependent)
 * hop and is what the complexity score weighs.
 */
function transitiveDependencies(
  target: string,
  direct: readonly ServiceDependency[],
  snapshot: RegistrySnapshot,
): { dependencies: ServiceDependency[]; paths: number } {
  const directNames = new Set(direct.map((d) => d.service_name));
  const seen = new Set<string>();
  const dependencies: ServiceDependency[] = [];
  let paths = 0;

  for (const dep of direct) {
    for (const schema of schemasConsumedBy(snapshot, dep.service_name)) {
      if (schema === target) continue;
      for (const indirect of snapshot.forward.get(schema) ?? []) {
        const name = indirect.service_name;
        if (name === dep.service_name) continue;
        paths++;
        if (name === target || directNames.has(name) || seen.has(name)) continue;
        seen.add(name);
        dependencies.push({ ...indirect, dependency_type: "transitive", strength: "weak" });
      }
    }
  }
  return { dependencies, paths };
}

/** Schemas the target itself consumes, from the backward index only. */
function reverseDependencies(target: string, snapshot: RegistrySnapshot): ReverseDependency[] {
  return (snapshot.backward.get(target) ?? []).map((c) => ({
    schema_target: c.schema_target,
    strength: c.dependency.strength,
    team_owner: c.dependency.team_owner,
  }));
}

export function buildDependencyGraph(target: string, snapshot: RegistrySnapshot, now: Date = new Date()): DependencyGraph {
  const direct = [...(snapshot.forward.get(target) ?? [])];
  const { dependencies: transitive, paths } = transitiveDependencies(target, direct, snapshot);

  const matrix: Record<string, string[]> = { [target]: direct.map((d) => d.service_name) };
  for (const d of direct) matrix[d.service_name] = schemasConsumedBy(snapshot, d.service_name);

  return {
    schema_target: target,
    direct_dependencies: direct,
    transitive_dependencies: transitive,
    reverse_dependencies: reverseDependencies(target, snapshot),
    dependency_matrix: matrix,
    metadata: {
      total_affected_services: direct.length + transitive.length,
      critical_dependencies: direct.filter((d) => d.strength === "critical").length,
      teams_affected: distinctTeams(direct).length,
      complexity_score: complexityScore(direct, paths),
    },
    generated_at: now.toISOString(),
  };
}
