import type {
  CommunicationPlan,
  CrossSystemImpact,
  DependencyGraph,
  IdentifiedRisk,
  MigrationPhase,
  MigrationPlan,
  MigrationStrategy,
  RiskAssessment,
  RiskRating,
  RollbackPlan,
  ServiceDependency,
  TeamImpact,
  TestingStrategy,
} from "../types/dependency.js";
import type { BreakingChange } from "../types/governance.js";
import { IMPACT_RANK, STRENGTH_SCORE, isHighImpact } from "./levels.js";

export type PlanInputs = {
  changeId: string;
  graph: DependencyGraph;
  teams: readonly TeamImpact[];
  crossSystem: CrossSystemImpact;
  breaking: readonly BreakingChange[];
  now?: Date;
};

export function chooseStrategy(
  graph: DependencyGraph,
  teams: readonly TeamImpact[],
  crossSystem: CrossSystemImpact,
  breaking: readonly BreakingChange[],
): MigrationStrategy {
  const criticalDeps = graph.direct_dependencies.some((d) => d.strength === "critical");
  const highImpactTeams = teams.some((t) => isHighImpact(t.impact_level));
  if (criticalDeps || (breaking.length > 0 && highImpactTeams)) return "coordinated";
  if (graph.direct_dependencies.length > 5 || crossSystem.affected_systems.length > 2) return "phased";
  return "immediate";
}

type PhaseDraft = Omit<MigrationPhase, "phase">;

const names = (deps: readonly ServiceDependency[]) => deps.map((d) => d.service_name);

function phaseDrafts(strategy: MigrationStrategy, direct: readonly ServiceDependency[]): PhaseDraft[] {
  switch (strategy) {
    case "immediate":
      return [
        {
          name: "Immediate Migration",
          description: "Deploy all changes simultaneously",
          services: names(direct),
          team: null,
          duration: "1-2 hours",
          parallel: true,
        },
      ];

    case "phased":
      return [
        {
          name: "Critical Services Migration",
          description: "Migrate critical dependencies first",
          services: names(direct.filter((d) => d.strength === "critical")),
          team: null,
          duration: "4-8 hours",
          parallel: false,
        },
        {
          name: "High Impact Services Migration",
          description: "Migrate high impact services",
          services: names(direct.filter((d) => d.strength === "strong" || d.strength === "medium")),
          team: null,
          duration: "2-4 hours",
          parallel: true,
        },
        {
          name: "Low Impact Services Migration",
          description: "Migrate remaining services",
          services: names(direct.filter((d) => d.strength === "weak")),
          team: null,
          duration: "1-2 hours",
          parallel: true,
        },
      ];

    case "coordinated": {
      const byTeam = new Map<string, string[]>();
      const unowned: string[] = [];
      for (const d of direct) {
        if (!d.team_owner) {
          unowned.push(d.service_name);
          continue;
        }
        byTeam.set(d.team_owner, [...(byTeam.get(d.team_owner) ?? []), d.service_name]);
      }
      const drafts: PhaseDraft[] = [...byTeam].map(([team, services]) => ({
        name: `Team ${team} Migration`,
        description: `Coordinated migration for ${team} team`,
        services,
        team,
        duration: "2-6 hours",
        parallel: false,
      }));
      drafts.push({
        name: "Unowned Services Migration",
        description: "Migrate services without a registered owning team",
        services: unowned,
        team: null,
        duration: "2-6 hours",
        parallel: false,
      });
      return drafts;
    }
  }
}

/** Empty phases are dropped and the rest numbered from 1. */
export function migrationPhases(strategy: MigrationStrategy, graph: DependencyGraph): MigrationPhase[] {
  return phaseDrafts(strategy, graph.direct_dependencies)
    .filter((p) => p.services.length > 0)
    .map((p, i) => ({ phase: i + 1, ...p }));
}

/** Highest strength + owning-team impact first; equal scores keep registration order. */
export function migrationOrder(graph: DependencyGraph, teams: readonly TeamImpact[]): string[] {
  const teamScore = (owner: string | null): number => {
    const t = owner ? teams.find((x) => x.team_name === owner) : undefined;
    return t ? IMPACT_RANK[t.impact_level] : 0;
  };
  return graph.direct_dependencies
    .map((d) => ({ name: d.service_name, score: STRENGTH_SCORE[d.strength] + teamScore(d.team_owner) }))
    .sort((a, b) => b.score - a.score)
    .map((s) => s.name);
}

function rollbackPlan(graph: DependencyGraph): RollbackPlan {
  return {
    strategy: "service_by_service",
    order: names(graph.direct_dependencies).reverse(),
    prerequisites: ["Ensure all services have health checks", "Prepare previous schema versions", "Set up monitoring alerts"],
    triggers: ["Service failure rate > 5%", "Critical service unavailable", "Data corruption detected"],
    estimated_time: "30-60 minutes",
  };
}

function testingStrategy(graph: DependencyGraph, breaking: readonly BreakingChange[]): TestingStrategy {
  const cases: string[] = [];
  if (breaking.length > 0) {
    cases.push("Backward compatibility validation", "Breaking change impact verification", "Migration data integrity check");
  }
  for (const d of graph.direct_dependencies) {
    if (d.strength === "critical" || d.strength === "strong") cases.push(`Service ${d.service_name} functionality validation`);
  }
  return {
    phases: ["Unit testing", "Integration testing", "End-to-end testing"],
    environments: ["staging", "pre-production"],
    critical_test_cases: cases,
  };
}

function communicationPlan(teams: readonly TeamImpact[]): CommunicationPlan {
  return {
    stakeholders: teams.map((t) => ({
      team: t.team_name,
      contact_priority: t.contact_priority,
      required_actions: t.required_actions,
    })),
    notification_timeline: {
      initial_notification: "48 hours before migration",
      pre_migration_reminder: "24 hours before migration",
      migration_start: "At migration start",
      progress_updates: "Every 30 minutes during migration",
      completion_notification: "At migration completion",
    },
    channels: teams.some((t) => isHighImpact(t.impact_level)) ? ["slack", "email", "teams"] : ["email", "slack"],
  };
}

/** Sums the lower bound of each "N-M hours" phase duration. */
export function migrationTimeline(phases: readonly MigrationPhase[], teams: readonly TeamImpact[]): Record<string, string> {
  let hours = 0;
  for (const p of phases) {
    if (!p.duration.includes("hour")) continue;
    const lower = Number.parseInt(p.duration.split("-")[0].trim(), 10);
    hours += Number.isNaN(lower) ? 1 : lower;
  }

  const timeline: Record<string, string> = {
    preparation_time: "1-2 days",
    migration_window: `${hours} hours`,
    testing_time: "4-8 hours",
    rollback_window: "1 hour",
  };
  if (teams.some((t) => isHighImpact(t.impact_level))) timeline.coordination_time = "2-4 hours";
  return timeline;
}

export function overallRisk(risks: readonly IdentifiedRisk[]): RiskRating {
  if (risks.some((r) => r.impact === "high")) return "high";
  const likelyMedium = risks.filter((r) => r.impact === "medium" && r.probability === "high");
  return likelyMedium.length > 1 ? "medium" : "low";
}

function riskAssessment(
  graph: DependencyGraph,
  breaking: readonly BreakingChange[],
  crossSystem: CrossSystemImpact,
): RiskAssessment {
  const risks: IdentifiedRisk[] = [];
  if (graph.direct_dependencies.some((d) => d.strength === "critical")) {
    risks.push({
      risk: "Critical service disruption",
      probability: "medium",
      impact: "high",
      mitigation: "Prepare immediate rollback plan",
    });
  }
  if (breaking.length > 0) {
    risks.push({
      risk: "Compatibility issues",
      probability: "high",
      impact: "medium",
      mitigation: "Comprehensive testing and staged rollout",
    });
  }
  if (crossSystem.affected_systems.length > 2) {
    risks.push({
      risk: "Cross-system coordination failure",
      probability: "medium",
      impact: "high",
      mitigation: "Multi-system communication plan",
    });
  }
  return {
    overall_risk_level: overallRisk(risks),
    risks,
    mitigation_plan: "Implement all identified mitigations before proceeding",
  };
}

export function buildMigrationPlan(inputs: PlanInputs): MigrationPlan {
  const { graph, teams, crossSystem, breaking } = inputs;
  const strategy = chooseStrategy(graph, teams, crossSystem, breaking);
  const phases = migrationPhases(strategy, graph);
  return {
    change_id: inputs.changeId,
    schema_target: graph.schema_target,
    strategy,
    phases,
    dependencies_order: migrationOrder(graph, teams),
    rollback_plan: rollbackPlan(graph),
    testing_strategy: testingStrategy(graph, breaking),
    communication_plan: communicationPlan(teams),
    timeline: migrationTimeline(phases, teams),
    risk_assessment: riskAssessment(graph, breaking, crossSystem),
    generated_at: (inputs.now ?? new Date()).toISOString(),
  };
}
