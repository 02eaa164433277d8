import { DependencyAnalysisError } from "../errors.js";
import { DEFAULT_MAX_RETRIES, mutate, type GovernanceStore } from "../store/store.js";
import type {
  AffectedService,
  CrossSystemImpact,
  DependencyGraph,
  MigrationPlan,
  TeamImpact,
} from "../types/dependency.js";
import type { BreakingChange } from "../types/governance.js";
import {
  analyzeCrossSystemImpact,
  analyzeTeamImpacts,
  identifyAffectedServices,
  migrationRecommendations,
} from "./analyzer.js";
import { buildDependencyGraph } from "./graph.js";
import { buildMigrationPlan } from "./migration-plan.js";
import { DependencyRegistry, type RegistrySnapshot } from "./registry.js";

/** Everything the tracker needs about one change, computed from a single registry snapshot. */
export type ImpactAnalysis = {
  graph: DependencyGraph;
  affected_services: AffectedService[];
  team_impacts: TeamImpact[];
  cross_system: CrossSystemImpact;
  recommendations: string[];
};

export class ImpactAnalyzer {
  readonly registry: DependencyRegistry;
  private readonly clock: () => Date;
  private readonly maxRetries: number;

  constructor(
    private readonly store: GovernanceStore,
    opts: { clock?: () => Date; maxRetries?: number } = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.registry = new DependencyRegistry(store, { clock: this.clock, maxRetries: this.maxRetries });
  }

  async analyzeDependencyGraph(target: string): Promise<DependencyGraph> {
    return buildDependencyGraph(target, await this.registry.snapshot(), this.clock());
  }

  async identifyAffectedServices(target: string, breaking: readonly BreakingChange[] = []): Promise<AffectedService[]> {
    return identifyAffectedServices(await this.analyzeDependencyGraph(target), breaking);
  }

  async analyzeTeamImpacts(target: string, breaking: readonly BreakingChange[] = []): Promise<TeamImpact[]> {
    const affected = await this.identifyAffectedServices(target, breaking);
    return analyzeTeamImpacts(target, affected, breaking);
  }

  async analyzeCrossSystemImpact(target: string, breaking: readonly BreakingChange[] = []): Promise<CrossSystemImpact> {
    const snapshot = await this.registry.snapshot();
    return analyzeCrossSystemImpact(buildDependencyGraph(target, snapshot, this.clock()), snapshot, breaking);
  }

  async getMigrationRecommendations(target: string, breaking: readonly BreakingChange[] = []): Promise<string[]> {
    return (await this.analyze(target, breaking)).recommendations;
  }

  async analyze(target: string, breaking: readonly BreakingChange[] = []): Promise<ImpactAnalysis> {
    return analyzeSnapshot(target, await this.registry.snapshot(), breaking, this.clock());
  }

  /** Builds and persists the plan under `changeId`; regenerating replaces the stored plan. */
  async generateMigrationPlan(
    changeId: string,
    target: string,
    breaking: readonly BreakingChange[] = [],
  ): Promise<MigrationPlan> {
    const analysis = await this.analyze(target, breaking);
    const plan = buildMigrationPlan({
      changeId,
      graph: analysis.graph,
      teams: analysis.team_impacts,
      crossSystem: analysis.cross_system,
      breaking,
      now: this.clock(),
    });

    await mutate(this.store.migrationPlans, changeId, () => plan, this.maxRetries);
    console.info(`[deps] Saved ${plan.strategy} migration plan for change ${changeId} (${plan.phases.length} phases)`);
    return plan;
  }

  async getMigrationPlan(changeId: string): Promise<MigrationPlan> {
    const entry = await this.store.migrationPlans.get(changeId);
    if (!entry) throw new DependencyAnalysisError(`No migration plan for change ${changeId}`, { change_id: changeId });
    return entry.value;
  }
}

export function analyzeSnapshot(
  target: string,
  snapshot: RegistrySnapshot,
  breaking: readonly BreakingChange[],
  now: Date = new Date(),
): ImpactAnalysis {
  const graph = buildDependencyGraph(target, snapshot, now);
  const affected = identifyAffectedServices(graph, breaking);
  const teams = analyzeTeamImpacts(target, affected, breaking);
  return {
    graph,
    affected_services: affected,
    team_impacts: teams,
    cross_system: analyzeCrossSystemImpact(graph, snapshot, breaking),
    recommendations: migrationRecommendations(graph, teams, breaking),
  };
}
