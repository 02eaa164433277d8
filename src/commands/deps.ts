import type { ConsumedSchema, RegisterDependencyInput, RegisterServiceInput } from "../impact/registry.js";
import type { ImpactAnalysis } from "../impact/service.js";
import type {
  DependencyGraph,
  DependencyKind,
  DependencyStrength,
  MigrationPlan,
  ServiceCatalogEntry,
  ServiceDependency,
  UsagePattern,
} from "../types/dependency.js";
import type { BreakingChange, ImpactTier } from "../types/governance.js";
import type { Engine } from "./context.js";
import { runCommand, type CommandResult } from "./result.js";

export const STRENGTHS: readonly DependencyStrength[] = ["weak", "medium", "strong", "critical"];
export const DEPENDENCY_KINDS: readonly DependencyKind[] = ["direct", "transitive", "optional"];
export const USAGE_PATTERNS: readonly UsagePattern[] = ["consumer", "producer", "both"];
export const COMPLEXITIES: readonly ImpactTier[] = ["low", "medium", "high", "critical"];

export async function registerDependency(
  engine: Engine,
  schemaTarget: string,
  input: RegisterDependencyInput,
): Promise<CommandResult<ServiceDependency>> {
  return runCommand(() => engine.impact.registry.registerServiceDependency(schemaTarget, input));
}

export async function registerService(
  engine: Engine,
  serviceName: string,
  input: RegisterServiceInput,
): Promise<CommandResult<ServiceCatalogEntry>> {
  return runCommand(() => engine.impact.registry.registerService(serviceName, input));
}

export async function describeService(
  engine: Engine,
  serviceName: string,
): Promise<CommandResult<{ catalog: ServiceCatalogEntry | null; consumes: ConsumedSchema[] }>> {
  return runCommand(() => engine.impact.registry.describeService(serviceName));
}

export async function dependencyGraph(engine: Engine, target: string): Promise<CommandResult<DependencyGraph>> {
  return runCommand(() => engine.impact.analyzeDependencyGraph(target));
}

/** With `changeId`, the tracked change's breaking changes feed the analysis. */
export async function impactAnalysis(
  engine: Engine,
  target: string,
  changeId?: string,
): Promise<CommandResult<ImpactAnalysis>> {
  return runCommand(async () => engine.impact.analyze(target, await breakingOf(engine, changeId)));
}

export async function migrationPlan(
  engine: Engine,
  opts: { changeId: string; target?: string; regenerate?: boolean },
): Promise<CommandResult<MigrationPlan>> {
  return runCommand(async () => {
    if (!opts.regenerate) {
      const stored = await engine.store.migrationPlans.get(opts.changeId);
      if (stored) return stored.value;
    }
    const record = await engine.tracker.getChange(opts.changeId);
    return engine.impact.generateMigrationPlan(opts.changeId, opts.target ?? record.change.target, record.breaking_changes);
  });
}

async function breakingOf(engine: Engine, changeId: string | undefined): Promise<BreakingChange[]> {
  if (!changeId) return [];
  return (await engine.tracker.getChange(changeId)).breaking_changes;
}
