export * from "./errors.js";
export type * from "./types/governance.js";
export type * from "./types/review.js";
export type * from "./types/dependency.js";
export type * from "./types/change.js";
export type * from "./types/config.js";

export { loadConfigTree, deepMerge, applyEnvOverrides } from "./config/loader.js";
export { loadConfig, validateConfig } from "./config/validator.js";
export { SchemaRegistry, createRegistry } from "./schema/registry.js";

export { mutate, DEFAULT_MAX_RETRIES, type Collection, type GovernanceStore, type Versioned } from "./store/store.js";
export { MemoryStore, MemoryCollection } from "./store/memory-store.js";
export { FileStore, FileCollection } from "./store/file-store.js";

export { ConfigTeamDirectory, isAuthorizedReviewer, parseReviewer, type TeamDirectory } from "./teams/directory.js";

export {
  BufBreakingClassifier,
  execFileRunner,
  type BreakingChangeClassifier,
  type CommandRunner,
} from "./classifier/classifier.js";
export { summarizeBreakingChanges, renderMigrationGuide, type BreakingImpactSummary } from "./classifier/summary.js";

export { DependencyRegistry } from "./impact/registry.js";
export { buildDependencyGraph, complexityScore } from "./impact/graph.js";
export { ImpactAnalyzer, analyzeSnapshot, type ImpactAnalysis } from "./impact/service.js";
export { buildMigrationPlan } from "./impact/migration-plan.js";

export { enforceReviewPolicy, enforceBreakingChangePolicy, type PolicyDecision } from "./policy/enforcer.js";
export { resolveReviewPolicy, resolveBreakingPolicy } from "./policy/resolve.js";
export { GovernanceService } from "./policy/service.js";
export { buildComplianceReport, parseTimeframe, type ComplianceReport } from "./policy/compliance-report.js";

export { applyReviewEvent } from "./review/state-machine.js";
export { reviewEventNotifier } from "./review/notify.js";
export { ReviewWorkflow, approvalStatusOf, type ReviewListener, type ReviewNotification } from "./review/workflow.js";

export { ChangeTracker, type TrackChangeInput } from "./tracker/tracker.js";
export { JsonlStdoutNotifier, OutboxFileNotifier, CompositeNotifier, type Notifier } from "./tracker/notifier.js";
export { buildChangeReport, type ChangeReport } from "./tracker/report.js";

export { GitOperations, type GitClient, type GitContext } from "./git/operations.js";
export { createEngine, openEngine, type Engine } from "./commands/context.js";
