import type { ImpactLevel, ImpactTier } from "./governance.js";

/** Dependency registry and impact analysis records. */
export type DependencyStrength = "weak" | "medium" | "strong" | "critical";

export type DependencyKind = "direct" | "transitive" | "optional";

export type UsagePattern = "consumer" | "producer" | "both";

export type ServiceDependency = {
  service_name: string;
  service_repository: string;
  dependency_type: DependencyKind;
  usage_pattern: UsagePattern;
  strength: DependencyStrength;
  team_owner: string | null;
  schema_files: string[];
  migration_complexity: ImpactTier;
  contact: string | null;
  registered_at: string;
};

/** Forward registry row: every service depending on one schema target. */
export type SchemaDependents = {
  schema_target: string;
  dependents: ServiceDependency[];
};

export type ServiceCatalogEntry = {
  service_name: string;
  system: string;
  team_owner: string | null;
  /** Schema targets this service consumes; also fed by dependency registration. */
  schema_dependencies: string[];
  metadata: Record<string, string>;
  registered_at: string;
};

/** A schema the analyzed target itself consumes. */
export type ReverseDependency = {
  schema_target: string;
  strength: DependencyStrength;
  team_owner: string | null;
};

export type GraphMetadata = {
  total_affected_services: number;
  critical_dependencies: number;
  teams_affected: number;
  complexity_score: number;
};

export type DependencyGraph = {
  schema_target: string;
  direct_dependencies: ServiceDependency[];
  transitive_dependencies: ServiceDependency[];
  reverse_dependencies: ReverseDependency[];
  dependency_matrix: Record<string, string[]>;
  metadata: GraphMetadata;
  generated_at: string;
};

export type AffectedService = {
  service_name: string;
  service_repository: string;
  team_owner: string | null;
  dependency_type: DependencyKind;
  usage_pattern: UsagePattern;
  strength: DependencyStrength;
  impact_level: ImpactLevel;
  migration_required: boolean;
  testing_required: boolean;
  migration_complexity: ImpactTier;
};

export type ContactPriority = "urgent" | "normal";

export type TeamImpact = {
  team_name: string;
  impact_level: ImpactLevel;
  affected_services: string[];
  required_actions: string[];
  risk_factors: string[];
  mitigation_strategies: string[];
  estimated_effort: ImpactTier | null;
  contact_priority: ContactPriority;
};

export type CascadeEffect = {
  service: string;
  effect_type: "service_disruption";
  probability: "high" | "medium";
  impact_scope: "team" | "unknown";
  mitigation: string;
};

export type CrossSystemImpact = {
  affected_systems: string[];
  cross_team_dependencies: Record<string, string[]>;
  external_dependencies: string[];
  cascade_effects: CascadeEffect[];
  coordination_requirements: string[];
};

export type MigrationStrategy = "immediate" | "phased" | "coordinated";

export type MigrationPhase = {
  phase: number;
  name: string;
  description: string;
  services: string[];
  team: string | null;
  duration: string;
  parallel: boolean;
};

export type RollbackPlan = {
  strategy: "service_by_service";
  order: string[];
  prerequisites: string[];
  triggers: string[];
  estimated_time: string;
};

export type TestingStrategy = {
  phases: string[];
  environments: string[];
  critical_test_cases: string[];
};

export type Stakeholder = {
  team: string;
  contact_priority: ContactPriority;
  required_actions: string[];
};

export type CommunicationPlan = {
  stakeholders: Stakeholder[];
  notification_timeline: Record<string, string>;
  channels: string[];
};

export type RiskRating = "low" | "medium" | "high";

export type IdentifiedRisk = {
  risk: string;
  probability: RiskRating;
  impact: RiskRating;
  mitigation: string;
};

export type RiskAssessment = {
  overall_risk_level: RiskRating;
  risks: IdentifiedRisk[];
  mitigation_plan: string;
};

export type MigrationPlan = {
  change_id: string;
  schema_target: string;
  strategy: MigrationStrategy;
  phases: MigrationPhase[];
  dependencies_order: string[];
  rollback_plan: RollbackPlan;
  testing_strategy: TestingStrategy;
  communication_plan: CommunicationPlan;
  timeline: Record<string, string>;
  risk_assessment: RiskAssessment;
  generated_at: string;
};
