/** Schema changes, the breaking changes found in them, and the records policy decisions leave behind. */
export type ChangeType = "addition" | "modification" | "removal";

export type ImpactTier = "low" | "medium" | "high" | "critical";

/** `none` only appears on derived impact ratings, never on a classified breaking change. */
export type ImpactLevel = "none" | ImpactTier;

export type SchemaChange = Readonly<{
  id: string;
  target: string;
  change_type: ChangeType;
  description: string;
  author: string;
  timestamp: string;
  repository: string;
  owning_team: string | null;
  affected_teams: readonly string[];
  breaking: boolean;
}>;

export type BreakingChange = {
  type: string;
  description: string;
  location: string;
  impact: ImpactTier;
  repository: string;
  before?: string;
  after?: string;
  migration_note?: string;
};

export type PolicyAction = "allow" | "warn" | "error" | "require_approval";

export type PolicyResult = Readonly<{
  action: PolicyAction;
  reason: string;
  has_approval: boolean;
  required_approvers: readonly string[];
  actual_approvers: readonly string[];
  violations: readonly string[];
}>;

export type AuditResult = "success" | "failure" | "warning";

export type AuditRecord = {
  action: string;
  target: string;
  actor: string;
  timestamp: string;
  result: AuditResult;
  details: Record<string, unknown>;
};

/** Recorded approval of one breaking location, keyed by (repository, location). */
export type BreakingApproval = {
  repository: string;
  location: string;
  target: string;
  approver: string;
  timestamp: string;
};
