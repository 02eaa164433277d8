/** Configuration types. The loader layers base, environment and variable overrides into these. */
export type BreakingPolicyValue = "allow" | "warn" | "error" | "require_approval";

export type ReviewPolicyConfig = {
  required_reviewers: string[];
  approval_count: number;
  auto_approve_minor: boolean;
};

export type TeamOverrideConfig = {
  review_policy?: string;
  breaking_change_policy?: BreakingPolicyValue;
};

export type NotificationSettings = {
  default_channels?: string[];
  team_channels?: Record<string, string[]>;
  outbox_path?: string;
};

export type GlobalSettings = {
  max_update_retries?: number;
  lock_timeout_ms?: number;
  change_history_limit?: number;
};

export type GovernanceSection = {
  review_policies: Record<string, ReviewPolicyConfig>;
  /** Values are validated at enforcement time; unknown values raise GovernanceError. */
  breaking_change_policies: Record<string, string>;
  team_overrides?: Record<string, TeamOverrideConfig>;
  notification_settings?: NotificationSettings;
  global_settings?: GlobalSettings;
};

export type TeamRole = "viewer" | "contributor" | "maintainer" | "admin";

export type TeamMember = {
  username: string;
  role: TeamRole;
};

export type TeamSettings = {
  require_review_all_changes?: boolean;
};

export type TeamConfig = {
  members: TeamMember[];
  repositories?: string[];
  settings?: TeamSettings;
};

export type ClassifierConfig = {
  command: string;
  timeout_ms: number;
  error_format: "json" | "junit";
  ignore_patterns?: string[];
};

export type GovernanceConfig = {
  schema_version: string;
  store_dir: string;
  classifier?: ClassifierConfig;
  schema_governance: GovernanceSection;
  teams?: Record<string, TeamConfig>;
};
