import type { BreakingChange, ImpactLevel, PolicyAction, SchemaChange } from "./governance.js";

/** Change tracking records. */
export type ApprovalState = "not_required" | "pending" | "approved" | "rejected" | "cancelled";

export type NotificationStatus = "sent" | "failed";

export type NotificationLogEntry = {
  team: string;
  type: string;
  timestamp: string;
  status: NotificationStatus;
  error: string | null;
};

export type PolicyOutcome = {
  action: PolicyAction;
  reason: string;
};

export type ChangeRecord = {
  id: string;
  change: SchemaChange;
  commit_hash: string | null;
  branch: string | null;
  files_changed: string[];
  tags: string[];
  breaking_changes: BreakingChange[];
  impact_level: ImpactLevel;
  affected_teams: string[];
  affected_services: string[];
  migration_required: boolean;
  review_required: boolean;
  blocked: boolean;
  review_id: string | null;
  approval_status: ApprovalState;
  policy: {
    review: PolicyOutcome;
    breaking: PolicyOutcome;
  };
  migration_plan_id: string | null;
  estimated_migration_time: string;
  notifications: NotificationLogEntry[];
  created_at: string;
  updated_at: string;
};

export type ChangeNotificationPayload = {
  type: string;
  change_id: string;
  schema_target: string;
  change_type: string;
  repository: string;
  impact_level: ImpactLevel;
  team_role: "owner" | "affected";
  team_impact: {
    impact_level: ImpactLevel;
    affected_services: string[];
    required_actions: string[];
  } | null;
  breaking_changes_count: number;
  migration_required: boolean;
  review_required: boolean;
  review_id: string | null;
  recommendations: string[];
  created_by: string;
  timestamp: string;
};

/** A review moved; sent to the teams of the linked change, or the requested teams. */
export type ReviewNotificationPayload = {
  type: "review_requested" | "review_approved" | "review_rejected" | "review_cancelled";
  review_id: string;
  change_id: string | null;
  schema_target: string;
  reviewers: string[];
  actor: string;
  reason: string | null;
  timestamp: string;
};

export type NotificationPayload = ChangeNotificationPayload | ReviewNotificationPayload;
