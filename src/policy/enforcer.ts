import { isAuthorizedReviewer, parseReviewer, type TeamDirectory } from "../teams/directory.js";
import type { BreakingPolicyValue, GovernanceSection } from "../types/config.js";
import type { AuditRecord, AuditResult, BreakingChange, PolicyAction, PolicyResult, SchemaChange } from "../types/governance.js";
import { checkBreakingPolicy, resolveBreakingPolicy, resolveReviewPolicy } from "./resolve.js";

/**
 * A policy decision and the audit entry describing it. The enforcer never
 * writes the audit entry itself; GovernanceService does.
 */
export type PolicyDecision = {
  result: PolicyResult;
  audit: AuditRecord | null;
};

export type EnforcerContext = {
  section: GovernanceSection;
  directory: TeamDirectory;
  now?: Date;
};

function policyResult(fields: {
  action: PolicyAction;
  reason: string;
  has_approval?: boolean;
  required_approvers?: readonly string[];
  actual_approvers?: readonly string[];
  violations?: readonly string[];
}): PolicyResult {
  return Object.freeze({
    action: fields.action,
    reason: fields.reason,
    has_approval: fields.has_approval ?? false,
    required_approvers: Object.freeze([...(fields.required_approvers ?? [])]),
    actual_approvers: Object.freeze([...(fields.actual_approvers ?? [])]),
    violations: Object.freeze([...(fields.violations ?? [])]),
  });
}

function audit(
  action: string,
  target: string,
  actor: string,
  now: Date,
  details: Record<string, unknown>,
  result: AuditResult = "success",
): AuditRecord {
  return { action, target, actor, timestamp: now.toISOString(), result, details };
}

/** Breaking approvals are keyed by repository and location. */
export const breakingApprovalKey = (repository: string, location: string): string => `${repository}:${location}`;

export async function enforceReviewPolicy(
  ctx: EnforcerContext,
  change: SchemaChange,
  approvers: readonly string[],
): Promise<PolicyDecision> {
  const now = ctx.now ?? new Date();
  const { key, policy } = resolveReviewPolicy(ctx.section, change.repository, change.owning_team);
  const base = { policy_key: key, team: change.owning_team, change_id: change.id };

  if (policy.auto_approve_minor && !change.breaking) {
    return {
      result: policyResult({ action: "allow", reason: "Auto-approved: non-breaking change", has_approval: true }),
      audit: audit("auto_approve_minor", change.target, "system", now, { ...base, reason: "non-breaking change" }),
    };
  }

  const required = policy.required_reviewers;
  const requiredRefs = required.map(parseReviewer);
  const valid: string[] = [];
  for (const approver of new Set(approvers)) {
    if (requiredRefs.length === 0 || (await isAuthorizedReviewer(ctx.directory, approver, requiredRefs))) {
      valid.push(approver);
    }
  }

  const counts = { required_approvals: policy.approval_count, actual_approvals: valid.length };
  if (valid.length >= policy.approval_count) {
    return {
      result: policyResult({
        action: "allow",
        reason: `Approved by ${valid.length} reviewers`,
        has_approval: true,
        required_approvers: required,
        actual_approvers: valid,
      }),
      audit: audit("review_approved", change.target, valid.join(","), now, { ...base, ...counts, approvers: valid }),
    };
  }

  const outstanding: string[] = [];
  for (const [i, ref] of requiredRefs.entries()) {
    if (!(await anySatisfies(ctx.directory, valid, ref))) outstanding.push(required[i]);
  }
  const missing = policy.approval_count - valid.length;
  const violations =
    outstanding.length > 0
      ? outstanding.map((r) => `Approval required from ${r}`)
      : [`${missing} more approval${missing === 1 ? "" : "s"} required`];

  return {
    result: policyResult({
      action: "require_approval",
      reason:
        required.length > 0
          ? `Requires ${policy.approval_count} approvals from: ${required.join(", ")}`
          : `Requires ${policy.approval_count} approvals`,
      has_approval: false,
      required_approvers: outstanding,
      actual_approvers: valid,
      violations,
    }),
    audit: audit("review_required", change.target, "system", now, { ...base, ...counts, required_reviewers: required }),
  };
}

async function anySatisfies(
  directory: TeamDirectory,
  approvers: readonly string[],
  ref: ReturnType<typeof parseReviewer>,
): Promise<boolean> {
  for (const a of approvers) {
    if (await isAuthorizedReviewer(directory, a, [ref])) return true;
  }
  return false;
}

export type BreakingPolicyOptions = {
  section: GovernanceSection;
  /** Explicit policy; otherwise resolved from the first change's repository. */
  policy?: string;
  team?: string | null;
  /** Recorded approvals: breakingApprovalKey(...) → approver. */
  approvals?: ReadonlyMap<string, string>;
  target?: string;
  now?: Date;
};

export function enforceBreakingChangePolicy(
  changes: readonly BreakingChange[],
  opts: BreakingPolicyOptions,
): PolicyDecision {
  if (changes.length === 0) {
    return { result: policyResult({ action: "allow", reason: "No breaking changes detected" }), audit: null };
  }

  const now = opts.now ?? new Date();
  const repository = changes[0].repository;
  const policy: BreakingPolicyValue =
    opts.policy !== undefined ? checkBreakingPolicy(opts.policy) : resolveBreakingPolicy(opts.section, repository, opts.team ?? null);
  const target = opts.target ?? repository;
  const details = { policy, breaking_count: changes.length, repository, team: opts.team ?? null };

  switch (policy) {
    case "allow":
      return {
        result: policyResult({ action: "allow", reason: `Breaking changes allowed by policy: ${policy}` }),
        audit: audit("breaking_changes_allowed", target, "system", now, details),
      };

    case "warn":
      return {
        result: policyResult({ action: "warn", reason: `Breaking changes detected (policy: ${policy})` }),
        audit: audit("breaking_changes_warning", target, "system", now, details, "warning"),
      };

    case "error":
      return {
        result: policyResult({
          action: "error",
          reason: `Breaking changes blocked by policy: ${policy}`,
          violations: changes.map((c) => `${c.type}: ${c.description}`),
        }),
        audit: audit("breaking_changes_blocked", target, "system", now, details, "failure"),
      };

    case "require_approval": {
      const approvals = opts.approvals ?? new Map<string, string>();
      const keys = [...new Set(changes.map((c) => breakingApprovalKey(c.repository, c.location)))];
      const outstanding = keys.filter((k) => !approvals.has(k));
      const approvers = [...new Set(keys.flatMap((k) => approvals.get(k) ?? []))];

      if (outstanding.length === 0) {
        return {
          result: policyResult({
            action: "allow",
            reason: "Breaking changes have been approved",
            has_approval: true,
            actual_approvers: approvers,
          }),
          audit: audit("breaking_changes_approved", target, approvers.join(","), now, details),
        };
      }
      return {
        result: policyResult({
          action: "require_approval",
          reason: "Breaking changes require explicit approval",
          has_approval: false,
          actual_approvers: approvers,
          violations: outstanding,
        }),
        audit: audit("breaking_approval_required", target, "system", now, { ...details, outstanding }),
      };
    }
  }
}
