import type { GovernanceStore } from "../store/store.js";
import type { TeamDirectory } from "../teams/directory.js";
import type { GovernanceSection } from "../types/config.js";
import type { BreakingApproval, BreakingChange, PolicyResult, SchemaChange } from "../types/governance.js";
import { buildComplianceReport, parseTimeframe, type ComplianceReport } from "./compliance-report.js";
import { breakingApprovalKey, enforceBreakingChangePolicy, enforceReviewPolicy, type PolicyDecision } from "./enforcer.js";

export type BreakingEnforceOptions = {
  policy?: string;
  team?: string | null;
  target?: string;
};

/**
 * Store-backed front of the enforcer: gathers approvals, writes the audit
 * trail and records breaking-change approvals.
 */
export class GovernanceService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: GovernanceStore,
    private readonly section: GovernanceSection,
    private readonly directory: TeamDirectory,
    opts: { clock?: () => Date } = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
  }

  /**
   * Approvers default to everyone who approved a review linked to the change.
   * Audit write failures propagate.
   */
  async enforceReviewPolicy(change: SchemaChange, approvers?: readonly string[]): Promise<PolicyResult> {
    return this.record(await this.decideReview(change, approvers));
  }

  async enforceBreakingChangePolicy(
    changes: readonly BreakingChange[],
    opts: BreakingEnforceOptions = {},
  ): Promise<PolicyResult> {
    return this.record(await this.decideBreaking(changes, opts));
  }

  /** Decision without the audit write; the caller owns persisting `audit`. */
  async decideReview(change: SchemaChange, approvers?: readonly string[]): Promise<PolicyDecision> {
    const actual = approvers ?? (await this.reviewApprovers(change.id));
    return enforceReviewPolicy({ section: this.section, directory: this.directory, now: this.clock() }, change, actual);
  }

  async decideBreaking(changes: readonly BreakingChange[], opts: BreakingEnforceOptions = {}): Promise<PolicyDecision> {
    return enforceBreakingChangePolicy(changes, {
      section: this.section,
      policy: opts.policy,
      team: opts.team,
      target: opts.target,
      approvals: changes.length > 0 ? await this.breakingApprovals() : new Map<string, string>(),
      now: this.clock(),
    });
  }

  /**
   * Records an approval for `(repository, location ?? target)`. The first
   * approval of a key wins; later calls return it unchanged.
   */
  async approveBreakingChanges(
    target: string,
    repository: string,
    reviewer: string,
    location?: string,
  ): Promise<{ approval: BreakingApproval; created: boolean }> {
    const loc = location ?? target;
    const now = this.clock().toISOString();
    const { entry, created } = await this.store.breakingApprovals.getOrCreate(breakingApprovalKey(repository, loc), () => ({
      repository,
      location: loc,
      target,
      approver: reviewer,
      timestamp: now,
    }));

    if (created) {
      await this.store.appendAudit({
        action: "breaking_changes_approved",
        target,
        actor: reviewer,
        timestamp: now,
        result: "success",
        details: { repository, location: loc },
      });
      console.info(`[policy] Breaking changes approved by ${reviewer} for ${repository}:${loc}`);
    } else {
      console.info(`[policy] ${repository}:${loc} already approved by ${entry.value.approver}`);
    }
    return { approval: entry.value, created };
  }

  async generateComplianceReport(timeframe = "7d", team: string | null = null): Promise<ComplianceReport> {
    const now = this.clock();
    const windowMs = parseTimeframe(timeframe);
    return buildComplianceReport(await this.store.readAudit(), { timeframe, windowMs, team, now });
  }

  private async record(decision: PolicyDecision): Promise<PolicyResult> {
    if (decision.audit) await this.store.appendAudit(decision.audit);
    return decision.result;
  }

  private async reviewApprovers(changeId: string): Promise<string[]> {
    const reviews = await this.store.reviews.list();
    const out = new Set<string>();
    for (const { entry } of reviews) {
      if (entry.value.change_id !== changeId) continue;
      for (const a of entry.value.approvals) out.add(a.reviewer);
    }
    return [...out];
  }

  private async breakingApprovals(): Promise<Map<string, string>> {
    const rows = await this.store.breakingApprovals.list();
    return new Map(rows.map(({ key, entry }) => [key, entry.value.approver]));
  }
}
