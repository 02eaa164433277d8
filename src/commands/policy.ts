import { summarizeBreakingChanges, type BreakingImpactSummary } from "../classifier/summary.js";
import { UsageError } from "../errors.js";
import type { ComplianceReport } from "../policy/compliance-report.js";
import { breakingApprovalKey } from "../policy/enforcer.js";
import type { BreakingApproval, BreakingChange, PolicyResult } from "../types/governance.js";
import type { Engine } from "./context.js";
import { EXIT, type ExitCode } from "./exit-codes.js";
import { runCommand, type CommandResult } from "./result.js";

export type PolicyCheck = {
  change_id: string;
  breaking: PolicyResult;
  review: PolicyResult;
};

export type DetectResult = {
  breaking_changes: BreakingChange[];
  summary: BreakingImpactSummary;
  policy: PolicyResult;
};

/** error → 1, require_approval → 2, allow and warn → 0. */
export function policyExitCode(...results: PolicyResult[]): ExitCode {
  if (results.some((r) => r.action === "error")) return EXIT.POLICY_BLOCKED;
  if (results.some((r) => r.action === "require_approval")) return EXIT.APPROVAL_REQUIRED;
  return EXIT.SUCCESS;
}

/** Re-evaluate both policies for a tracked change against the approvals recorded so far. */
export async function checkChange(engine: Engine, changeId: string): Promise<CommandResult<PolicyCheck>> {
  return runCommand(async () => {
    const record = await engine.tracker.getChange(changeId);
    const breaking = await engine.governance.enforceBreakingChangePolicy(record.breaking_changes, {
      team: record.change.owning_team,
      target: record.change.target,
    });
    const review = await engine.governance.enforceReviewPolicy(record.change);
    return { change_id: changeId, breaking, review };
  });
}

/** Run the classifier without tracking a change, then apply the breaking-change policy. */
export async function detectBreaking(
  engine: Engine,
  opts: { input: string; against: string; repository: string; target?: string; team?: string; policy?: string },
): Promise<CommandResult<DetectResult>> {
  return runCommand(async () => {
    const changes = await engine.classifier.detect(opts.input, opts.against, { repository: opts.repository });
    const policy = await engine.governance.enforceBreakingChangePolicy(changes, {
      policy: opts.policy,
      team: opts.team ?? (await engine.directory.findOwningTeam(opts.repository)),
      target: opts.target ?? opts.repository,
    });
    return { breaking_changes: changes, summary: summarizeBreakingChanges(changes), policy };
  });
}

/** Approve every breaking location of a tracked change, or one location of a target. */
export async function approveBreaking(
  engine: Engine,
  opts: { reviewer: string; changeId?: string; target?: string; repository?: string; location?: string },
): Promise<CommandResult<Array<{ approval: BreakingApproval; created: boolean }>>> {
  return runCommand(async () => {
    if (opts.changeId) {
      const record = await engine.tracker.getChange(opts.changeId);
      const locations = new Map(record.breaking_changes.map((c) => [breakingApprovalKey(c.repository, c.location), c]));
      const out: Array<{ approval: BreakingApproval; created: boolean }> = [];
      for (const c of locations.values()) {
        out.push(await engine.governance.approveBreakingChanges(record.change.target, c.repository, opts.reviewer, c.location));
      }
      return out;
    }
    if (!opts.target || !opts.repository) {
      throw new UsageError("approve-breaking needs --change, or --target and --repository");
    }
    return [await engine.governance.approveBreakingChanges(opts.target, opts.repository, opts.reviewer, opts.location)];
  });
}

export async function compliance(
  engine: Engine,
  opts: { timeframe?: string; team?: string },
): Promise<CommandResult<ComplianceReport>> {
  return runCommand(() => engine.governance.generateComplianceReport(opts.timeframe, opts.team ?? null));
}
