import { ConfigurationError } from "../errors.js";
import type { AuditRecord } from "../types/governance.js";

export type ComplianceSummary = {
  schema_changes: number;
  reviews_required: number;
  reviews_approved: number;
  breaking_changes_detected: number;
  breaking_changes_approved: number;
  policy_violations: number;
};

export type ComplianceReport = {
  timeframe: string;
  team: string | null;
  generated_at: string;
  total_records: number;
  summary: ComplianceSummary;
  details: {
    by_action: Record<string, number>;
    by_target: Record<string, number>;
    by_actor: Record<string, number>;
  };
};

const UNIT_MS: Record<string, number> = { d: 86_400_000, h: 3_600_000, m: 60_000, s: 1000 };

/** "7d", "12h", "30m", "45s"; a bare number counts days. */
export function parseTimeframe(timeframe: string): number {
  const match = /^(\d+(?:\.\d+)?)([dhms]?)$/.exec(timeframe.trim());
  if (!match) throw new ConfigurationError(`Invalid timeframe: ${timeframe}`, { timeframe });
  return Number(match[1]) * UNIT_MS[match[2] || "d"];
}

const SUMMARY_ACTIONS: Readonly<Record<string, keyof ComplianceSummary>> = {
  schema_change: "schema_changes",
  review_required: "reviews_required",
  review_approved: "reviews_approved",
  breaking_changes_detected: "breaking_changes_detected",
  breaking_changes_approved: "breaking_changes_approved",
};

const bump = (counts: Record<string, number>, key: string) => {
  counts[key] = (counts[key] ?? 0) + 1;
};

export function buildComplianceReport(
  records: readonly AuditRecord[],
  opts: { timeframe: string; windowMs: number; team: string | null; now: Date },
): ComplianceReport {
  const cutoff = opts.now.getTime() - opts.windowMs;
  const inScope = records.filter((r) => {
    const at = Date.parse(r.timestamp);
    if (Number.isNaN(at) || at < cutoff) return false;
    return opts.team === null || r.details.team === opts.team;
  });

  const report: ComplianceReport = {
    timeframe: opts.timeframe,
    team: opts.team,
    generated_at: opts.now.toISOString(),
    total_records: inScope.length,
    summary: {
      schema_changes: 0,
      reviews_required: 0,
      reviews_approved: 0,
      breaking_changes_detected: 0,
      breaking_changes_approved: 0,
      policy_violations: 0,
    },
    details: { by_action: {}, by_target: {}, by_actor: {} },
  };

  for (const r of inScope) {
    const counter = SUMMARY_ACTIONS[r.action];
    if (counter) report.summary[counter]++;
    else if (r.result === "failure") report.summary.policy_violations++;

    bump(report.details.by_action, r.action);
    bump(report.details.by_target, r.target);
    bump(report.details.by_actor, r.actor);
  }
  return report;
}
