import type { ChangeRecord } from "../types/change.js";
import type { ChangeType, ImpactTier } from "../types/governance.js";

export const REPORT_WINDOWS_HOURS: Readonly<Record<string, number>> = { "1d": 24, "7d": 24 * 7, "30d": 24 * 30 };

export type ChangeReport = {
  timeframe: string;
  team_filter: string | null;
  generated_at: string;
  summary: {
    total_changes: number;
    breaking_changes: number;
    reviews_required: number;
    migrations_required: number;
    blocked_changes: number;
  };
  impact_breakdown: Record<ImpactTier, number>;
  change_types: Record<ChangeType, number>;
  top_active_repositories: Array<{ repository: string; change_count: number }>;
  top_affected_teams: Array<{ team: string; involvement_count: number }>;
  recent_changes: ChangeRecord[];
  recommendations: string[];
};

/** Start of the report window; unknown timeframes fall back to 7 days. */
export function reportSince(timeframe: string, now: Date): string {
  const hours = REPORT_WINDOWS_HOURS[timeframe] ?? REPORT_WINDOWS_HOURS["7d"];
  return new Date(now.getTime() - hours * 3_600_000).toISOString();
}

function topCounts(values: readonly string[], limit = 10): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const v of values) counts.set(v, (counts.get(v) ?? 0) + 1);
  return [...counts].sort((a, b) => b[1] - a[1]).slice(0, limit);
}

function recommendationsFor(changes: readonly ChangeRecord[]): string[] {
  const out: string[] = [];
  const breaking = changes.filter((c) => c.breaking_changes.length > 0).length;
  const highImpact = changes.filter((c) => c.impact_level === "high" || c.impact_level === "critical").length;
  if (breaking > 5) out.push("High number of breaking changes detected - consider implementing stricter review processes");
  if (highImpact > 3) out.push("Multiple high-impact changes - consider staggering deployments");

  const modifications = changes.filter((c) => c.change.change_type === "modification").length;
  if (changes.length > 0 && modifications > changes.length * 0.8) {
    out.push("High rate of modifications - consider schema versioning strategy");
  }

  const pendingReview = changes.filter((c) => c.review_required).length;
  if (pendingReview > 0) out.push(`${pendingReview} changes require review - ensure timely approvals`);
  if (out.length === 0) out.push("Change patterns look healthy - continue current practices");
  return out;
}

/** `changes` must already be filtered to the window and team, newest first. */
export function buildChangeReport(
  changes: readonly ChangeRecord[],
  opts: { timeframe: string; team: string | null; now: Date },
): ChangeReport {
  const count = (pred: (c: ChangeRecord) => boolean) => changes.filter(pred).length;
  const teams = changes.flatMap((c) => [...(c.change.owning_team ? [c.change.owning_team] : []), ...c.affected_teams]);

  return {
    timeframe: opts.timeframe,
    team_filter: opts.team,
    generated_at: opts.now.toISOString(),
    summary: {
      total_changes: changes.length,
      breaking_changes: count((c) => c.breaking_changes.length > 0),
      reviews_required: count((c) => c.review_required),
      migrations_required: count((c) => c.migration_required),
      blocked_changes: count((c) => c.blocked),
    },
    impact_breakdown: {
      low: count((c) => c.impact_level === "low"),
      medium: count((c) => c.impact_level === "medium"),
      high: count((c) => c.impact_level === "high"),
      critical: count((c) => c.impact_level === "critical"),
    },
    change_types: {
      addition: count((c) => c.change.change_type === "addition"),
      modification: count((c) => c.change.change_type === "modification"),
      removal: count((c) => c.change.change_type === "removal"),
    },
    top_active_repositories: topCounts(changes.map((c) => c.change.repository)).map(([repository, change_count]) => ({
      repository,
      change_count,
    })),
    top_affected_teams: topCounts(teams).map(([team, involvement_count]) => ({ team, involvement_count })),
    recent_changes: changes.slice(0, 10),
    recommendations: recommendationsFor(changes),
  };
}
