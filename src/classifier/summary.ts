import path from "node:path";
import type { BreakingChange, ImpactLevel, ImpactTier } from "../types/governance.js";

export type BreakingImpactSummary = {
  overall_impact: ImpactLevel;
  breaking_change_count: number;
  counts: Record<ImpactTier, number>;
  by_type: Record<string, number>;
  affected_components: string[];
  migration_complexity: "none" | "low" | "medium" | "high";
  recommendations: string[];
};

const TIER_ORDER: readonly ImpactTier[] = ["critical", "high", "medium", "low"];

/** "proto/acme/orders/v1/order.proto:12" → "order" */
export function componentOf(location: string): string {
  const file = location.split(":")[0];
  return file.includes("/") ? path.parse(file).name : file;
}

export function summarizeBreakingChanges(changes: readonly BreakingChange[]): BreakingImpactSummary {
  const counts: Record<ImpactTier, number> = { critical: 0, high: 0, medium: 0, low: 0 };
  const byType: Record<string, number> = {};
  for (const c of changes) {
    counts[c.impact]++;
    byType[c.type] = (byType[c.type] ?? 0) + 1;
  }

  const overall: ImpactLevel = changes.length === 0 ? "none" : TIER_ORDER.find((t) => counts[t] > 0) ?? "low";

  return {
    overall_impact: overall,
    breaking_change_count: changes.length,
    counts,
    by_type: byType,
    affected_components: [...new Set(changes.map((c) => componentOf(c.location)))].sort(),
    migration_complexity: migrationComplexity(changes, counts),
    recommendations: recommendationsFor(overall, changes.length),
  };
}

function migrationComplexity(
  changes: readonly BreakingChange[],
  counts: Record<ImpactTier, number>,
): BreakingImpactSummary["migration_complexity"] {
  if (changes.length === 0) return "none";
  if (counts.critical + counts.high > 0) return "high";
  if (counts.medium > 2 || changes.length > 5) return "medium";
  return "low";
}

function recommendationsFor(overall: ImpactLevel, count: number): string[] {
  if (count === 0) return [];
  const out: string[] = [];
  if (overall === "critical" || overall === "high") {
    out.push("Consider phasing the migration over multiple releases");
    out.push("Implement comprehensive testing before deployment");
    out.push("Prepare detailed communication plan for affected teams");
  }
  if (overall !== "low") {
    out.push("Review impact with all downstream consumers");
    out.push("Consider providing migration tooling or scripts");
  }
  out.push("Update API documentation to reflect changes");
  out.push("Monitor for migration-related issues post-deployment");
  return out;
}

const titleCase = (s: string): string => s.charAt(0).toUpperCase() + s.slice(1);

/** Markdown migration guide grouped by component. */
export function renderMigrationGuide(
  changes: readonly BreakingChange[],
  repository: string,
  generatedAt: string = new Date().toISOString(),
): string {
  const summary = summarizeBreakingChanges(changes);
  const byComponent = new Map<string, BreakingChange[]>();
  for (const c of changes) {
    const key = componentOf(c.location);
    byComponent.set(key, [...(byComponent.get(key) ?? []), c]);
  }

  const out: string[] = [
    "# Migration Guide",
    "",
    `**Repository:** ${repository}`,
    `**Generated:** ${generatedAt}`,
    `**Breaking Changes:** ${changes.length}`,
    "",
    "## Summary",
    "",
    `This migration guide covers ${changes.length} breaking changes across ${byComponent.size} components.`,
    "",
    `**Overall Impact:** ${titleCase(summary.overall_impact)}`,
    `**Migration Complexity:** ${titleCase(summary.migration_complexity)}`,
    "",
    "## Changes by Component",
  ];

  for (const [component, items] of byComponent) {
    out.push("", `### ${component}`);
    for (const c of items) {
      out.push("", `#### ${c.type}`, "", `**Location:** ${c.location}`, `**Impact:** ${titleCase(c.impact)}`, "", c.description);
      if (c.before !== undefined && c.after !== undefined) {
        out.push("", "**Before:**", "```protobuf", c.before, "```", "", "**After:**", "```protobuf", c.after, "```");
      }
      if (c.migration_note) out.push("", "**Migration Steps:**", c.migration_note);
    }
  }

  if (summary.recommendations.length > 0) {
    out.push("", "## Recommendations", "");
    summary.recommendations.forEach((rec, i) => out.push(`${i + 1}. ${rec}`));
  }

  return out.join("\n") + "\n";
}
