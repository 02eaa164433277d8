import fs from "node:fs";
import path from "node:path";
import { ConfigurationError } from "../errors.js";
import { packageRoot } from "../paths.js";
import type { BreakingChange, ImpactTier } from "../types/governance.js";
import type { RawViolation } from "./buf-output.js";

export type BreakingRuleTable = {
  critical: string[];
  high: string[];
  medium: string[];
  migration_notes: Record<string, string>;
  /** Detector rule id → canonical change type used for migration notes. */
  aliases: Record<string, string>;
  default_migration_note: string;
};

const isStringList = (v: unknown): v is string[] => Array.isArray(v) && v.every((x) => typeof x === "string");

const isStringMap = (v: unknown): v is Record<string, string> =>
  typeof v === "object" && v !== null && !Array.isArray(v) && Object.values(v).every((x) => typeof x === "string");

function isRuleTable(v: unknown): v is BreakingRuleTable {
  if (typeof v !== "object" || v === null) return false;
  return (
    "critical" in v && isStringList(v.critical) &&
    "high" in v && isStringList(v.high) &&
    "medium" in v && isStringList(v.medium) &&
    "migration_notes" in v && isStringMap(v.migration_notes) &&
    "aliases" in v && isStringMap(v.aliases) &&
    "default_migration_note" in v && typeof v.default_migration_note === "string"
  );
}

let cached: BreakingRuleTable | null = null;

/** Load the rule → impact table (data/breaking-rules.json unless `file` is given). */
export function loadBreakingRules(file?: string): BreakingRuleTable {
  if (!file && cached) return cached;
  const target = file ?? path.join(packageRoot(), "data", "breaking-rules.json");
  const parsed: unknown = JSON.parse(fs.readFileSync(target, "utf8"));
  if (!isRuleTable(parsed)) throw new ConfigurationError(`Malformed breaking rule table: ${target}`, { path: target });
  if (!file) cached = parsed;
  return parsed;
}

/** Deterministic impact tier for a rule id; unlisted rules are low. */
export function impactFor(type: string, rules: BreakingRuleTable = loadBreakingRules()): ImpactTier {
  if (rules.critical.includes(type)) return "critical";
  if (rules.high.includes(type)) return "high";
  if (rules.medium.includes(type)) return "medium";
  return "low";
}

export function migrationNoteFor(type: string, rules: BreakingRuleTable = loadBreakingRules()): string {
  const canonical = rules.aliases[type] ?? type;
  return rules.migration_notes[canonical] ?? rules.default_migration_note;
}

export function locationOf(v: RawViolation): string {
  return v.line === null ? v.path : `${v.path}:${v.line}`;
}

/** The only place BreakingChange records are constructed. */
export function classifyViolation(
  v: RawViolation,
  repository: string,
  rules: BreakingRuleTable = loadBreakingRules(),
): BreakingChange {
  return {
    type: v.type,
    description: v.message,
    location: locationOf(v),
    impact: impactFor(v.type, rules),
    repository,
    migration_note: migrationNoteFor(v.type, rules),
  };
}
