import { ConfigurationError, GovernanceError } from "../errors.js";
import type { BreakingPolicyValue, GovernanceSection, ReviewPolicyConfig } from "../types/config.js";

export const BUILTIN_REVIEW_POLICY: Readonly<ReviewPolicyConfig> = Object.freeze({
  required_reviewers: [],
  approval_count: 1,
  auto_approve_minor: false,
});

const BREAKING_POLICY_VALUES: readonly string[] = ["allow", "warn", "error", "require_approval"];

export function isBreakingPolicyValue(v: string): v is BreakingPolicyValue {
  return BREAKING_POLICY_VALUES.includes(v);
}

export type ResolvedReviewPolicy = {
  key: string;
  policy: ReviewPolicyConfig;
};

/** "github.com/acme/orders" → "acme/orders"; null when there are fewer than two segments. */
export function orgRepoSuffix(repository: string): string | null {
  const parts = repository.split("/").filter((p) => p.length > 0);
  return parts.length >= 2 ? parts.slice(-2).join("/") : null;
}

/**
 * Priority: exact repository key, its org/repo suffix, the owning team's
 * override, then "default".
 */
export function resolveReviewPolicy(
  section: GovernanceSection,
  repository: string,
  team: string | null,
): ResolvedReviewPolicy {
  const policies = section.review_policies;
  const exact = ownEntry(policies, repository);
  if (repository && exact) return { key: repository, policy: exact };

  const suffix = orgRepoSuffix(repository);
  const bySuffix = suffix ? ownEntry(policies, suffix) : undefined;
  if (suffix && bySuffix) return { key: suffix, policy: bySuffix };

  const override = team ? ownEntry(section.team_overrides, team)?.review_policy : undefined;
  if (override !== undefined) {
    const policy = ownEntry(policies, override);
    if (!policy) {
      throw new ConfigurationError(`Team ${team} references unknown review policy "${override}"`, {
        team,
        review_policy: override,
      });
    }
    return { key: override, policy };
  }

  return { key: "default", policy: ownEntry(policies, "default") ?? BUILTIN_REVIEW_POLICY };
}

/**
 * Priority: repository key, owning team override, `default`, then "error".
 * Any value outside the four known actions is a GovernanceError.
 */
export function resolveBreakingPolicy(
  section: GovernanceSection,
  repository: string,
  team: string | null = null,
): BreakingPolicyValue {
  const raw =
    ownEntry(section.breaking_change_policies, repository) ??
    (team ? ownEntry(section.team_overrides, team)?.breaking_change_policy : undefined) ??
    ownEntry(section.breaking_change_policies, "default") ??
    "error";
  return checkBreakingPolicy(raw);
}

/** Config maps are keyed by repository and team names; inherited keys such as "constructor" never match. */
export function ownEntry<T>(map: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  return map && Object.hasOwn(map, key) ? map[key] : undefined;
}

export function checkBreakingPolicy(value: string): BreakingPolicyValue {
  if (!isBreakingPolicyValue(value)) {
    throw new GovernanceError(`Unknown breaking change policy: ${value}`, { policy: value });
  }
  return value;
}
