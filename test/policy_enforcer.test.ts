import { describe, expect, it } from "vitest";
import { ConfigurationError, GovernanceError } from "../src/errors.js";
import { breakingApprovalKey, enforceBreakingChangePolicy, enforceReviewPolicy } from "../src/policy/enforcer.js";
import { orgRepoSuffix, resolveBreakingPolicy, resolveReviewPolicy } from "../src/policy/resolve.js";
import { ConfigTeamDirectory } from "../src/teams/directory.js";
import { TEAMS, T0, breaking, schemaChange, section } from "./helpers.js";

const directory = new ConfigTeamDirectory(TEAMS);
const now = new Date(T0);

describe("review policy", () => {
  it("auto-approves a non-breaking change when auto_approve_minor is set", async () => {
    const s = section({
      review_policies: { default: { required_reviewers: ["@payments"], approval_count: 2, auto_approve_minor: true } },
    });
    const { result, audit } = await enforceReviewPolicy({ section: s, directory, now }, schemaChange(), []);
    expect(result.action).toBe("allow");
    expect(result.has_approval).toBe(true);
    expect(result.reason).toBe("Auto-approved: non-breaking change");
    expect(audit?.action).toBe("auto_approve_minor");
    expect(audit?.timestamp).toBe(T0);
  });

  it("does not auto-approve a breaking change", async () => {
    const s = section({
      review_policies: { default: { required_reviewers: [], approval_count: 1, auto_approve_minor: true } },
    });
    const { result } = await enforceReviewPolicy({ section: s, directory, now }, schemaChange({ breaking: true }), []);
    expect(result.action).toBe("require_approval");
  });

  it("requires an approval when nobody has approved yet", async () => {
    const { result, audit } = await enforceReviewPolicy({ section: section(), directory, now }, schemaChange(), []);
    expect(result.action).toBe("require_approval");
    expect(result.reason).toBe("Requires 1 approvals");
    expect(result.violations).toEqual(["1 more approval required"]);
    expect(audit?.action).toBe("review_required");
    expect(audit?.details).toMatchObject({ policy_key: "default", team: "payments", required_approvals: 1, actual_approvals: 0 });
  });

  it("counts any approver when the policy names no reviewers", async () => {
    const { result, audit } = await enforceReviewPolicy({ section: section(), directory, now }, schemaChange(), ["zed", "zed"]);
    expect(result.action).toBe("allow");
    expect(result.reason).toBe("Approved by 1 reviewers");
    expect(result.actual_approvers).toEqual(["zed"]);
    expect(audit?.action).toBe("review_approved");
    expect(audit?.actor).toBe("zed");
  });

  it("only counts approvers who satisfy a required reviewer", async () => {
    const s = section({
      review_policies: { default: { required_reviewers: ["@payments", "dave"], approval_count: 2, auto_approve_minor: false } },
    });
    const { result } = await enforceReviewPolicy({ section: s, directory, now }, schemaChange(), ["alice", "carol"]);
    expect(result.action).toBe("require_approval");
    expect(result.reason).toBe("Requires 2 approvals from: @payments, dave");
    expect(result.actual_approvers).toEqual(["alice"]);
    expect(result.required_approvers).toEqual(["dave"]);
    expect(result.violations).toEqual(["Approval required from dave"]);
  });

  it("allows once enough qualifying reviewers approved", async () => {
    const s = section({
      review_policies: { default: { required_reviewers: ["@payments", "dave"], approval_count: 2, auto_approve_minor: false } },
    });
    const { result, audit } = await enforceReviewPolicy({ section: s, directory, now }, schemaChange(), ["alice", "dave"]);
    expect(result.action).toBe("allow");
    expect(result.has_approval).toBe(true);
    expect(result.actual_approvers).toEqual(["alice", "dave"]);
    expect(audit?.actor).toBe("alice,dave");
  });

  it("returns a frozen result", async () => {
    const { result } = await enforceReviewPolicy({ section: section(), directory, now }, schemaChange(), []);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.violations)).toBe(true);
  });
});

describe("review policy resolution", () => {
  const strict = { required_reviewers: ["@payments"], approval_count: 2, auto_approve_minor: false };
  const relaxed = { required_reviewers: [], approval_count: 1, auto_approve_minor: true };

  it("prefers the exact repository key, then the org/repo suffix", () => {
    const s = section({
      review_policies: { default: relaxed, "github.com/acme/payments": strict, "acme/orders": strict },
    });
    expect(resolveReviewPolicy(s, "github.com/acme/payments", null).key).toBe("github.com/acme/payments");
    expect(resolveReviewPolicy(s, "gitlab.com/acme/orders", null).key).toBe("acme/orders");
    expect(resolveReviewPolicy(s, "github.com/acme/ledger", null).key).toBe("default");
  });

  it("uses the owning team's override before the default", () => {
    const s = section({
      review_policies: { default: relaxed, strict },
      team_overrides: { payments: { review_policy: "strict" } },
    });
    const resolved = resolveReviewPolicy(s, "github.com/acme/ledger", "payments");
    expect(resolved).toEqual({ key: "strict", policy: strict });
  });

  it("throws ConfigurationError for an override naming an unknown policy", () => {
    const s = section({ team_overrides: { payments: { review_policy: "missing" } } });
    expect(() => resolveReviewPolicy(s, "github.com/acme/ledger", "payments")).toThrow(ConfigurationError);
  });

  it("falls back to the built-in policy without a default", () => {
    const resolved = resolveReviewPolicy(section({ review_policies: {} }), "r", null);
    expect(resolved.policy).toEqual({ required_reviewers: [], approval_count: 1, auto_approve_minor: false });
  });

  it("ignores names inherited from Object.prototype", () => {
    const s = section({ review_policies: { default: relaxed } });
    expect(resolveReviewPolicy(s, "constructor", "toString")).toEqual({ key: "default", policy: relaxed });
    expect(resolveBreakingPolicy(section({ breaking_change_policies: { default: "warn" } }), "constructor", "hasOwnProperty")).toBe("warn");
  });

  it("takes the last two path segments as the suffix", () => {
    expect(orgRepoSuffix("github.com/acme/orders")).toBe("acme/orders");
    expect(orgRepoSuffix("orders")).toBeNull();
  });
});

describe("breaking change policy", () => {
  it("allows an empty list without an audit entry", () => {
    const { result, audit } = enforceBreakingChangePolicy([], { section: section(), now });
    expect(result.action).toBe("allow");
    expect(result.reason).toBe("No breaking changes detected");
    expect(audit).toBeNull();
  });

  it("blocks with one violation per breaking change under error", () => {
    const changes = [breaking(), breaking({ type: "ENUM_VALUE_NO_DELETE", description: "Enum value removed", location: "b.proto:3" })];
    const { result, audit } = enforceBreakingChangePolicy(changes, { section: section(), now });
    expect(result.action).toBe("error");
    expect(result.violations).toEqual([
      'FIELD_NO_DELETE: Previously present field "2" with name "amount" on message "Payment" was deleted.',
      "ENUM_VALUE_NO_DELETE: Enum value removed",
    ]);
    expect(audit?.action).toBe("breaking_changes_blocked");
    expect(audit?.result).toBe("failure");
    expect(audit?.details).toEqual({ policy: "error", breaking_count: 2, repository: "github.com/acme/payments", team: null });
  });

  it("requires approval for an unapproved high-impact change under require_approval", () => {
    const s = section({ breaking_change_policies: { default: "error", "github.com/acme/payments": "require_approval" } });
    const { result, audit } = enforceBreakingChangePolicy([breaking({ impact: "high" })], { section: s, now });
    expect(result.action).toBe("require_approval");
    expect(result.has_approval).toBe(false);
    expect(result.violations).toEqual(["github.com/acme/payments:proto/acme/payments/v1/payment.proto:12"]);
    expect(audit?.action).toBe("breaking_approval_required");
  });

  it("allows once every location has an approval", () => {
    const s = section({ breaking_change_policies: { default: "require_approval" } });
    const change = breaking();
    const approvals = new Map([[breakingApprovalKey(change.repository, change.location), "bob"]]);
    const { result, audit } = enforceBreakingChangePolicy([change, change], { section: s, approvals, now });
    expect(result.action).toBe("allow");
    expect(result.has_approval).toBe(true);
    expect(result.actual_approvers).toEqual(["bob"]);
    expect(audit?.action).toBe("breaking_changes_approved");
    expect(audit?.actor).toBe("bob");
  });

  it("warns without blocking under warn", () => {
    const s = section({ breaking_change_policies: { default: "warn" } });
    const { result, audit } = enforceBreakingChangePolicy([breaking()], { section: s, now });
    expect(result.action).toBe("warn");
    expect(audit?.result).toBe("warning");
  });

  it("applies the team override when the repository has no entry", () => {
    const s = section({ team_overrides: { payments: { breaking_change_policy: "allow" } } });
    const { result } = enforceBreakingChangePolicy([breaking()], { section: s, team: "payments", now });
    expect(result.action).toBe("allow");
    expect(resolveBreakingPolicy(s, "github.com/acme/payments", "orders")).toBe("error");
  });

  it("rejects unknown policy values", () => {
    const s = section({ breaking_change_policies: { default: "sometimes" } });
    expect(() => enforceBreakingChangePolicy([breaking()], { section: s, now })).toThrow(GovernanceError);
    expect(() => enforceBreakingChangePolicy([breaking()], { section: section(), policy: "maybe", now })).toThrow(GovernanceError);
  });

  it("defaults to error with no policies at all", () => {
    expect(resolveBreakingPolicy(section({ breaking_change_policies: {} }), "r")).toBe("error");
  });
});
