import { beforeEach, describe, expect, it, vi } from "vitest";
import { breakingApprovalKey } from "../src/policy/enforcer.js";
import { GovernanceService } from "../src/policy/service.js";
import { MemoryStore } from "../src/store/memory-store.js";
import { ConfigTeamDirectory } from "../src/teams/directory.js";
import { TEAMS, breaking, schemaChange, section, steppingClock } from "./helpers.js";

const PAYMENTS = "github.com/acme/payments";
const LOCATION = "proto/acme/payments/v1/payment.proto:12";

describe("governance service", () => {
  let store: MemoryStore;
  let service: GovernanceService;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => {});
    store = new MemoryStore();
    service = new GovernanceService(
      store,
      section({ breaking_change_policies: { default: "require_approval" } }),
      new ConfigTeamDirectory(TEAMS),
      { clock: steppingClock() },
    );
    return () => vi.restoreAllMocks();
  });

  it("records the first approval of a location and keeps it", async () => {
    const first = await service.approveBreakingChanges("buf.build/acme/payments", PAYMENTS, "bob", LOCATION);
    expect(first.created).toBe(true);
    expect(first.approval).toEqual({
      repository: PAYMENTS,
      location: LOCATION,
      target: "buf.build/acme/payments",
      approver: "bob",
      timestamp: "2026-03-02T10:00:00.000Z",
    });

    const second = await service.approveBreakingChanges("buf.build/acme/payments", PAYMENTS, "alice", LOCATION);
    expect(second.created).toBe(false);
    expect(second.approval.approver).toBe("bob");

    const audit = await store.readAudit();
    expect(audit).toHaveLength(1);
    expect(audit[0]).toMatchObject({ action: "breaking_changes_approved", actor: "bob", details: { repository: PAYMENTS, location: LOCATION } });
    expect(console.info).toHaveBeenLastCalledWith(`[policy] ${PAYMENTS}:${LOCATION} already approved by bob`);
  });

  it("approves the whole target when no location is given", async () => {
    const { approval } = await service.approveBreakingChanges("buf.build/acme/payments", PAYMENTS, "bob");
    expect(approval.location).toBe("buf.build/acme/payments");
    expect(await store.breakingApprovals.get(breakingApprovalKey(PAYMENTS, "buf.build/acme/payments"))).not.toBeNull();
  });

  it("allows breaking changes once they are approved and audits each decision", async () => {
    const before = await service.enforceBreakingChangePolicy([breaking()], { team: "payments" });
    expect(before.action).toBe("require_approval");

    await service.approveBreakingChanges("buf.build/acme/payments", PAYMENTS, "bob", LOCATION);
    const after = await service.enforceBreakingChangePolicy([breaking()], { team: "payments" });
    expect(after.action).toBe("allow");
    expect((await store.readAudit()).map((a) => a.action)).toEqual([
      "breaking_approval_required",
      "breaking_changes_approved",
      "breaking_changes_approved",
    ]);
  });

  it("honours an explicit policy over configuration", async () => {
    const result = await service.enforceBreakingChangePolicy([breaking()], { policy: "warn" });
    expect(result.action).toBe("warn");
  });

  it("counts approvals from reviews linked to the change", async () => {
    await store.reviews.compareAndSwap("REV_1", 0, {
      id: "REV_1",
      target: "buf.build/acme/payments",
      change_id: "CHG_1",
      description: "",
      requested_reviewers: [{ kind: "individual", name: "bob" }],
      reviewers: ["bob"],
      approval_count: 1,
      status: "approved",
      approvals: [{ reviewer: "bob", timestamp: "2026-03-02T10:00:00.000Z", comment: null }],
      comments: [],
      created_by: "alice",
      created_at: "2026-03-02T10:00:00.000Z",
      updated_at: "2026-03-02T10:00:00.000Z",
      resolved_at: "2026-03-02T10:00:00.000Z",
    });

    const linked = await service.enforceReviewPolicy(schemaChange({ id: "CHG_1" }));
    expect(linked.action).toBe("allow");
    expect(linked.actual_approvers).toEqual(["bob"]);

    const other = await service.enforceReviewPolicy(schemaChange({ id: "CHG_2" }));
    expect(other.action).toBe("require_approval");
  });

  it("reports over the stored audit trail", async () => {
    await service.enforceBreakingChangePolicy([breaking()], { team: "payments" });
    const report = await service.generateComplianceReport("1d");
    expect(report.total_records).toBe(1);
    expect(report.details.by_action).toEqual({ breaking_approval_required: 1 });
  });
});
