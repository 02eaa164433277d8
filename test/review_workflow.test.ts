import { beforeEach, describe, expect, it, vi } from "vitest";
import { ReviewWorkflowError } from "../src/errors.js";
import { applyReviewEvent } from "../src/review/state-machine.js";
import { ReviewWorkflow, approvalStatusOf, type ReviewNotification } from "../src/review/workflow.js";
import { MemoryStore } from "../src/store/memory-store.js";
import { ConfigTeamDirectory, type TeamDirectory } from "../src/teams/directory.js";
import type { TeamMember, TeamSettings } from "../src/types/config.js";
import { TEAMS, steppingClock } from "./helpers.js";

function counterIds(): () => string {
  let n = 0;
  return () => `r${++n}`;
}

describe("review workflow", () => {
  let store: MemoryStore;
  let events: ReviewNotification[];
  let workflow: ReviewWorkflow;

  beforeEach(() => {
    store = new MemoryStore();
    events = [];
    workflow = new ReviewWorkflow(store, new ConfigTeamDirectory(TEAMS), {
      clock: steppingClock(),
      newId: counterIds(),
      listener: async (n) => {
        events.push(n);
      },
    });
  });

  it("approves only after the required number of approvals", async () => {
    const review = await workflow.createReviewRequest({ target: "buf.build/acme/payments", reviewers: ["alice", "bob"], approval_count: 2 });
    expect(review.status).toBe("pending");

    const first = await workflow.approve(review.id, "alice");
    expect(first.recorded).toBe(true);
    expect(first.review.status).toBe("pending");
    expect(first.review.resolved_at).toBeNull();

    const second = await workflow.approve(review.id, "bob", "LGTM");
    expect(second.review.status).toBe("approved");
    expect(second.review.resolved_at).not.toBeNull();
    expect(second.review.comments.map((c) => [c.author, c.comment_type, c.content])).toEqual([["bob", "approval", "LGTM"]]);
    expect(events.map((e) => e.event_type)).toEqual(["review_requested", "review_approved"]);
  });

  it("treats a repeated approval as a no-op", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice", "bob"], approval_count: 2 });
    await workflow.approve(review.id, "alice");
    const before = await store.reviews.get(review.id);

    const again = await workflow.approve(review.id, "alice");
    expect(again.recorded).toBe(false);
    expect(again.review.approvals).toHaveLength(1);
    expect((await store.reviews.get(review.id))?.version).toBe(before?.version);
  });

  it("still answers a repeated approval after the review is approved", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice"] });
    await workflow.approve(review.id, "alice");
    const again = await workflow.approve(review.id, "alice");
    expect(again).toMatchObject({ recorded: false, review: { status: "approved" } });
  });

  it("leaves terminal reviews untouched", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice", "bob"] });
    await workflow.approve(review.id, "alice");

    await expect(workflow.reject(review.id, "bob", "too late")).rejects.toMatchObject({ reason: "invalid_transition" });
    await expect(workflow.approve(review.id, "bob")).rejects.toMatchObject({ reason: "invalid_transition" });
    await expect(workflow.addComment(review.id, "bob", "hello")).rejects.toMatchObject({ reason: "invalid_transition" });
    await expect(workflow.cancel(review.id, "system")).rejects.toMatchObject({ reason: "invalid_transition" });

    const stored = await workflow.getReview(review.id);
    expect(stored?.status).toBe("approved");
    expect(stored?.approvals.map((a) => a.reviewer)).toEqual(["alice"]);
  });

  it("rejects approvals from users who are not reviewers", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice"] });
    await expect(workflow.approve(review.id, "mallory")).rejects.toBeInstanceOf(ReviewWorkflowError);
    await expect(workflow.approve(review.id, "mallory")).rejects.toMatchObject({ reason: "unauthorized" });
  });

  it("reports unknown reviews as not_found", async () => {
    await expect(workflow.approve("missing", "alice")).rejects.toMatchObject({ reason: "not_found" });
    await expect(workflow.checkApprovalStatus("missing")).rejects.toMatchObject({ code: "REVIEW_NOT_FOUND" });
  });

  it("expands teams to qualifying members and keeps unknown teams as references", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const review = await workflow.createReviewRequest({ target: "t", reviewers: ["@payments", "@ghost", "dave"] });
      expect(review.reviewers).toEqual(["alice", "bob", "@ghost", "dave"]);
      expect(review.requested_reviewers).toEqual([
        { kind: "team", name: "payments" },
        { kind: "team", name: "ghost" },
        { kind: "individual", name: "dave" },
      ]);
      expect(warn).toHaveBeenCalledWith("[review] Team ghost not found, keeping as a team reference");

      await expect(workflow.approve(review.id, "carol")).rejects.toMatchObject({ reason: "unauthorized" });
      const res = await workflow.approve(review.id, "bob");
      expect(res.review.status).toBe("approved");
    } finally {
      warn.mockRestore();
    }
  });

  it("resolves team membership at approval time", async () => {
    const members: TeamMember[] = [{ username: "alice", role: "maintainer" }];
    const directory: TeamDirectory = {
      resolveTeam: async (name) => (name === "platform" ? members.map((m) => ({ ...m })) : null),
      findOwningTeam: async () => null,
      teamSettings: async (): Promise<TeamSettings> => ({}),
    };
    const live = new ReviewWorkflow(store, directory, { clock: steppingClock(), newId: counterIds() });
    const review = await live.createReviewRequest({ target: "t", reviewers: ["@platform"] });
    expect(review.reviewers).toEqual(["alice"]);

    members.push({ username: "zoe", role: "admin" });
    const res = await live.approve(review.id, "zoe");
    expect(res.review.status).toBe("approved");
  });

  it("keeps every approval under concurrent approvers", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice", "bob", "dave"], approval_count: 3 });
    const results = await Promise.all([
      workflow.approve(review.id, "alice"),
      workflow.approve(review.id, "bob"),
      workflow.approve(review.id, "dave"),
    ]);

    expect(results.every((r) => r.recorded)).toBe(true);
    const stored = await workflow.getReview(review.id);
    expect(stored?.status).toBe("approved");
    expect(stored?.approvals.map((a) => a.reviewer).sort()).toEqual(["alice", "bob", "dave"]);
    expect(events.filter((e) => e.event_type === "review_approved")).toHaveLength(1);
  });

  it("records a rejection with its reason", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["@orders"] });
    const rejected = await workflow.reject(review.id, "dave", "field rename breaks mobile clients");
    expect(rejected.status).toBe("rejected");
    expect(rejected.comments.at(-1)).toMatchObject({ author: "dave", comment_type: "rejection", content: "field rename breaks mobile clients" });
    expect(events.at(-1)).toMatchObject({ event_type: "review_rejected", actor: "dave", reason: "field rename breaks mobile clients" });
  });

  it("lets the creator cancel but not a stranger", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice"], created_by: "zed" });
    await expect(workflow.cancel(review.id, "mallory")).rejects.toMatchObject({ reason: "unauthorized" });
    const cancelled = await workflow.cancel(review.id, "zed", "superseded");
    expect(cancelled.status).toBe("cancelled");
    expect(cancelled.comments.map((c) => c.content)).toEqual(["superseded"]);
  });

  it("adds comments and rejects empty ones", async () => {
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice"] });
    const added = await workflow.addComment(review.id, "carol", "Does this affect the refunds API?", "question");
    expect(added).toMatchObject({ author: "carol", comment_type: "question" });
    await expect(workflow.addComment(review.id, "carol", "   ")).rejects.toMatchObject({ reason: "invalid_request" });

    const details = await workflow.getReviewDetails(review.id);
    expect(details.comments).toHaveLength(1);
    expect(details.approval_status.is_approved).toBe(false);
  });

  it("validates the request", async () => {
    await expect(workflow.createReviewRequest({ target: "t", reviewers: [] })).rejects.toMatchObject({ reason: "invalid_request" });
    await expect(workflow.createReviewRequest({ target: "t", reviewers: ["alice"], approval_count: 0 })).rejects.toMatchObject({
      reason: "invalid_request",
    });
  });

  it("reuses the pending review for the same target", async () => {
    const first = await workflow.createOrGetReviewRequest({ target: "t", reviewers: ["alice"] });
    const second = await workflow.createOrGetReviewRequest({ target: "t", reviewers: ["bob"] });
    expect(second.id).toBe(first.id);
  });

  it("lists pending reviews a user can still approve, oldest first", async () => {
    const a = await workflow.createReviewRequest({ target: "a", reviewers: ["alice", "bob"], approval_count: 2 });
    const b = await workflow.createReviewRequest({ target: "b", reviewers: ["@payments"], approval_count: 2 });
    const c = await workflow.createReviewRequest({ target: "c", reviewers: ["dave"] });
    await workflow.approve(a.id, "bob");

    expect((await workflow.listPendingReviews()).map((r) => r.id)).toEqual([a.id, b.id, c.id]);
    expect((await workflow.listPendingReviews("bob")).map((r) => r.id)).toEqual([b.id]);
    expect((await workflow.listPendingReviews("alice")).map((r) => r.id)).toEqual([a.id, b.id]);
  });

  it("does not fail the operation when the listener throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    try {
      const failing = new ReviewWorkflow(store, new ConfigTeamDirectory(TEAMS), {
        clock: steppingClock(),
        newId: counterIds(),
        listener: async () => {
          throw new Error("bus down");
        },
      });
      const review = await failing.createReviewRequest({ target: "t", reviewers: ["alice"] });
      expect(review.status).toBe("pending");
      expect(warn).toHaveBeenCalledWith("[review] review_requested notification for r1 failed: bus down");
    } finally {
      warn.mockRestore();
    }
  });
});

describe("approval status", () => {
  it("lists reviewers who have not approved yet", async () => {
    const workflow = new ReviewWorkflow(new MemoryStore(), new ConfigTeamDirectory(TEAMS), { newId: counterIds() });
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice", "bob"], approval_count: 2 });
    const { review: updated } = await workflow.approve(review.id, "alice");
    expect(approvalStatusOf(updated)).toEqual({
      review_id: "r1",
      status: "pending",
      is_approved: false,
      approval_count: 1,
      required_count: 2,
      approvers: ["alice"],
      pending_reviewers: ["bob"],
    });
  });

  it("reports a no-op for a repeat approval in the state machine", async () => {
    const workflow = new ReviewWorkflow(new MemoryStore(), new ConfigTeamDirectory(TEAMS), { newId: counterIds() });
    const review = await workflow.createReviewRequest({ target: "t", reviewers: ["alice", "bob"], approval_count: 2 });
    const { review: updated } = await workflow.approve(review.id, "alice");
    const outcome = applyReviewEvent(updated, { type: "approve", reviewer: "alice", comment: null, commentId: "x" }, new Date());
    expect(outcome.kind).toBe("noop");
  });
});
