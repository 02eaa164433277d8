import { randomUUID } from "node:crypto";
import { ReviewWorkflowError, errorMessage } from "../errors.js";
import { DEFAULT_MAX_RETRIES, mutate, type GovernanceStore } from "../store/store.js";
import {
  formatReviewer,
  isAuthorizedReviewer,
  parseReviewer,
  qualifyingMembers,
  type TeamDirectory,
} from "../teams/directory.js";
import type { ReviewNotificationPayload } from "../types/change.js";
import type { ApprovalStatus, CommentType, ReviewComment, ReviewRequest, Reviewer } from "../types/review.js";
import { applyReviewEvent, hasApproved, isTerminal, type ReviewEvent } from "./state-machine.js";

export type ReviewEventType = ReviewNotificationPayload["type"];

export type ReviewNotification = {
  event_type: ReviewEventType;
  review_id: string;
  target: string;
  change_id: string | null;
  reviewers: string[];
  /** Teams named in the request, without the `@`. */
  teams: string[];
  actor: string;
  reason: string | null;
  timestamp: string;
};

/** Called after a review event is stored. Failures are logged, never rolled back. */
export type ReviewListener = (notification: ReviewNotification) => Promise<void>;

export type CreateReviewInput = {
  target: string;
  /** "alice" or "@platform"; tagged reviewers are taken as given. */
  reviewers: ReadonlyArray<string | Reviewer>;
  approval_count?: number;
  description?: string;
  created_by?: string;
  change_id?: string | null;
};

export type ReviewDetails = {
  review: ReviewRequest;
  comments: ReviewComment[];
  approval_status: ApprovalStatus;
};

export type ReviewWorkflowOptions = {
  clock?: () => Date;
  maxRetries?: number;
  newId?: () => string;
  listener?: ReviewListener;
};

const shortId = (): string => randomUUID().slice(0, 8);

export class ReviewWorkflow {
  private readonly clock: () => Date;
  private readonly maxRetries: number;
  private readonly newId: () => string;
  private readonly listener: ReviewListener | null;

  constructor(
    private readonly store: GovernanceStore,
    private readonly directory: TeamDirectory,
    opts: ReviewWorkflowOptions = {},
  ) {
    this.clock = opts.clock ?? (() => new Date());
    this.maxRetries = opts.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.newId = opts.newId ?? shortId;
    this.listener = opts.listener ?? null;
  }

  async createReviewRequest(input: CreateReviewInput): Promise<ReviewRequest> {
    const requested = dedupeReviewers(input.reviewers.map((r) => (typeof r === "string" ? parseReviewer(r) : r)));
    if (requested.length === 0 || requested.some((r) => r.name.length === 0)) {
      throw new ReviewWorkflowError("At least one reviewer is required", "invalid_request", { target: input.target });
    }
    const approvalCount = input.approval_count ?? 1;
    if (!Number.isInteger(approvalCount) || approvalCount < 1) {
      throw new ReviewWorkflowError(`approval_count must be a positive integer, got ${approvalCount}`, "invalid_request", {
        target: input.target,
      });
    }

    const now = this.clock().toISOString();
    const review: ReviewRequest = {
      id: this.newId(),
      target: input.target,
      change_id: input.change_id ?? null,
      description: input.description ?? "",
      requested_reviewers: requested,
      reviewers: await this.expandReviewers(requested),
      approval_count: approvalCount,
      status: "pending",
      approvals: [],
      comments: [],
      created_by: input.created_by ?? "system",
      created_at: now,
      updated_at: now,
      resolved_at: null,
    };

    await this.store.reviews.compareAndSwap(review.id, 0, review);
    console.info(`[review] Created review request ${review.id} for ${review.target}`);
    await this.emit("review_requested", review, review.created_by, null);
    return review;
  }

  /** Returns the pending review for the same target when one exists. */
  async createOrGetReviewRequest(input: CreateReviewInput): Promise<ReviewRequest> {
    const existing = await this.findPendingReview(input.target);
    if (existing) {
      console.info(`[review] Found existing review request ${existing.id} for ${input.target}`);
      return existing;
    }
    return this.createReviewRequest(input);
  }

  /**
   * Records an approval. A second approval by the same reviewer returns
   * `recorded: false` and changes nothing.
   */
  async approve(reviewId: string, reviewer: string, comment?: string): Promise<{ review: ReviewRequest; recorded: boolean }> {
    const current = await this.require(reviewId);
    if (hasApproved(current, reviewer)) {
      console.warn(`[review] Review ${reviewId} already approved by ${reviewer}`);
      return { review: current, recorded: false };
    }
    this.assertOpen(current);
    await this.assertAuthorized(current, reviewer);

    const { review, written, statusChanged } = await this.apply(reviewId, {
      type: "approve",
      reviewer,
      comment: comment ?? null,
      commentId: this.newId(),
    });

    if (!written) return { review, recorded: false };
    if (statusChanged) {
      console.info(`[review] Review ${reviewId} fully approved with ${review.approvals.length} approvals`);
      await this.emit("review_approved", review, reviewer, null);
    } else {
      console.info(`[review] Review ${reviewId} approved by ${reviewer} (${review.approvals.length}/${review.approval_count})`);
    }
    return { review, recorded: true };
  }

  async reject(reviewId: string, reviewer: string, reason: string): Promise<ReviewRequest> {
    const current = await this.require(reviewId);
    this.assertOpen(current);
    await this.assertAuthorized(current, reviewer);

    const { review } = await this.apply(reviewId, { type: "reject", reviewer, reason, commentId: this.newId() });
    console.info(`[review] Review ${reviewId} rejected by ${reviewer}: ${reason}`);
    await this.emit("review_rejected", review, reviewer, reason);
    return review;
  }

  /** Allowed for the creator or any authorized reviewer. */
  async cancel(reviewId: string, actor: string, reason?: string): Promise<ReviewRequest> {
    const current = await this.require(reviewId);
    this.assertOpen(current);
    if (current.created_by !== actor) await this.assertAuthorized(current, actor);

    const { review } = await this.apply(reviewId, { type: "cancel", actor, reason: reason ?? null, commentId: this.newId() });
    console.info(`[review] Review ${reviewId} cancelled by ${actor}`);
    await this.emit("review_cancelled", review, actor, reason ?? null);
    return review;
  }

  async addComment(
    reviewId: string,
    author: string,
    content: string,
    commentType: CommentType = "general",
  ): Promise<ReviewComment> {
    if (!content.trim()) throw new ReviewWorkflowError("Comment content is empty", "invalid_request", { review_id: reviewId });
    const current = await this.require(reviewId);
    this.assertOpen(current);

    const commentId = this.newId();
    const { review } = await this.apply(reviewId, { type: "comment", author, content, commentType, commentId });
    const added = review.comments.find((c) => c.id === commentId);
    if (!added) throw new ReviewWorkflowError(`Comment was not stored on ${reviewId}`, "invalid_transition", { review_id: reviewId });
    console.info(`[review] Added comment to review ${reviewId} by ${author}`);
    return added;
  }

  async checkApprovalStatus(reviewId: string): Promise<ApprovalStatus> {
    return approvalStatusOf(await this.require(reviewId));
  }

  /**
   * Pending reviews, oldest first. With `reviewer`, only those the user may
   * approve and has not approved yet.
   */
  async listPendingReviews(reviewer?: string): Promise<ReviewRequest[]> {
    const rows = await this.store.reviews.list();
    const out: ReviewRequest[] = [];
    for (const { entry } of rows) {
      const review = entry.value;
      if (review.status !== "pending") continue;
      if (reviewer !== undefined) {
        if (hasApproved(review, reviewer)) continue;
        const listed = review.reviewers.includes(reviewer);
        if (!listed && !(await isAuthorizedReviewer(this.directory, reviewer, review.requested_reviewers))) continue;
      }
      out.push(review);
    }
    return out.sort((a, b) => a.created_at.localeCompare(b.created_at));
  }

  async getReviewDetails(reviewId: string): Promise<ReviewDetails> {
    const review = await this.require(reviewId);
    return { review, comments: review.comments, approval_status: approvalStatusOf(review) };
  }

  async getReview(reviewId: string): Promise<ReviewRequest | null> {
    return (await this.store.reviews.get(reviewId))?.value ?? null;
  }

  private async findPendingReview(target: string): Promise<ReviewRequest | null> {
    const rows = await this.store.reviews.list();
    const match = rows.find(({ entry }) => entry.value.target === target && entry.value.status === "pending");
    return match ? match.entry.value : null;
  }

  /** Creation-time snapshot of who may approve; unknown teams stay as `@team`. */
  private async expandReviewers(requested: readonly Reviewer[]): Promise<string[]> {
    const out: string[] = [];
    const add = (name: string) => {
      if (!out.includes(name)) out.push(name);
    };
    for (const r of requested) {
      if (r.kind === "individual") {
        add(r.name);
        continue;
      }
      const members = await qualifyingMembers(this.directory, r.name);
      if (members === null) {
        console.warn(`[review] Team ${r.name} not found, keeping as a team reference`);
        add(formatReviewer(r));
      } else {
        members.forEach(add);
      }
    }
    return out;
  }

  private async require(reviewId: string): Promise<ReviewRequest> {
    const entry = await this.store.reviews.get(reviewId);
    if (!entry) throw new ReviewWorkflowError(`Review request ${reviewId} not found`, "not_found", { review_id: reviewId });
    return entry.value;
  }

  private assertOpen(review: ReviewRequest): void {
    if (isTerminal(review.status)) {
      throw new ReviewWorkflowError(`Review ${review.id} is already ${review.status}`, "invalid_transition", {
        review_id: review.id,
        status: review.status,
      });
    }
  }

  private async assertAuthorized(review: ReviewRequest, user: string): Promise<void> {
    if (await isAuthorizedReviewer(this.directory, user, review.requested_reviewers)) return;
    throw new ReviewWorkflowError(`User ${user} is not authorized to review ${review.id}`, "unauthorized", {
      review_id: review.id,
      user,
    });
  }

  /** Optimistic compare-and-swap of one event; a concurrent terminal transition surfaces as invalid_transition. */
  private async apply(
    reviewId: string,
    event: ReviewEvent,
  ): Promise<{ review: ReviewRequest; written: boolean; statusChanged: boolean }> {
    let statusChanged = false;
    const now = this.clock();
    const res = await mutate(
      this.store.reviews,
      reviewId,
      (current) => {
        if (!current) throw new ReviewWorkflowError(`Review request ${reviewId} not found`, "not_found", { review_id: reviewId });
        const outcome = applyReviewEvent(current, event, now);
        if (outcome.kind === "invalid") {
          throw new ReviewWorkflowError(outcome.reason, "invalid_transition", { review_id: reviewId, status: current.status });
        }
        if (outcome.kind === "noop") return null;
        statusChanged = outcome.statusChanged;
        return outcome.review;
      },
      this.maxRetries,
    );
    if (!res.value) throw new ReviewWorkflowError(`Review request ${reviewId} not found`, "not_found", { review_id: reviewId });
    return { review: res.value, written: res.written, statusChanged: res.written && statusChanged };
  }

  private async emit(type: ReviewEventType, review: ReviewRequest, actor: string, reason: string | null): Promise<void> {
    if (!this.listener) return;
    try {
      await this.listener({
        event_type: type,
        review_id: review.id,
        target: review.target,
        change_id: review.change_id,
        reviewers: review.reviewers,
        teams: review.requested_reviewers.filter((r) => r.kind === "team").map((r) => r.name),
        actor,
        reason,
        timestamp: this.clock().toISOString(),
      });
    } catch (e) {
      console.warn(`[review] ${type} notification for ${review.id} failed: ${errorMessage(e)}`);
    }
  }
}

export function approvalStatusOf(review: ReviewRequest): ApprovalStatus {
  const approvers = review.approvals.map((a) => a.reviewer);
  return {
    review_id: review.id,
    status: review.status,
    is_approved: review.status === "approved",
    approval_count: approvers.length,
    required_count: review.approval_count,
    approvers,
    pending_reviewers: review.reviewers.filter((r) => !approvers.includes(r)),
  };
}

function dedupeReviewers(reviewers: readonly Reviewer[]): Reviewer[] {
  const seen = new Set<string>();
  return reviewers.filter((r) => {
    const key = formatReviewer(r);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}
