import type { ReviewDetails } from "../review/workflow.js";
import type { ApprovalStatus, CommentType, ReviewComment, ReviewRequest } from "../types/review.js";
import type { Engine } from "./context.js";
import { runCommand, type CommandResult } from "./result.js";

export const COMMENT_TYPES: readonly CommentType[] = ["general", "approval", "rejection", "question"];

export async function createReview(
  engine: Engine,
  opts: { target: string; reviewers: string[]; approvals?: number; description?: string; by?: string; changeId?: string },
): Promise<CommandResult<ReviewRequest>> {
  return runCommand(() =>
    engine.reviews.createReviewRequest({
      target: opts.target,
      reviewers: opts.reviewers,
      approval_count: opts.approvals,
      description: opts.description,
      created_by: opts.by,
      change_id: opts.changeId ?? null,
    }),
  );
}

/** Approving a review linked to a change also refreshes that change's approval status. */
export async function approveReview(
  engine: Engine,
  opts: { id: string; reviewer: string; comment?: string },
): Promise<CommandResult<{ review: ReviewRequest; recorded: boolean }>> {
  return runCommand(async () => {
    const res = await engine.reviews.approve(opts.id, opts.reviewer, opts.comment);
    await syncLinkedChange(engine, res.review);
    return res;
  });
}

export async function rejectReview(
  engine: Engine,
  opts: { id: string; reviewer: string; reason: string },
): Promise<CommandResult<ReviewRequest>> {
  return runCommand(async () => {
    const review = await engine.reviews.reject(opts.id, opts.reviewer, opts.reason);
    await syncLinkedChange(engine, review);
    return review;
  });
}

export async function cancelReview(
  engine: Engine,
  opts: { id: string; actor: string; reason?: string },
): Promise<CommandResult<ReviewRequest>> {
  return runCommand(async () => {
    const review = await engine.reviews.cancel(opts.id, opts.actor, opts.reason);
    await syncLinkedChange(engine, review);
    return review;
  });
}

export async function commentOnReview(
  engine: Engine,
  opts: { id: string; author: string; content: string; type?: CommentType },
): Promise<CommandResult<ReviewComment>> {
  return runCommand(() => engine.reviews.addComment(opts.id, opts.author, opts.content, opts.type));
}

export async function reviewStatus(engine: Engine, id: string): Promise<CommandResult<ApprovalStatus>> {
  return runCommand(() => engine.reviews.checkApprovalStatus(id));
}

export async function listReviews(engine: Engine, reviewer?: string): Promise<CommandResult<ReviewRequest[]>> {
  return runCommand(() => engine.reviews.listPendingReviews(reviewer));
}

export async function showReview(engine: Engine, id: string): Promise<CommandResult<ReviewDetails>> {
  return runCommand(() => engine.reviews.getReviewDetails(id));
}

async function syncLinkedChange(engine: Engine, review: ReviewRequest): Promise<void> {
  if (!review.change_id) return;
  if (!(await engine.store.changes.get(review.change_id))) {
    console.warn(`[review] Review ${review.id} links to unknown change ${review.change_id}`);
    return;
  }
  await engine.tracker.syncReviewStatus(review.change_id);
}
