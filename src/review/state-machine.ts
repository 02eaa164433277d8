import type { CommentType, ReviewComment, ReviewRequest, ReviewStatus } from "../types/review.js";

export const TERMINAL_STATUSES: ReadonlySet<ReviewStatus> = new Set<ReviewStatus>(["approved", "rejected", "cancelled"]);

export const isTerminal = (status: ReviewStatus): boolean => TERMINAL_STATUSES.has(status);

/**
 * Events that drive a review. Authorization is checked by the caller before
 * the event is applied; the transition itself only looks at review state.
 */
export type ReviewEvent =
  | { type: "approve"; reviewer: string; comment: string | null; commentId: string }
  | { type: "reject"; reviewer: string; reason: string; commentId: string }
  | { type: "cancel"; actor: string; reason: string | null; commentId: string }
  | { type: "comment"; author: string; content: string; commentType: CommentType; commentId: string };

export type TransitionOutcome =
  | { kind: "applied"; review: ReviewRequest; statusChanged: boolean }
  | { kind: "noop"; review: ReviewRequest }
  | { kind: "invalid"; reason: string };

export const hasApproved = (review: ReviewRequest, reviewer: string): boolean =>
  review.approvals.some((a) => a.reviewer === reviewer);

function comment(id: string, author: string, content: string, type: CommentType, at: string): ReviewComment {
  return { id, author, content, comment_type: type, timestamp: at };
}

function resolve(review: ReviewRequest, status: ReviewStatus, at: string, extra: ReviewComment[]): ReviewRequest {
  return { ...review, status, updated_at: at, resolved_at: at, comments: [...review.comments, ...extra] };
}

/**
 * Pure function: given a review and an event, return the next review.
 * Terminal reviews accept nothing; a repeat approval is a no-op.
 */
export function applyReviewEvent(review: ReviewRequest, event: ReviewEvent, now: Date): TransitionOutcome {
  const at = now.toISOString();

  if (event.type === "approve" && hasApproved(review, event.reviewer)) return { kind: "noop", review };
  if (isTerminal(review.status)) {
    return { kind: "invalid", reason: `Review ${review.id} is already ${review.status}` };
  }

  switch (event.type) {
    case "approve": {
      const approvals = [...review.approvals, { reviewer: event.reviewer, timestamp: at, comment: event.comment }];
      const comments = event.comment
        ? [...review.comments, comment(event.commentId, event.reviewer, event.comment, "approval", at)]
        : review.comments;
      const approved = approvals.length >= review.approval_count;
      return {
        kind: "applied",
        statusChanged: approved,
        review: {
          ...review,
          approvals,
          comments,
          status: approved ? "approved" : "pending",
          updated_at: at,
          resolved_at: approved ? at : null,
        },
      };
    }

    case "reject":
      return {
        kind: "applied",
        statusChanged: true,
        review: resolve(review, "rejected", at, [comment(event.commentId, event.reviewer, event.reason, "rejection", at)]),
      };

    case "cancel":
      return {
        kind: "applied",
        statusChanged: true,
        review: resolve(
          review,
          "cancelled",
          at,
          event.reason ? [comment(event.commentId, event.actor, event.reason, "general", at)] : [],
        ),
      };

    case "comment":
      return {
        kind: "applied",
        statusChanged: false,
        review: {
          ...review,
          updated_at: at,
          comments: [...review.comments, comment(event.commentId, event.author, event.content, event.commentType, at)],
        },
      };
  }
}
