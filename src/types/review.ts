/** Review workflow records. */
export type ReviewStatus = "pending" | "approved" | "rejected" | "cancelled";

export type Reviewer = { kind: "individual"; name: string } | { kind: "team"; name: string };

export type ReviewApproval = {
  reviewer: string;
  timestamp: string;
  comment: string | null;
};

export type CommentType = "general" | "approval" | "rejection" | "question";

export type ReviewComment = {
  id: string;
  author: string;
  content: string;
  comment_type: CommentType;
  timestamp: string;
};

export type ReviewRequest = {
  id: string;
  target: string;
  change_id: string | null;
  description: string;
  requested_reviewers: Reviewer[];
  /** Usernames resolved when the request was created. Authorization re-resolves teams. */
  reviewers: string[];
  approval_count: number;
  status: ReviewStatus;
  approvals: ReviewApproval[];
  comments: ReviewComment[];
  created_by: string;
  created_at: string;
  updated_at: string;
  resolved_at: string | null;
};

export type ApprovalStatus = {
  review_id: string;
  status: ReviewStatus;
  is_approved: boolean;
  approval_count: number;
  required_count: number;
  approvers: string[];
  pending_reviewers: string[];
};
