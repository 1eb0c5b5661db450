import type { components } from "@octokit/openapi-types";

// REST API types - re-exported from Octokit schemas
export type PullRequest = components["schemas"]["pull-request"];
export type PullRequestCommit = components["schemas"]["commit"];
export type PullRequestFile = components["schemas"]["diff-entry"];
export type ReviewComment = components["schemas"]["pull-request-review-comment"];
export type Review = components["schemas"]["pull-request-review"];

export type Side = "LEFT" | "RIGHT";

export type ReviewEvent = "COMMENT" | "APPROVE" | "REQUEST_CHANGES";

// ============================================================================
// Local models
// ============================================================================

// Trimmed-down diff entry: only what the diff view needs, and what the cache stores
export interface DiffFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
  patch?: string;
}

export interface CommitInfo {
  sha: string;
  message: string;
  author: string;
  date: string;
}

/** A comment queued locally, addressed by logical diff lines. */
export interface PendingComment {
  filePath: string;
  startLine: number;
  endLine: number;
  body: string;
  commitSha: string;
}

// Shape accepted by POST /repos/{owner}/{repo}/pulls/{pull_number}/reviews
export interface PendingReviewComment {
  path: string;
  line: number;
  start_line?: number;
  body: string;
  side: Side;
  start_side?: Side;
}

export interface ReviewPayload {
  commit_id: string;
  body: string;
  event: ReviewEvent;
  comments: PendingReviewComment[];
}

export interface PullRequestData {
  title: string;
  body: string;
  author: string;
  headSha: string;
  commits: CommitInfo[];
  // commit sha -> files changed by that commit
  filesMap: Record<string, DiffFile[]>;
}

// ============================================================================
// Helpers
// ============================================================================

export function statusChar(file: DiffFile): string {
  switch (file.status) {
    case "added":
      return "A";
    case "modified":
      return "M";
    case "removed":
    case "deleted":
      return "D";
    case "renamed":
      return "R";
    default:
      return "?";
  }
}

export function changesDisplay(file: DiffFile): string {
  return `+${file.additions} -${file.deletions}`;
}

export function isWholeFileStatus(status: string): boolean {
  return status === "added" || status === "removed" || status === "deleted";
}

export function shortSha(commit: CommitInfo): string {
  return commit.sha.slice(0, 7);
}

export function messageSummary(commit: CommitInfo): string {
  return commit.message.split("\n")[0] ?? "";
}

export const REVIEW_EVENT_LABELS: Record<ReviewEvent, string> = {
  COMMENT: "Comment",
  APPROVE: "Approve",
  REQUEST_CHANGES: "Request Changes",
};

export function availableEvents(isOwnPr: boolean): ReviewEvent[] {
  // GitHub rejects approvals and change requests on your own pull request
  return isOwnPr ? ["COMMENT"] : ["COMMENT", "APPROVE", "REQUEST_CHANGES"];
}
