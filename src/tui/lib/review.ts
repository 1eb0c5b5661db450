import type {
  CommitInfo,
  DiffFile,
  PendingComment,
  PendingReviewComment,
  ReviewEvent,
  ReviewPayload,
} from "@/api/types";
import { parsePatchLineMap } from "./patch";

// ============================================================================
// Selection
// ============================================================================

/** Inclusive [start, end] of a selection, whichever end was set first. */
export function selectionRange(anchor: number, cursor: number): [number, number] {
  return anchor <= cursor ? [anchor, cursor] : [cursor, anchor];
}

export function selectionCount(anchor: number, cursor: number): number {
  const [start, end] = selectionRange(anchor, cursor);
  return end - start + 1;
}

export function isLineSelected(anchor: number, cursor: number, line: number): boolean {
  const [start, end] = selectionRange(anchor, cursor);
  return line >= start && line <= end;
}

// ============================================================================
// Comment Builder
// ============================================================================

/**
 * Translate a pending comment's logical lines into the file lines the
 * review API addresses. Fails if either end sits on a hunk header.
 */
export function buildReviewComment(
  pending: PendingComment,
  files: readonly DiffFile[]
): PendingReviewComment {
  const file = files.find((f) => f.filename === pending.filePath);
  if (!file) {
    throw new Error(`File not found: ${pending.filePath}`);
  }
  if (file.patch === undefined) {
    throw new Error(`No patch for file: ${pending.filePath}`);
  }

  const lineMap = parsePatchLineMap(file.patch);
  const end = lineMap[pending.endLine];
  if (!end) {
    throw new Error(
      `Cannot comment on hunk header line (end_line=${pending.endLine})`
    );
  }

  const comment: PendingReviewComment = {
    path: pending.filePath,
    body: pending.body,
    line: end.fileLine,
    side: end.side,
  };

  if (pending.startLine !== pending.endLine) {
    const start = lineMap[pending.startLine];
    if (!start) {
      throw new Error(
        `Cannot comment on hunk header line (start_line=${pending.startLine})`
      );
    }
    comment.start_line = start.fileLine;
    comment.start_side = start.side;
  }

  return comment;
}

// ============================================================================
// Review Payload
// ============================================================================

export interface ReviewRequest {
  pendingComments: readonly PendingComment[];
  filesMap: Record<string, DiffFile[]>;
  commits: readonly CommitInfo[];
  event: ReviewEvent;
  body: string;
}

/**
 * Assemble the full review. Every comment is built before anything is
 * returned, so one bad comment aborts the whole submission.
 */
export function buildReviewPayload({
  pendingComments,
  filesMap,
  commits,
  event,
  body,
}: ReviewRequest): ReviewPayload {
  if (event === "COMMENT" && pendingComments.length === 0) {
    throw new Error("No pending comments to submit");
  }

  const head = commits[commits.length - 1];
  if (!head) {
    throw new Error("No commits in pull request");
  }

  const comments = pendingComments.map((pending) => {
    const files = filesMap[pending.commitSha];
    if (!files) {
      throw new Error(`No files found for commit: ${pending.commitSha}`);
    }
    return buildReviewComment(pending, files);
  });

  return {
    commit_id: head.sha,
    body,
    event,
    comments,
  };
}
