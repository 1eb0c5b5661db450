import type { ReviewComment } from "@/api/types";
import type { LineMapEntry } from "./patch";

// Comments whose `line` is gone were made against an outdated diff
function isAnchored(
  comment: ReviewComment
): comment is ReviewComment & { line: number } {
  return typeof comment.line === "number";
}

function sideOf(comment: ReviewComment): "LEFT" | "RIGHT" {
  return comment.side ?? "RIGHT";
}

/** Remote comments attached to logical line `index` of `path`'s patch. */
export function commentsAtDiffLine(
  comments: readonly ReviewComment[],
  path: string,
  lineMap: readonly LineMapEntry[],
  index: number
): ReviewComment[] {
  const entry = lineMap[index];
  if (!entry) return [];
  return comments.filter(
    (c) =>
      c.path === path &&
      isAnchored(c) &&
      c.line === entry.fileLine &&
      sideOf(c) === entry.side
  );
}

/** Number of remote comments per logical line of `path`'s patch. */
export function existingCommentCounts(
  comments: readonly ReviewComment[],
  path: string,
  lineMap: readonly LineMapEntry[]
): Map<number, number> {
  const counts = new Map<number, number>();
  const fileComments = comments.filter((c) => c.path === path && isAnchored(c));
  if (fileComments.length === 0) return counts;

  // (file line, side) -> logical line
  const reverse = new Map<string, number>();
  lineMap.forEach((entry, idx) => {
    if (entry) reverse.set(`${entry.fileLine}:${entry.side}`, idx);
  });

  for (const comment of fileComments) {
    const idx = reverse.get(`${comment.line}:${sideOf(comment)}`);
    if (idx !== undefined) counts.set(idx, (counts.get(idx) ?? 0) + 1);
  }
  return counts;
}

/** Id to reply to for a thread: the root's id, whichever comment comes first. */
export function rootCommentId(comments: readonly ReviewComment[]): number | null {
  const first = comments[0];
  if (!first) return null;
  return first.in_reply_to_id ?? first.id;
}

/** Rows shown by the comment viewer for a thread. */
export function formatCommentThread(comments: readonly ReviewComment[]): string[] {
  const rows: string[] = [];
  const root = rootCommentId(comments);
  if (root !== null) rows.push(`Thread #${root}`, "");

  comments.forEach((comment, i) => {
    if (i > 0) rows.push("");
    const author = comment.user?.login ?? "ghost";
    const date = comment.created_at.slice(0, 10);
    rows.push(`${author} · ${date}`);
    for (const line of comment.body.split("\n")) rows.push(`  ${line}`);
  });
  return rows;
}
