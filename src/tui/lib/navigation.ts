/**
 * Cursor movement over a parsed patch.
 *
 * Everything here is a pure function of the patch lines and the current
 * view. The cursor never comes to rest on a hunk header while an
 * addressable line exists in the direction of travel.
 */

import { isChangeLine, type DiffLine } from "./patch";
import { logicalToVisual, visualToLogical } from "./layout";

// ============================================================================
// Types
// ============================================================================

export interface DiffViewState {
  cursor: number;
  // Visual rows when wrapping, logical lines otherwise
  scroll: number;
  viewHeight: number;
  viewWidth: number;
  wrap: boolean;
  showLineNumbers: boolean;
  // Only populated while wrapping
  visualOffsets: number[] | null;
}

export type CursorAndScroll = Pick<DiffViewState, "cursor" | "scroll">;

export function createDiffViewState(): DiffViewState {
  return {
    cursor: 0,
    scroll: 0,
    viewHeight: 0,
    viewWidth: 0,
    wrap: false,
    showLineNumbers: false,
    visualOffsets: null,
  };
}

function isHeader(lines: readonly DiffLine[], i: number): boolean {
  return lines[i]?.kind === "header";
}

// ============================================================================
// Header Skipping
// ============================================================================

/** Step forward past headers; stays put if only headers remain. */
export function skipHunkHeaderForward(
  lines: readonly DiffLine[],
  line: number
): number {
  let l = line;
  while (l < lines.length && isHeader(lines, l)) l++;
  return l >= lines.length ? line : l;
}

/** Step back past headers; falls back to a forward skip at the top. */
export function skipHunkHeaderBackward(
  lines: readonly DiffLine[],
  line: number
): number {
  let l = line;
  while (l > 0 && isHeader(lines, l)) l--;
  if (isHeader(lines, l)) return skipHunkHeaderForward(lines, l);
  return l;
}

/** True when no header lies between a and b (a header at the lower end is fine). */
export function isSameHunk(
  lines: readonly DiffLine[],
  a: number,
  b: number
): boolean {
  const lo = Math.min(a, b);
  const hi = Math.max(a, b);
  for (let i = lo + 1; i <= hi; i++) {
    if (isHeader(lines, i)) return false;
  }
  return true;
}

// ============================================================================
// Visual Mapping
// ============================================================================

export function visualLineOffset(view: DiffViewState, line: number): number {
  if (!view.wrap || !view.visualOffsets) return line;
  return logicalToVisual(view.visualOffsets, line);
}

export function visualToLogicalLine(view: DiffViewState, visual: number): number {
  if (!view.wrap || !view.visualOffsets) return visual;
  return visualToLogical(view.visualOffsets, visual);
}

export function totalVisualRows(view: DiffViewState, lineCount: number): number {
  return visualLineOffset(view, lineCount);
}

/** Bring the cursor line fully into the viewport, moving scroll as little as possible. */
export function ensureCursorVisible(view: DiffViewState): number {
  const height = Math.max(1, view.viewHeight);

  if (view.wrap && view.visualOffsets) {
    const start = visualLineOffset(view, view.cursor);
    const end = visualLineOffset(view, view.cursor + 1);
    if (start < view.scroll) return start;
    if (end > view.scroll + height) return Math.min(start, end - height);
    return view.scroll;
  }

  if (view.cursor < view.scroll) return view.cursor;
  if (view.cursor >= view.scroll + height) return view.cursor - height + 1;
  return view.scroll;
}

// ============================================================================
// Line Movement
// ============================================================================

export function moveCursorDown(lines: readonly DiffLine[], cursor: number): number {
  if (cursor + 1 >= lines.length) return cursor;
  const next = skipHunkHeaderForward(lines, cursor + 1);
  return isHeader(lines, next) ? cursor : next;
}

export function moveCursorUp(lines: readonly DiffLine[], cursor: number): number {
  if (cursor <= 0) return cursor;
  const prev = skipHunkHeaderBackward(lines, cursor - 1);
  return isHeader(lines, prev) ? cursor : prev;
}

export function scrollToTop(lines: readonly DiffLine[]): number {
  return skipHunkHeaderForward(lines, 0);
}

export function scrollToEnd(lines: readonly DiffLine[]): number {
  if (lines.length === 0) return 0;
  return skipHunkHeaderBackward(lines, lines.length - 1);
}

/** Move down by `rows` visual rows (or logical lines without wrap). */
export function pageDown(
  lines: readonly DiffLine[],
  view: DiffViewState,
  rows: number
): number {
  if (lines.length === 0) return 0;
  const visual = visualLineOffset(view, view.cursor) + rows;
  const target = Math.min(visualToLogicalLine(view, visual), lines.length - 1);
  return skipHunkHeaderForward(lines, target);
}

export function pageUp(
  lines: readonly DiffLine[],
  view: DiffViewState,
  rows: number
): number {
  if (lines.length === 0) return 0;
  const visual = Math.max(0, visualLineOffset(view, view.cursor) - rows);
  const target = Math.min(visualToLogicalLine(view, visual), lines.length - 1);
  return skipHunkHeaderBackward(lines, target);
}

export function jumpToPercent(lines: readonly DiffLine[], percent: number): number {
  if (lines.length === 0) return 0;
  const clamped = Math.min(Math.max(percent, 0), 100);
  const target = Math.round(((lines.length - 1) * clamped) / 100);
  return skipHunkHeaderForward(lines, target);
}

/**
 * Mouse-wheel scroll: the viewport and the cursor move together.
 */
export function scrollByRows(
  lines: readonly DiffLine[],
  view: DiffViewState,
  rows: number
): CursorAndScroll {
  if (lines.length === 0) return { cursor: 0, scroll: 0 };

  const total = totalVisualRows(view, lines.length);
  const maxScroll = Math.max(0, total - Math.max(1, view.viewHeight));
  const scroll = Math.min(Math.max(view.scroll + rows, 0), maxScroll);

  const visual = Math.max(0, visualLineOffset(view, view.cursor) + rows);
  const target = Math.min(visualToLogicalLine(view, visual), lines.length - 1);
  const cursor =
    rows >= 0
      ? skipHunkHeaderForward(lines, target)
      : skipHunkHeaderBackward(lines, target);

  return { cursor, scroll };
}

/** Logical line drawn at `row` rows below the top of the viewport. */
export function lineAtViewRow(
  lines: readonly DiffLine[],
  view: DiffViewState,
  row: number
): number {
  if (lines.length === 0) return 0;
  const target = Math.min(
    visualToLogicalLine(view, view.scroll + Math.max(0, row)),
    lines.length - 1
  );
  return skipHunkHeaderForward(lines, target);
}

// ============================================================================
// Jumps
// ============================================================================

/** First line of the next block of added/removed lines. */
export function jumpToNextChange(lines: readonly DiffLine[], cursor: number): number {
  let i = cursor;
  while (i < lines.length && isChangeLine(lines[i])) i++;
  while (i < lines.length && !isChangeLine(lines[i])) i++;
  return i < lines.length ? i : cursor;
}

/** First line of the previous block (or of the block the cursor is inside). */
export function jumpToPrevChange(lines: readonly DiffLine[], cursor: number): number {
  if (cursor === 0) return cursor;
  let i = cursor - 1;
  while (i > 0 && !isChangeLine(lines[i])) i--;
  if (!isChangeLine(lines[i])) return cursor;
  while (i > 0 && isChangeLine(lines[i - 1])) i--;
  return i;
}

export function jumpToNextHunk(lines: readonly DiffLine[], cursor: number): number {
  for (let i = cursor + 1; i < lines.length; i++) {
    if (!isHeader(lines, i)) continue;
    const target = skipHunkHeaderForward(lines, i);
    return isHeader(lines, target) ? cursor : target;
  }
  return cursor;
}

export function jumpToPrevHunk(lines: readonly DiffLine[], cursor: number): number {
  for (let i = cursor - 1; i >= 0; i--) {
    if (!isHeader(lines, i)) continue;
    const target = skipHunkHeaderForward(lines, i);
    // Already at this hunk's first line: keep looking further up
    if (target >= cursor) continue;
    return target;
  }
  return cursor;
}

export function jumpToNextComment(
  commentLines: readonly number[],
  cursor: number
): number {
  let best: number | null = null;
  for (const line of commentLines) {
    if (line > cursor && (best === null || line < best)) best = line;
  }
  return best ?? cursor;
}

export function jumpToPrevComment(
  commentLines: readonly number[],
  cursor: number
): number {
  let best: number | null = null;
  for (const line of commentLines) {
    if (line < cursor && (best === null || line > best)) best = line;
  }
  return best ?? cursor;
}

// ============================================================================
// Selection
// ============================================================================

/**
 * Where the cursor lands when a line selection is extended by one line,
 * or the current cursor if the selection can't grow that way.
 */
export function extendSelection(
  lines: readonly DiffLine[],
  anchor: number,
  cursor: number,
  delta: 1 | -1
): number {
  const next = cursor + delta;
  if (next < 0 || next >= lines.length) return cursor;
  if (isHeader(lines, next)) return cursor;
  if (!isSameHunk(lines, anchor, next)) return cursor;
  return next;
}
