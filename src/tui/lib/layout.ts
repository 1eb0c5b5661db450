/**
 * Visual layout: display widths, character wrapping, and the table that maps
 * logical lines to visual rows.
 *
 * Wrapping is per character with no trimming: a row breaks right before the
 * character that would overflow it, even at the start of a row, so a wide
 * character at width 1 leaves an empty row above it. The diff view and the comment editor
 * share this so the cursor always lands where it is drawn.
 */

import stringWidth from "string-width";

// ============================================================================
// Widths
// ============================================================================

export function charWidth(ch: string): number {
  return stringWidth(ch);
}

export function displayWidth(text: string): number {
  return stringWidth(text);
}

/** Number of bytes `ch` takes in UTF-8. */
export function utf8Length(ch: string): number {
  const cp = ch.codePointAt(0) ?? 0;
  if (cp < 0x80) return 1;
  if (cp < 0x800) return 2;
  if (cp < 0x10000) return 3;
  return 4;
}

// ============================================================================
// Wrapping
// ============================================================================

/**
 * Rows occupied by `text` at `width`. `prefixWidth` columns (a gutter) are
 * placed before the text on the first row. Width 0 disables wrapping.
 */
export function lineVisualHeight(
  text: string,
  width: number,
  prefixWidth = 0
): number {
  if (width <= 0 || (text.length === 0 && prefixWidth === 0)) return 1;

  let rows = 1;
  let col = 0;
  const place = (w: number) => {
    if (col + w > width) {
      rows++;
      col = 0;
    }
    col += w;
  };

  for (let i = 0; i < prefixWidth; i++) place(1);
  for (const ch of text) place(charWidth(ch));
  return rows;
}

/** Split `text` into the rows `lineVisualHeight` counts. */
export function wrapLine(text: string, width: number): string[] {
  if (width <= 0 || text.length === 0) return [text];

  const rows: string[] = [];
  let current = "";
  let col = 0;
  for (const ch of text) {
    const w = charWidth(ch);
    if (col + w > width) {
      rows.push(current);
      current = "";
      col = 0;
    }
    current += ch;
    col += w;
  }
  rows.push(current);
  return rows;
}

// ============================================================================
// Visual Offset Table
// ============================================================================

/**
 * Prefix sums of row heights. Entry i is the first visual row of logical
 * line i; the last entry is the total row count.
 */
export function buildOffsetTable(heights: readonly number[]): number[] {
  const offsets = new Array<number>(heights.length + 1);
  offsets[0] = 0;
  for (let i = 0; i < heights.length; i++) {
    offsets[i + 1] = offsets[i] + Math.max(1, heights[i]);
  }
  return offsets;
}

/** First visual row of logical line `line`; past-the-end clamps to the total. */
export function logicalToVisual(offsets: readonly number[], line: number): number {
  if (offsets.length === 0) return line;
  return offsets[Math.min(Math.max(line, 0), offsets.length - 1)];
}

/** Largest logical line whose first row is at or before `visual`. */
export function visualToLogical(offsets: readonly number[], visual: number): number {
  const lineCount = offsets.length - 1;
  if (lineCount <= 0) return 0;

  let lo = 0;
  let hi = lineCount - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (offsets[mid] <= visual) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  return lo;
}

// ============================================================================
// Truncation
// ============================================================================

/** Cut `text` to at most `max` columns, ending in an ellipsis when cut. */
export function truncateStr(text: string, max: number): string {
  if (displayWidth(text) <= max) return text;
  if (max <= 0) return "";

  let out = "";
  let used = 0;
  for (const ch of text) {
    const w = charWidth(ch);
    if (used + w > max - 1) break;
    out += ch;
    used += w;
  }
  return out + "…";
}

/** Keep the end of a path, which is the part that identifies the file. */
export function truncatePath(path: string, max: number): string {
  if (displayWidth(path) <= max) return path;
  if (max <= 3) return ".".repeat(Math.max(0, max));

  const chars = Array.from(path);
  let tail = "";
  let used = 0;
  for (let i = chars.length - 1; i >= 0; i--) {
    const w = charWidth(chars[i]);
    if (used + w > max - 3) break;
    tail = chars[i] + tail;
    used += w;
  }
  return "..." + tail;
}

/** First visible index of a list that keeps `selected` centered when it can. */
export function listWindowStart(selected: number, count: number, height: number): number {
  if (height <= 0 || count <= height) return 0;
  const centered = selected - Math.floor(height / 2);
  return Math.min(Math.max(centered, 0), count - height);
}

export interface ScrollbarThumb {
  start: number;
  size: number;
}

/**
 * Thumb of a `height`-row scrollbar over `total` rows scrolled to
 * `position`. Null when everything fits.
 */
export function scrollbarThumb(
  total: number,
  position: number,
  height: number
): ScrollbarThumb | null {
  if (height <= 0 || total <= height) return null;
  const size = Math.max(1, Math.round((height * height) / total));
  const maxPosition = total - height;
  const clamped = Math.min(Math.max(position, 0), maxPosition);
  const start = Math.round((clamped / maxPosition) * (height - size));
  return { start, size };
}

/** Truncate or pad `text` to exactly `width` columns. */
export function fitWidth(text: string, width: number): string {
  const cut = truncateStr(text, width);
  return cut + " ".repeat(Math.max(0, width - displayWidth(cut)));
}

/** Split `text` around the character drawn at display column `col`. */
export function splitAtColumn(text: string, col: number): [string, string, string] {
  let before = "";
  let used = 0;
  const chars = Array.from(text);
  for (let i = 0; i < chars.length; i++) {
    if (used >= col) {
      return [before, chars[i], chars.slice(i + 1).join("")];
    }
    before += chars[i];
    used += charWidth(chars[i]);
  }
  return [before, "", ""];
}
