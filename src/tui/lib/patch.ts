/**
 * Diff model for a single file's unified patch.
 *
 * A patch is split into logical lines, each classified by its first
 * character. The line map derived from it translates a logical line into
 * the line number GitHub expects for a review comment.
 */

import { isWholeFileStatus, type Side } from "@/api/types";
import {
  buildOffsetTable,
  displayWidth,
  lineVisualHeight,
  truncateStr,
} from "./layout";

// ============================================================================
// Types
// ============================================================================

export type DiffLineKind = "header" | "added" | "removed" | "context";

export interface DiffLine {
  kind: DiffLineKind;
  text: string;
}

export type LineMapEntry = { fileLine: number; side: Side } | null;

export interface HunkRange {
  start: number;
  length: number;
}

export interface HunkHeader {
  old: HunkRange;
  new: HunkRange;
  context: string;
}

// ============================================================================
// Parsing
// ============================================================================

export function classifyLine(text: string): DiffLineKind {
  if (text.startsWith("@@")) return "header";
  if (text.startsWith("+")) return "added";
  if (text.startsWith("-")) return "removed";
  return "context";
}

export function splitPatchLines(patch: string): string[] {
  const lines = patch.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function parsePatch(patch: string): DiffLine[] {
  return splitPatchLines(patch).map((text) => ({
    kind: classifyLine(text),
    text,
  }));
}

export function isChangeLine(line: DiffLine | undefined): boolean {
  return line?.kind === "added" || line?.kind === "removed";
}

function parseRange(raw: string, prefix: "-" | "+"): HunkRange | null {
  if (!raw.startsWith(prefix)) return null;
  const [startRaw, lengthRaw] = raw.slice(1).split(",");
  if (!startRaw || !/^\d+$/.test(startRaw)) return null;
  return {
    start: Number(startRaw),
    // Only the start addresses lines; an omitted or unreadable length counts as one
    length: lengthRaw !== undefined && /^\d+$/.test(lengthRaw) ? Number(lengthRaw) : 1,
  };
}

/**
 * Parse `@@ -old_start[,old_len] +new_start[,new_len] @@ [context]`.
 * Returns null for anything that doesn't match that shape.
 */
export function parseHunkHeaderRanges(line: string): HunkHeader | null {
  if (!line.startsWith("@@ ")) return null;
  const rest = line.slice(3);
  const end = rest.indexOf(" @@");
  if (end === -1) return null;

  const parts = rest.slice(0, end).trim().split(/\s+/);
  if (parts.length < 2) return null;
  const oldRange = parseRange(parts[0], "-");
  const newRange = parseRange(parts[1], "+");
  if (!oldRange || !newRange) return null;

  return {
    old: oldRange,
    new: newRange,
    context: rest.slice(end + 3).trim(),
  };
}

/** Starting (old, new) line numbers of a hunk header. */
export function parseHunkHeader(
  line: string
): { oldStart: number; newStart: number } | null {
  const parsed = parseHunkHeaderRanges(line);
  if (!parsed) return null;
  return { oldStart: parsed.old.start, newStart: parsed.new.start };
}

// ============================================================================
// Line Map
// ============================================================================

/**
 * Map every logical patch line to its file line and side.
 *
 * Header lines map to null. A header that fails to parse leaves the
 * counters where they were, so the lines after it are still numbered.
 */
export function parsePatchLineMap(patch: string): LineMapEntry[] {
  return buildLineMap(parsePatch(patch));
}

export function buildLineMap(lines: readonly DiffLine[]): LineMapEntry[] {
  let oldLine = 0;
  let newLine = 0;

  return lines.map((line): LineMapEntry => {
    switch (line.kind) {
      case "header": {
        const parsed = parseHunkHeader(line.text);
        if (parsed) {
          oldLine = parsed.oldStart;
          newLine = parsed.newStart;
        }
        return null;
      }
      case "removed":
        return { fileLine: oldLine++, side: "LEFT" };
      case "added":
        return { fileLine: newLine++, side: "RIGHT" };
      case "context": {
        const entry: LineMapEntry = { fileLine: newLine, side: "RIGHT" };
        oldLine++;
        newLine++;
        return entry;
      }
    }
  });
}

// ============================================================================
// Gutter
// ============================================================================

export const LINE_NUM_WIDTH = 4;

export interface GutterNumbers {
  old: number | null;
  new: number | null;
}

/**
 * Old/new line numbers shown in the gutter, one entry per logical line.
 * Headers get null for both columns.
 */
export function buildGutterNumbers(lines: readonly DiffLine[]): GutterNumbers[] {
  let oldLine = 0;
  let newLine = 0;

  return lines.map((line) => {
    if (line.kind === "header") {
      const parsed = parseHunkHeader(line.text);
      if (parsed) {
        oldLine = parsed.oldStart;
        newLine = parsed.newStart;
      }
      return { old: null, new: null };
    }
    return {
      old: line.kind === "added" ? null : oldLine++,
      new: line.kind === "removed" ? null : newLine++,
    };
  });
}

/** Which gutter columns a file shows: whole-file diffs only have one side. */
export function gutterColumns(status: string): { old: boolean; new: boolean } {
  return {
    old: status !== "added",
    new: status !== "removed" && status !== "deleted",
  };
}

/** Width of the line-number gutter: 5 per column plus the separator. */
export function gutterWidth(status: string): number {
  const cols = gutterColumns(status);
  return (
    (cols.old ? LINE_NUM_WIDTH + 1 : 0) + (cols.new ? LINE_NUM_WIDTH + 1 : 0) + 1
  );
}

export function formatGutter(numbers: GutterNumbers, status: string): string {
  const cols = gutterColumns(status);
  const blank = " ".repeat(LINE_NUM_WIDTH + 1);
  const cell = (n: number | null) =>
    n === null ? blank : `${String(n).padStart(LINE_NUM_WIDTH)} `;
  return `${cols.old ? cell(numbers.old) : ""}${cols.new ? cell(numbers.new) : ""}│`;
}

// ============================================================================
// Hunk Header Display
// ============================================================================

function formatRange(range: HunkRange): string {
  if (range.length <= 1) return `L${range.start}`;
  return `L${range.start}-${range.start + range.length - 1}`;
}

/**
 * Render a hunk header as a full-width rule:
 * `─── L10-14 → L12-18 ─── fn main() ───────`
 */
export function formatHunkHeader(raw: string, width: number): string {
  const parsed = parseHunkHeaderRanges(raw);
  let label: string;
  if (parsed) {
    label = `─── ${formatRange(parsed.old)} → ${formatRange(parsed.new)} ───`;
    if (parsed.context) label += ` ${parsed.context} ───`;
  } else {
    label = `─── ${raw} ───`;
  }

  if (width <= 0) return label;
  const used = displayWidth(label);
  if (used >= width) return truncateStr(label, width);
  return label + "─".repeat(width - used);
}

// ============================================================================
// Diff Layout
// ============================================================================

/**
 * Text a diff line is drawn with. Whole-file diffs drop the +/- marker,
 * and whitespace-only lines are drawn empty when wrapping.
 */
export function displayText(line: DiffLine, status: string, wrap: boolean): string {
  let text = line.text;
  if (isWholeFileStatus(status) && (line.kind === "added" || line.kind === "removed")) {
    text = text.slice(1);
  }
  if (wrap && text.trim().length === 0) return "";
  return text;
}

export interface DiffLayoutOptions {
  width: number;
  status: string;
  showLineNumbers: boolean;
}

/** Visual Offset Table for a patch at the given width. */
export function computeDiffVisualOffsets(
  lines: readonly DiffLine[],
  { width, status, showLineNumbers }: DiffLayoutOptions
): number[] {
  const prefix = showLineNumbers ? gutterWidth(status) : 0;
  return buildOffsetTable(
    lines.map((line) =>
      // Headers are formatted to exactly the view width
      line.kind === "header"
        ? 1
        : lineVisualHeight(displayText(line, status, true), width, prefix)
    )
  );
}
