import { wrapLine } from "./layout";
import type { DiffViewState } from "./navigation";
import { visualLineOffset, visualToLogicalLine } from "./navigation";
import {
  buildGutterNumbers,
  displayText,
  formatGutter,
  formatHunkHeader,
  type DiffLine,
  type DiffLineKind,
} from "./patch";

/** One terminal row of the diff view. */
export interface DiffRow {
  line: number;
  kind: DiffLineKind;
  // Only set on the first row of a line
  gutter: string;
  text: string;
  first: boolean;
  // Text carries the external differ's escape codes
  ansi: boolean;
}

export interface DiffRowOptions {
  status: string;
  highlighted: readonly string[] | null;
}

function rowsForLine(
  lines: readonly DiffLine[],
  index: number,
  gutter: string,
  view: DiffViewState,
  { status, highlighted }: DiffRowOptions
): DiffRow[] {
  const line = lines[index];
  const base = { line: index, kind: line.kind, ansi: false };

  if (line.kind === "header") {
    return [{ ...base, gutter: "", text: formatHunkHeader(line.text, view.viewWidth), first: true }];
  }

  if (!view.wrap) {
    const colored = highlighted?.[index];
    if (colored !== undefined) {
      return [{ ...base, gutter, text: colored, first: true, ansi: true }];
    }
    return [{ ...base, gutter, text: displayText(line, status, false), first: true }];
  }

  // Wrapped exactly as the Visual Offset Table measured it: gutter then text
  return wrapLine(gutter + displayText(line, status, true), view.viewWidth).map((row, i) => {
    if (i === 0 && row.startsWith(gutter)) {
      return { ...base, gutter, text: row.slice(gutter.length), first: true };
    }
    return { ...base, gutter: "", text: row, first: i === 0 };
  });
}

/** Rows visible in the viewport, top to bottom. */
export function visibleDiffRows(
  lines: readonly DiffLine[],
  view: DiffViewState,
  options: DiffRowOptions
): DiffRow[] {
  const rows: DiffRow[] = [];
  if (lines.length === 0 || view.viewHeight <= 0) return rows;

  const gutters = view.showLineNumbers ? buildGutterNumbers(lines) : null;
  let index = visualToLogicalLine(view, view.scroll);
  let skip = view.scroll - visualLineOffset(view, index);

  while (index < lines.length && rows.length < view.viewHeight) {
    const gutter = gutters ? formatGutter(gutters[index], options.status) : "";
    rows.push(...rowsForLine(lines, index, gutter, view, options).slice(skip));
    skip = 0;
    index++;
  }
  return rows.slice(0, view.viewHeight);
}
