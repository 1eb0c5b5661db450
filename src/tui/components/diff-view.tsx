import { memo } from "react";
import { Text } from "ink";
import { changesDisplay } from "@/api/types";
import { selectionAnchor, useReviewSelector, useReviewStore, type Rect } from "@/tui/contexts/review";
import { stripAnsi } from "@/tui/lib/differ";
import { visibleDiffRows, type DiffRow } from "@/tui/lib/diff-rows";
import { displayWidth, truncatePath } from "@/tui/lib/layout";
import { totalVisualRows } from "@/tui/lib/navigation";
import { isLineSelected } from "@/tui/lib/review";
import { PanelFrame } from "./panel-frame";
import { useTheme, type Theme } from "./theme";

const COMMENT_MARKER = " 💬";

function rowColor(row: DiffRow, theme: Theme): string | undefined {
  if (row.ansi) return undefined;
  switch (row.kind) {
    case "header":
      return theme.hunk;
    case "added":
      return theme.added;
    case "removed":
      return theme.removed;
    default:
      return undefined;
  }
}

export const DiffView = memo(function DiffView({ rect }: { rect: Rect }) {
  const store = useReviewStore();
  const theme = useTheme();
  const diff = useReviewSelector((s) => s.diff);
  const mode = useReviewSelector((s) => s.mode);
  const focused = useReviewSelector((s) => s.focusedPanel === "diffView");
  const pendingComments = useReviewSelector((s) => s.pendingComments);
  // Lines, highlights and counts follow the selection
  useReviewSelector((s) => `${s.selectedCommit}:${s.selectedFile}`);

  const file = store.getCurrentFile();
  const commit = store.getCurrentCommit();
  const lines = store.getDiffLines();
  const commentCounts = store.getCommentCounts();
  const inner = Math.max(0, rect.width - 2);

  if (!file) {
    return (
      <PanelFrame title="Diff" width={rect.width} height={rect.height} focused={focused}>
        <Text color={theme.muted}>No file selected</Text>
      </PanelFrame>
    );
  }

  const flags = [diff.wrap ? "wrap" : null, diff.showLineNumbers ? "#" : null].filter(Boolean);
  const suffix = ` ${changesDisplay(file)}${flags.length > 0 ? ` [${flags.join(" ")}]` : ""}`;
  const title = truncatePath(file.filename, Math.max(1, inner - 4 - displayWidth(suffix))) + suffix;

  const anchor = selectionAnchor(mode);
  const pendingHere = pendingComments.filter(
    (c) => c.filePath === file.filename && c.commitSha === commit?.sha
  );
  const isPending = (line: number) =>
    pendingHere.some((c) => line >= c.startLine && line <= c.endLine);

  const rows = visibleDiffRows(lines, diff, {
    status: file.status,
    highlighted: diff.wrap ? null : store.getHighlightedLines(),
  });

  return (
    <PanelFrame
      title={title}
      width={rect.width}
      height={rect.height}
      focused={focused}
      scroll={{ total: totalVisualRows(diff, lines.length), position: diff.scroll }}
    >
      {lines.length === 0 ? (
        <Text color={theme.muted}>
          {file.patch === undefined ? "Binary file or diff too large to display" : "No changes"}
        </Text>
      ) : (
        rows.map((row, i) => {
          let background: string | undefined;
          if (anchor !== null && isLineSelected(anchor, diff.cursor, row.line)) {
            background = theme.selectionBg;
          } else if (row.line === diff.cursor && focused) {
            background = theme.cursorBg;
          } else if (isPending(row.line)) {
            background = theme.pendingBg;
          }

          const used = displayWidth(row.gutter) + displayWidth(row.ansi ? stripAnsi(row.text) : row.text);
          const marker =
            row.first && commentCounts.has(row.line) && used + COMMENT_MARKER.length + 1 <= inner
              ? COMMENT_MARKER
              : "";
          const fill = background ? " ".repeat(Math.max(0, inner - used - displayWidth(marker))) : "";

          return (
            <Text key={`${diff.scroll}:${i}`} backgroundColor={background} wrap="truncate-end">
              <Text color={theme.muted}>{row.gutter}</Text>
              <Text color={rowColor(row, theme)}>{row.text}</Text>
              {marker}
              {fill}
            </Text>
          );
        })
      )}
    </PanelFrame>
  );
});
