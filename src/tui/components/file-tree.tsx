import { memo } from "react";
import { Text } from "ink";
import { changesDisplay, statusChar, type DiffFile } from "@/api/types";
import { useReviewSelector, useReviewStore, type Rect } from "@/tui/contexts/review";
import { displayWidth, fitWidth, listWindowStart, truncatePath } from "@/tui/lib/layout";
import { PanelFrame } from "./panel-frame";
import { useTheme, type Theme } from "./theme";

function statusColor(file: DiffFile, theme: Theme): string | undefined {
  switch (statusChar(file)) {
    case "A":
      return theme.added;
    case "D":
      return theme.removed;
    case "R":
      return theme.accent;
    default:
      return theme.muted;
  }
}

export const FileTree = memo(function FileTree({ rect }: { rect: Rect }) {
  const store = useReviewStore();
  const theme = useTheme();
  const selected = useReviewSelector((s) => s.selectedFile);
  const focused = useReviewSelector((s) => s.focusedPanel === "fileTree");
  const viewedFiles = useReviewSelector((s) => s.viewedFiles);
  const pendingComments = useReviewSelector((s) => s.pendingComments);
  // The file list follows the selected commit
  useReviewSelector((s) => s.selectedCommit);

  const files = store.getCurrentFiles();
  const rows = Math.max(0, rect.height - 2);
  const inner = Math.max(0, rect.width - 2);
  const start = listWindowStart(selected, files.length, rows);
  const viewedCount = files.filter((f) => viewedFiles.has(f.filename)).length;

  return (
    <PanelFrame
      title={`Files (${viewedCount}/${files.length})`}
      width={rect.width}
      height={rect.height}
      focused={focused}
      scroll={{ total: files.length, position: start }}
    >
      {files.length === 0 ? (
        <Text color={theme.muted}>No files in this commit</Text>
      ) : (
        files.slice(start, start + rows).map((file, i) => {
          const index = start + i;
          const isSelected = index === selected;
          const pending = pendingComments.filter((c) => c.filePath === file.filename).length;
          const right = ` ${pending > 0 ? `✎${pending} ` : ""}${changesDisplay(file)}`;
          const pathWidth = Math.max(1, inner - 4 - displayWidth(right));
          return (
            <Text
              key={file.filename}
              inverse={isSelected && focused}
              bold={isSelected}
              wrap="truncate-end"
            >
              <Text color={theme.success}>{viewedFiles.has(file.filename) ? "✓" : " "}</Text>{" "}
              <Text color={statusColor(file, theme)}>{statusChar(file)}</Text>{" "}
              {fitWidth(truncatePath(file.filename, pathWidth), pathWidth)}
              <Text color={theme.muted}>{right}</Text>
            </Text>
          );
        })
      )}
    </PanelFrame>
  );
});
