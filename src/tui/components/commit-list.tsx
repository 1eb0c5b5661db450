import { memo } from "react";
import { Text } from "ink";
import { messageSummary, shortSha } from "@/api/types";
import { useReviewSelector, useReviewStore, type Rect } from "@/tui/contexts/review";
import { fitWidth, listWindowStart } from "@/tui/lib/layout";
import { PanelFrame } from "./panel-frame";
import { useTheme } from "./theme";

export const CommitList = memo(function CommitList({ rect }: { rect: Rect }) {
  const store = useReviewStore();
  const theme = useTheme();
  const commits = useReviewSelector((s) => s.commits);
  const selected = useReviewSelector((s) => s.selectedCommit);
  const focused = useReviewSelector((s) => s.focusedPanel === "commitList");
  // Viewed marks depend on the viewed set
  useReviewSelector((s) => s.viewedFiles);

  const rows = Math.max(0, rect.height - 2);
  const inner = Math.max(0, rect.width - 2);
  const start = listWindowStart(selected, commits.length, rows);

  return (
    <PanelFrame
      title={`Commits (${commits.length})`}
      width={rect.width}
      height={rect.height}
      focused={focused}
      scroll={{ total: commits.length, position: start }}
    >
      {commits.length === 0 ? (
        <Text color={theme.muted}>No commits</Text>
      ) : (
        commits.slice(start, start + rows).map((commit, i) => {
          const index = start + i;
          const isSelected = index === selected;
          const mark = store.isCommitViewed(commit.sha) ? "✓" : " ";
          return (
            <Text
              key={commit.sha}
              inverse={isSelected && focused}
              bold={isSelected}
              wrap="truncate-end"
            >
              <Text color={theme.success}>{mark}</Text>
              {fitWidth(` ${shortSha(commit)} ${messageSummary(commit)}`, Math.max(0, inner - 1))}
            </Text>
          );
        })
      )}
    </PanelFrame>
  );
});
