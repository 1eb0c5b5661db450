import { memo } from "react";
import { Text } from "ink";
import { useReviewSelector, type Mode } from "@/tui/contexts/review";
import { displayWidth, fitWidth, truncateStr } from "@/tui/lib/layout";
import { selectionCount } from "@/tui/lib/review";
import { useTheme } from "./theme";

function modeLabel(mode: Mode, cursor: number): string {
  switch (mode.type) {
    case "normal":
      return "NORMAL";
    case "lineSelect":
      return `SELECT ${selectionCount(mode.anchor, cursor)}`;
    case "commentInput":
      return "COMMENT";
    case "commentView":
      return "THREAD";
    case "reviewSubmit":
    case "reviewBodyInput":
      return "REVIEW";
    case "quitConfirm":
      return "QUIT";
    case "help":
      return "HELP";
    case "mediaViewer":
      return "MEDIA";
  }
}

export const StatusBar = memo(function StatusBar({ width }: { width: number }) {
  const theme = useTheme();
  const mode = useReviewSelector((s) => s.mode);
  const cursor = useReviewSelector((s) => s.diff.cursor);
  const pending = useReviewSelector((s) => s.pendingComments.length);
  const pendingKey = useReviewSelector((s) => s.pendingKey);
  const submitting = useReviewSelector((s) => s.submitting);
  const status = useReviewSelector((s) => s.statusMessage);

  const label = ` ${modeLabel(mode, cursor)} `;
  const info = ` ${pending} pending${pendingKey ? ` · ${pendingKey}…` : ""} · ? help `;

  let message = "";
  let color: string | undefined = theme.muted;
  if (submitting) {
    message = "Submitting review…";
  } else if (status) {
    message = status.body;
    color = status.level === "error" ? theme.error : theme.success;
  }
  const room = Math.max(0, width - displayWidth(label) - displayWidth(info) - 1);

  return (
    <Text wrap="truncate-end">
      <Text inverse bold>
        {label}
      </Text>
      <Text color={theme.muted}>{info}</Text>{" "}
      <Text color={color}>{fitWidth(truncateStr(message, room), room)}</Text>
    </Text>
  );
});
