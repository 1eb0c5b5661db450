import { memo, type ReactNode } from "react";
import { Box, Text } from "ink";
import { REVIEW_EVENT_LABELS } from "@/api/types";
import {
  EDITOR_VISIBLE_HEIGHT,
  useReviewSelector,
  useReviewStore,
  type ScreenLayout,
} from "@/tui/contexts/review";
import { formatCommentThread } from "@/tui/lib/comments";
import type { TextEditor } from "@/tui/lib/editor";
import { fitWidth, splitAtColumn, wrapLine } from "@/tui/lib/layout";
import { selectionRange } from "@/tui/lib/review";
import { getHelpLines } from "@/tui/lib/shortcuts";
import { PanelFrame } from "./panel-frame";
import { useTheme } from "./theme";

// ============================================================================
// Frame
// ============================================================================

interface DialogRow {
  text: string;
  color?: string;
  bold?: boolean;
  cursor?: number;
}

/**
 * Centered box drawn over the panels. Every cell is written, padding
 * included, so nothing underneath shows through.
 */
function Dialog({
  layout,
  title,
  rows,
  height,
  scroll,
}: {
  layout: ScreenLayout;
  title: string;
  rows: DialogRow[];
  height?: number;
  scroll?: { total: number; position: number };
}) {
  const width = layout.dialogWidth;
  const inner = width - 2;
  const total = Math.min(height ?? rows.length + 2, layout.bodyHeight);
  const visible = rows.slice(0, total - 2);
  while (visible.length < total - 2) visible.push({ text: "" });

  return (
    <Box
      position="absolute"
      marginTop={1}
      width={layout.rects.diffView.x + layout.rects.diffView.width}
      height={layout.bodyHeight}
      justifyContent="center"
      alignItems="center"
    >
      <PanelFrame title={title} width={width} height={total} focused scroll={scroll}>
        {visible.map((row, i) => (
          <DialogLine key={i} row={row} width={inner} />
        ))}
      </PanelFrame>
    </Box>
  );
}

function DialogLine({ row, width }: { row: DialogRow; width: number }) {
  const text = fitWidth(` ${row.text}`, width);
  if (row.cursor === undefined) {
    return (
      <Text color={row.color} bold={row.bold} wrap="truncate-end">
        {text}
      </Text>
    );
  }
  // +1 for the leading space
  const [before, at, after] = splitAtColumn(text, row.cursor + 1);
  return (
    <Text wrap="truncate-end">
      {before}
      <Text inverse>{at || " "}</Text>
      {after}
    </Text>
  );
}

function editorRows(editor: TextEditor): DialogRow[] {
  const rows: DialogRow[] = editor
    .visibleRows(EDITOR_VISIBLE_HEIGHT)
    .map((text) => ({ text }));
  while (rows.length < EDITOR_VISIBLE_HEIGHT) rows.push({ text: "" });

  const { row, col } = editor.cursorVisualPosition();
  if (row < rows.length) rows[row] = { ...rows[row], cursor: col };
  return rows;
}

function hint(text: string, color: string | undefined): DialogRow {
  return { text, color };
}

// ============================================================================
// Dialogs
// ============================================================================

const CommentInputDialog = memo(function CommentInputDialog({
  layout,
  anchor,
}: {
  layout: ScreenLayout;
  anchor: number;
}) {
  const store = useReviewStore();
  const theme = useTheme();
  const editor = useReviewSelector((s) => s.commentEditor);
  const cursor = useReviewSelector((s) => s.diff.cursor);
  useReviewSelector((s) => s.editorVersion);

  const lineMap = store.getLineMap();
  const [start, end] = selectionRange(anchor, cursor);
  const first = lineMap[start]?.fileLine;
  const last = lineMap[end]?.fileLine;
  const where =
    first === undefined || last === undefined
      ? "selection"
      : first === last
        ? `L${first}`
        : `L${first}-L${last}`;

  const scrollbar = editor.scrollbarState(EDITOR_VISIBLE_HEIGHT);
  return (
    <Dialog
      layout={layout}
      title={`Comment on ${where}`}
      rows={[...editorRows(editor), { text: "" }, hint("Ctrl-s save · Esc cancel", theme.muted)]}
      scroll={scrollbar ?? undefined}
    />
  );
});

const ReviewBodyDialog = memo(function ReviewBodyDialog({
  layout,
  label,
}: {
  layout: ScreenLayout;
  label: string;
}) {
  const theme = useTheme();
  const editor = useReviewSelector((s) => s.reviewEditor);
  useReviewSelector((s) => s.editorVersion);
  const scrollbar = editor.scrollbarState(EDITOR_VISIBLE_HEIGHT);
  return (
    <Dialog
      layout={layout}
      title={`${label}: review body (optional)`}
      rows={[...editorRows(editor), { text: "" }, hint("Ctrl-s submit · Esc back", theme.muted)]}
      scroll={scrollbar ?? undefined}
    />
  );
});

const ReviewSubmitDialog = memo(function ReviewSubmitDialog({
  layout,
  eventIndex,
}: {
  layout: ScreenLayout;
  eventIndex: number;
}) {
  const store = useReviewStore();
  const theme = useTheme();
  const pending = useReviewSelector((s) => s.pendingComments.length);
  const events = store.getAvailableEvents();

  const rows: DialogRow[] = [
    { text: `${pending} pending comment${pending === 1 ? "" : "s"}` },
    { text: "" },
    ...events.map((event, i) => ({
      text: `${i === eventIndex ? "▸" : " "} ${REVIEW_EVENT_LABELS[event]}`,
      color: i === eventIndex ? theme.accent : undefined,
      bold: i === eventIndex,
    })),
  ];
  if (store.isOwnPr()) {
    rows.push({ text: "" }, hint("Approving your own pull request is not allowed", theme.muted));
  }
  rows.push({ text: "" }, hint("j/k choose · Enter continue · Esc cancel", theme.muted));

  return <Dialog layout={layout} title="Submit review" rows={rows} />;
});

const QuitConfirmDialog = memo(function QuitConfirmDialog({ layout }: { layout: ScreenLayout }) {
  const theme = useTheme();
  const pending = useReviewSelector((s) => s.pendingComments.length);
  return (
    <Dialog
      layout={layout}
      title="Quit"
      rows={[
        { text: `You have ${pending} unsubmitted comment${pending === 1 ? "" : "s"}.` },
        { text: "" },
        { text: "Submit them before quitting?", bold: true },
        { text: "" },
        hint("y submit · n discard and quit · c cancel", theme.muted),
      ]}
    />
  );
});

function ScrolledDialog({
  layout,
  title,
  lines,
  scroll,
  footer,
}: {
  layout: ScreenLayout;
  title: string;
  lines: string[];
  scroll: number;
  footer: string;
}) {
  const theme = useTheme();
  const height = Math.min(layout.bodyHeight, lines.length + 4);
  const rows = height - 4;
  const visible = lines.slice(scroll, scroll + rows).map((text) => ({ text }));
  while (visible.length < rows) visible.push({ text: "" });

  return (
    <Dialog
      layout={layout}
      title={title}
      height={height}
      rows={[...visible, { text: "" }, hint(footer, theme.muted)]}
      scroll={{ total: lines.length, position: scroll }}
    />
  );
}

const MediaViewerDialog = memo(function MediaViewerDialog({
  layout,
  index,
}: {
  layout: ScreenLayout;
  index: number;
}) {
  const store = useReviewStore();
  const theme = useTheme();
  const refs = useReviewSelector((s) => s.mediaRefs);
  useReviewSelector((s) => s.mediaVersion);

  const ref = refs[index];
  const entry = store.getMediaEntry();
  const inner = layout.dialogWidth - 4;

  const rows: DialogRow[] = [];
  if (ref) {
    rows.push({ text: `${ref.type === "video" ? "🎬 Video" : `🖼 ${ref.alt}`}`, bold: true });
    rows.push({ text: "" });
    for (const part of wrapLine(ref.url, inner)) rows.push({ text: part, color: theme.accent });
    rows.push({ text: "" });

    if (!entry || entry.url !== ref.url || entry.status === "loading") {
      rows.push({ text: "Loading…", color: theme.muted });
    } else if (entry.status === "error") {
      rows.push({ text: `✗ ${entry.message}`, color: theme.error });
    } else {
      const kb = (entry.media.bytes / 1024).toFixed(1);
      rows.push({ text: `${entry.media.contentType} · ${kb} KB`, color: theme.success });
    }
  }
  rows.push({ text: "" }, hint("h/l previous/next · o open in browser · Esc close", theme.muted));

  return <Dialog layout={layout} title={`Media ${index + 1}/${refs.length}`} rows={rows} />;
});

// ============================================================================
// Overlay
// ============================================================================

/** Dialog for the current mode, if it has one. */
export const ModeOverlay = memo(function ModeOverlay({ layout }: { layout: ScreenLayout }) {
  const mode = useReviewSelector((s) => s.mode);

  let overlay: ReactNode = null;
  switch (mode.type) {
    case "commentInput":
      overlay = <CommentInputDialog layout={layout} anchor={mode.anchor} />;
      break;
    case "reviewSubmit":
      overlay = <ReviewSubmitDialog layout={layout} eventIndex={mode.eventIndex} />;
      break;
    case "reviewBodyInput":
      overlay = <ReviewBodyDialog layout={layout} label={REVIEW_EVENT_LABELS[mode.event]} />;
      break;
    case "quitConfirm":
      overlay = <QuitConfirmDialog layout={layout} />;
      break;
    case "commentView":
      overlay = (
        <ScrolledDialog
          layout={layout}
          title={`Comments (${mode.comments.length})`}
          lines={formatCommentThread(mode.comments)}
          scroll={mode.scroll}
          footer="j/k scroll · Esc close"
        />
      );
      break;
    case "help":
      overlay = (
        <ScrolledDialog
          layout={layout}
          title="Keyboard shortcuts"
          lines={getHelpLines()}
          scroll={mode.scroll}
          footer="j/k scroll · ? or Esc close"
        />
      );
      break;
    case "mediaViewer":
      overlay = <MediaViewerDialog layout={layout} index={mode.index} />;
      break;
    case "normal":
    case "lineSelect":
      break;
  }
  return <>{overlay}</>;
});
