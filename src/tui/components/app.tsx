import { memo, useEffect, useMemo, useState } from "react";
import { Box, Text, useStdout } from "ink";
import {
  computeScreenLayout,
  ReviewProvider,
  useReviewSelector,
  type Panel,
  type Rect,
  type ReviewStore,
} from "@/tui/contexts/review";
import { useEventLoop } from "@/tui/contexts/review/useEventLoop";
import { useTerminalInput } from "@/tui/contexts/review/useTerminalInput";
import { truncateStr } from "@/tui/lib/layout";
import { CommitList } from "./commit-list";
import { DiffView } from "./diff-view";
import { ModeOverlay } from "./dialogs";
import { FileTree } from "./file-tree";
import { PrDescription } from "./pr-description";
import { StatusBar } from "./status-bar";
import { ThemeProvider, useTheme, type Theme } from "./theme";

function useTerminalSize(): { cols: number; rows: number } {
  const { stdout } = useStdout();
  const [size, setSize] = useState({ cols: stdout.columns || 120, rows: stdout.rows || 40 });

  useEffect(() => {
    const onResize = () => setSize({ cols: stdout.columns || 120, rows: stdout.rows || 40 });
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  return size;
}

const TitleBar = memo(function TitleBar({ width }: { width: number }) {
  const theme = useTheme();
  const owner = useReviewSelector((s) => s.owner);
  const repo = useReviewSelector((s) => s.repo);
  const prNumber = useReviewSelector((s) => s.prNumber);
  const title = useReviewSelector((s) => s.prTitle);
  const author = useReviewSelector((s) => s.prAuthor);
  const zoomed = useReviewSelector((s) => s.zoomed);

  return (
    <Text wrap="truncate-end">
      <Text color={theme.accent} bold>
        {`${owner}/${repo}#${prNumber}`}
      </Text>{" "}
      {truncateStr(title, Math.max(0, width - 37))}
      <Text color={theme.muted}>{` by ${author}`}</Text>
      {zoomed && (
        <Text color={theme.accent} bold>
          {" [ZOOM]"}
        </Text>
      )}
    </Text>
  );
});

function ZoomedPanel({ panel, rect }: { panel: Panel; rect: Rect }) {
  switch (panel) {
    case "prDescription":
      return <PrDescription rect={rect} />;
    case "commitList":
      return <CommitList rect={rect} />;
    case "fileTree":
      return <FileTree rect={rect} />;
    case "diffView":
      return <DiffView rect={rect} />;
  }
}

function Screen({ store }: { store: ReviewStore }) {
  useTerminalInput(store);
  useEventLoop(store);

  const { cols, rows } = useTerminalSize();
  const zoomed = useReviewSelector((s) => (s.zoomed ? s.focusedPanel : null));
  const layout = useMemo(() => computeScreenLayout(cols, rows, zoomed), [cols, rows, zoomed]);

  // Mouse hit-testing and paging use what was last laid out
  useEffect(() => {
    store.setPanelRects(layout.rects);
    store.setEditorWidth(layout.dialogWidth - 4);
  }, [layout, store]);

  const { rects } = layout;
  return (
    <Box flexDirection="column" width={cols}>
      <TitleBar width={cols} />
      <Box height={layout.bodyHeight}>
        {layout.zoomed ? (
          <ZoomedPanel panel={layout.zoomed} rect={rects[layout.zoomed]} />
        ) : (
          <>
            <Box flexDirection="column" width={layout.leftWidth}>
              <PrDescription rect={rects.prDescription} />
              <CommitList rect={rects.commitList} />
              <FileTree rect={rects.fileTree} />
            </Box>
            <DiffView rect={rects.diffView} />
          </>
        )}
      </Box>
      <StatusBar width={cols} />
      <ModeOverlay layout={layout} />
    </Box>
  );
}

export function App({ store, theme }: { store: ReviewStore; theme: Theme }) {
  return (
    <ReviewProvider store={store}>
      <ThemeProvider theme={theme}>
        <Screen store={store} />
      </ThemeProvider>
    </ReviewProvider>
  );
}
