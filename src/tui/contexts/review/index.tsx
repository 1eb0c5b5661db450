import {
  createContext,
  useContext,
  useSyncExternalStore,
  type ReactNode,
} from "react";
import {
  availableEvents,
  REVIEW_EVENT_LABELS,
  type CommitInfo,
  type DiffFile,
  type PendingComment,
  type PullRequestData,
  type ReviewComment,
  type ReviewEvent,
  type ReviewPayload,
} from "@/api/types";
import { TextEditor } from "@/tui/lib/editor";
import { isChar, isNamed, type KeyInput, type MouseInput } from "@/tui/lib/keys";
import { listWindowStart } from "@/tui/lib/layout";
import { extractMediaRefs, preprocessPrBody, renderMarkdown, type MediaRef, type StyledLine } from "@/tui/lib/markdown";
import type { MediaEntry, MediaWorker } from "@/tui/lib/media";
import {
  computeDiffVisualOffsets,
  parsePatch,
  buildLineMap,
  type DiffLine,
  type LineMapEntry,
} from "@/tui/lib/patch";
import {
  createDiffViewState,
  ensureCursorVisible,
  extendSelection,
  jumpToNextChange,
  jumpToNextComment,
  jumpToNextHunk,
  jumpToPercent,
  jumpToPrevChange,
  jumpToPrevComment,
  jumpToPrevHunk,
  lineAtViewRow,
  moveCursorDown,
  moveCursorUp,
  pageDown,
  pageUp,
  scrollByRows,
  scrollToEnd,
  scrollToTop,
  visualLineOffset,
  visualToLogicalLine,
  type DiffViewState,
} from "@/tui/lib/navigation";
import { buildReviewPayload, selectionRange } from "@/tui/lib/review";
import { commentsAtDiffLine, existingCommentCounts, formatCommentThread } from "@/tui/lib/comments";
import { getHelpLines, matchesKey } from "@/tui/lib/shortcuts";
import {
  containsPoint,
  isStatusExpired,
  NORMAL,
  PANEL_CYCLE,
  type Mode,
  type Panel,
  type PanelRects,
  type StatusMessage,
  type SubmitRequest,
} from "./mode";

export * from "./mode";

// ============================================================================
// File Sorting (match file tree order)
// ============================================================================

/**
 * Sort files to match the file tree display order:
 * - Files are grouped by directory
 * - At each level, folders come before files
 * - Items are sorted alphabetically within each group
 */
export function sortFilesLikeTree<T extends { filename: string }>(
  files: T[]
): T[] {
  return [...files].sort((a, b) => {
    const aParts = a.filename.split("/");
    const bParts = b.filename.split("/");
    const minLen = Math.min(aParts.length, bParts.length);

    for (let i = 0; i < minLen; i++) {
      const aIsLast = i === aParts.length - 1;
      const bIsLast = i === bParts.length - 1;

      // Folder (not last segment) before file (last segment)
      if (aIsLast !== bIsLast) {
        return aIsLast ? 1 : -1;
      }

      const cmp = aParts[i].localeCompare(bParts[i]);
      if (cmp !== 0) return cmp;
    }

    return aParts.length - bParts.length;
  });
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// Store State
// ============================================================================

// Rows the comment editor shows at once
export const EDITOR_VISIBLE_HEIGHT = 5;
const WHEEL_ROWS = 3;

interface ReviewState {
  // Core data (immutable after init)
  owner: string;
  repo: string;
  prNumber: number;
  prTitle: string;
  prBody: string;
  prAuthor: string;
  commits: CommitInfo[];
  filesMap: Record<string, DiffFile[]>;
  reviewComments: ReviewComment[];
  currentUser: string | null;
  mediaRefs: MediaRef[];

  // Panels
  focusedPanel: Panel;
  selectedCommit: number;
  selectedFile: number;
  prDescScroll: number;
  panelRects: PanelRects;
  // The focused panel fills the screen
  zoomed: boolean;

  // Diff view (reset whenever the commit or file changes)
  diff: DiffViewState;

  // Interaction
  mode: Mode;
  // First half of a "]x" / "[x" sequence
  pendingKey: "]" | "[" | null;
  commentEditor: TextEditor;
  reviewEditor: TextEditor;
  // Editors are mutated in place; this changes with every edit
  editorVersion: number;

  // Review
  pendingComments: PendingComment[];
  viewedFiles: Set<string>;
  submitRequest: SubmitRequest | null;
  submitting: boolean;
  // Bumped whenever the media worker's current item changes
  mediaVersion: number;

  // Lifecycle
  statusMessage: StatusMessage | null;
  shouldQuit: boolean;
}

export type { ReviewState };

type Listener = () => void;
type Selector<T> = (state: ReviewState) => T;

export interface ReviewStoreOptions {
  owner: string;
  repo: string;
  prNumber: number;
  data: PullRequestData;
  reviewComments?: ReviewComment[];
  currentUser?: string | null;
}

export interface ReviewStoreDeps {
  submitReview?: (payload: ReviewPayload) => Promise<unknown>;
  openUrl?: (url: string) => Promise<void>;
  copyToClipboard?: (text: string) => Promise<void>;
  highlight?: (patch: string, filename: string, status: string) => string[] | null;
  mediaWorker?: MediaWorker;
  now?: () => number;
}

interface ParsedFile {
  key: string;
  lines: DiffLine[];
  lineMap: LineMapEntry[];
  commentCounts: Map<number, number>;
}

// ============================================================================
// External Store
// ============================================================================

export class ReviewStore {
  private state: ReviewState;
  private listeners = new Set<Listener>();
  private deps: ReviewStoreDeps;

  // Derived caches, keyed by what they depend on
  private parsed: ParsedFile | null = null;
  private offsetsKey: string | null = null;
  private highlighted: { key: string; lines: string[] | null } | null = null;
  private description: { width: number; lines: StyledLine[] } | null = null;

  constructor(options: ReviewStoreOptions, deps: ReviewStoreDeps = {}) {
    this.deps = deps;
    const { data } = options;

    const filesMap: Record<string, DiffFile[]> = {};
    for (const [sha, files] of Object.entries(data.filesMap)) {
      filesMap[sha] = sortFilesLikeTree(files);
    }

    this.state = {
      owner: options.owner,
      repo: options.repo,
      prNumber: options.prNumber,
      prTitle: data.title,
      prBody: data.body,
      prAuthor: data.author,
      commits: data.commits,
      filesMap,
      reviewComments: options.reviewComments ?? [],
      currentUser: options.currentUser ?? null,
      mediaRefs: extractMediaRefs(data.body),
      focusedPanel: "fileTree",
      selectedCommit: 0,
      selectedFile: 0,
      prDescScroll: 0,
      panelRects: {},
      zoomed: false,
      diff: { ...createDiffViewState(), viewHeight: 20, viewWidth: 80 },
      mode: NORMAL,
      pendingKey: null,
      commentEditor: new TextEditor(),
      reviewEditor: new TextEditor(),
      editorVersion: 0,
      pendingComments: [],
      viewedFiles: new Set(),
      submitRequest: null,
      submitting: false,
      mediaVersion: 0,
      statusMessage: null,
      shouldQuit: false,
    };
    this.state.diff = this.resetDiff(this.state.diff);
  }

  // ---------------------------------------------------------------------------
  // Subscription
  // ---------------------------------------------------------------------------

  subscribe = (listener: Listener): (() => void) => {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  };

  getSnapshot = (): ReviewState => this.state;

  private emit() {
    this.listeners.forEach((l) => l());
  }

  private set(partial: Partial<ReviewState>) {
    this.state = { ...this.state, ...partial };
    this.emit();
  }

  private now(): number {
    return this.deps.now ? this.deps.now() : Date.now();
  }

  // ---------------------------------------------------------------------------
  // Derived Data
  // ---------------------------------------------------------------------------

  getCurrentCommit = (): CommitInfo | undefined =>
    this.state.commits[this.state.selectedCommit];

  getCurrentFiles = (): DiffFile[] => {
    const commit = this.getCurrentCommit();
    return commit ? this.state.filesMap[commit.sha] ?? [] : [];
  };

  getCurrentFile = (): DiffFile | undefined =>
    this.getCurrentFiles()[this.state.selectedFile];

  private selectionKey(): string {
    return `${this.state.selectedCommit}:${this.state.selectedFile}`;
  }

  private getParsed(): ParsedFile {
    const key = this.selectionKey();
    if (this.parsed?.key === key) return this.parsed;

    const file = this.getCurrentFile();
    const lines = parsePatch(file?.patch ?? "");
    const lineMap = buildLineMap(lines);
    this.parsed = {
      key,
      lines,
      lineMap,
      commentCounts: file
        ? existingCommentCounts(this.state.reviewComments, file.filename, lineMap)
        : new Map(),
    };
    return this.parsed;
  }

  getDiffLines = (): DiffLine[] => this.getParsed().lines;

  getLineMap = (): LineMapEntry[] => this.getParsed().lineMap;

  getCommentCounts = (): Map<number, number> => this.getParsed().commentCounts;

  /** Externally highlighted lines for the current file, or null for plain coloring. */
  getHighlightedLines = (): string[] | null => {
    const key = this.selectionKey();
    if (this.highlighted?.key === key) return this.highlighted.lines;
    const file = this.getCurrentFile();
    const lines =
      file?.patch !== undefined && this.deps.highlight
        ? this.deps.highlight(file.patch, file.filename, file.status)
        : null;
    this.highlighted = { key, lines };
    return lines;
  };

  getDescriptionLines = (): StyledLine[] => {
    const rect = this.state.panelRects.prDescription;
    // Hidden behind a zoomed panel: keep the last rendering
    if (rect?.width === 0 && this.description) return this.description.lines;
    const width = Math.max(1, (rect?.width ?? 42) - 2);
    if (this.description?.width === width) return this.description.lines;
    const { text } = preprocessPrBody(this.state.prBody);
    this.description = { width, lines: renderMarkdown(text, width) };
    return this.description.lines;
  };

  getMediaEntry = (): MediaEntry | null => this.deps.mediaWorker?.getCurrent() ?? null;

  isOwnPr = (): boolean => this.state.currentUser === this.state.prAuthor;

  getAvailableEvents = (): ReviewEvent[] => availableEvents(this.isOwnPr());

  isFileViewed = (filename: string): boolean => this.state.viewedFiles.has(filename);

  isCommitViewed = (sha: string): boolean => {
    const files = this.state.filesMap[sha] ?? [];
    return files.length > 0 && files.every((f) => this.state.viewedFiles.has(f.filename));
  };

  // ---------------------------------------------------------------------------
  // Diff Layout
  // ---------------------------------------------------------------------------

  /** Recompute the Visual Offset Table if its inputs changed. */
  private withLayout(diff: DiffViewState): DiffViewState {
    if (!diff.wrap) {
      this.offsetsKey = null;
      return diff.visualOffsets ? { ...diff, visualOffsets: null } : diff;
    }
    const key = `${this.selectionKey()}:${diff.viewWidth}:${diff.showLineNumbers}`;
    if (this.offsetsKey === key && diff.visualOffsets) return diff;

    this.offsetsKey = key;
    return {
      ...diff,
      visualOffsets: computeDiffVisualOffsets(this.getDiffLines(), {
        width: diff.viewWidth,
        status: this.getCurrentFile()?.status ?? "",
        showLineNumbers: diff.showLineNumbers,
      }),
    };
  }

  private resetDiff(diff: DiffViewState): DiffViewState {
    this.offsetsKey = null;
    const next = this.withLayout({ ...diff, visualOffsets: null, scroll: 0 });
    return { ...next, cursor: scrollToTop(this.getDiffLines()) };
  }

  private setCursor(cursor: number) {
    const diff = { ...this.state.diff, cursor };
    this.set({ diff: { ...diff, scroll: ensureCursorVisible(diff) } });
  }

  /** Called by the UI with the rectangles it last rendered. */
  setPanelRects = (rects: PanelRects) => {
    const diffRect = rects.diffView;
    let diff = this.state.diff;
    // A hidden diff keeps its viewport for when it comes back
    if (diffRect && diffRect.width > 0) {
      diff = {
        ...diff,
        viewHeight: Math.max(1, diffRect.height - 2),
        viewWidth: Math.max(1, diffRect.width - 2),
      };
      diff = this.withLayout(diff);
      diff = { ...diff, scroll: ensureCursorVisible(diff) };
    }
    this.set({ panelRects: rects, diff });
  };

  /** Wrap width of the comment and review body editors. */
  setEditorWidth = (width: number) => {
    this.state.commentEditor.setDisplayWidth(width);
    this.state.reviewEditor.setDisplayWidth(width);
  };

  // ---------------------------------------------------------------------------
  // Selection Actions
  // ---------------------------------------------------------------------------

  selectCommit = (index: number) => {
    const count = this.state.commits.length;
    if (count === 0) return;
    const selectedCommit = Math.min(Math.max(index, 0), count - 1);
    if (selectedCommit === this.state.selectedCommit) return;
    this.state = { ...this.state, selectedCommit, selectedFile: 0 };
    this.set({ diff: this.resetDiff(this.state.diff) });
  };

  selectFile = (index: number) => {
    const count = this.getCurrentFiles().length;
    if (count === 0) return;
    const selectedFile = Math.min(Math.max(index, 0), count - 1);
    if (selectedFile === this.state.selectedFile) return;
    this.state = { ...this.state, selectedFile };
    this.set({ diff: this.resetDiff(this.state.diff) });
  };

  focusPanel = (panel: Panel) => {
    if (panel === "diffView" && !this.getCurrentFile()) return;
    this.set({ focusedPanel: panel, pendingKey: null });
  };

  private cyclePanel(delta: 1 | -1) {
    const current = this.state.focusedPanel === "diffView" ? "fileTree" : this.state.focusedPanel;
    const idx = PANEL_CYCLE.indexOf(current);
    const next = (idx + delta + PANEL_CYCLE.length) % PANEL_CYCLE.length;
    this.focusPanel(PANEL_CYCLE[next]);
  }

  toggleFileViewed = (filename: string) => {
    const viewedFiles = new Set(this.state.viewedFiles);
    if (viewedFiles.has(filename)) {
      viewedFiles.delete(filename);
    } else {
      viewedFiles.add(filename);
    }
    this.set({ viewedFiles });
  };

  toggleCommitViewed = (sha: string) => {
    const files = this.state.filesMap[sha] ?? [];
    const markViewed = !this.isCommitViewed(sha);
    const viewedFiles = new Set(this.state.viewedFiles);
    for (const file of files) {
      if (markViewed) {
        viewedFiles.add(file.filename);
      } else {
        viewedFiles.delete(file.filename);
      }
    }
    this.set({ viewedFiles });
  };

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  setStatus = (body: string, level: StatusMessage["level"] = "info") => {
    this.set({ statusMessage: { body, level, createdAt: this.now() } });
  };

  /** Periodic housekeeping: expire the status banner and collect media work. */
  tick = () => {
    const { statusMessage } = this.state;
    if (statusMessage && isStatusExpired(statusMessage, this.now())) {
      this.set({ statusMessage: null });
    }
    if (this.deps.mediaWorker?.poll()) {
      this.set({ mediaVersion: this.state.mediaVersion + 1 });
    }
  };

  // ---------------------------------------------------------------------------
  // Keyboard
  // ---------------------------------------------------------------------------

  handleKey = (input: KeyInput) => {
    const { mode } = this.state;
    switch (mode.type) {
      case "normal":
        return this.handleNormalKey(input);
      case "lineSelect":
        return this.handleLineSelectKey(input, mode.anchor);
      case "commentInput":
        return this.handleCommentInputKey(input, mode.anchor);
      case "commentView":
        return this.handleCommentViewKey(input, mode.comments, mode.scroll);
      case "reviewSubmit":
        return this.handleReviewSubmitKey(input, mode.eventIndex, mode.quitAfterSubmit);
      case "reviewBodyInput":
        return this.handleReviewBodyKey(input, mode.event, mode.quitAfterSubmit);
      case "quitConfirm":
        return this.handleQuitConfirmKey(input);
      case "help":
        return this.handleHelpKey(input, mode.scroll);
      case "mediaViewer":
        return this.handleMediaViewerKey(input, mode.index);
    }
  };

  private handleNormalKey(input: KeyInput) {
    const { focusedPanel, pendingKey } = this.state;

    if (pendingKey) {
      this.set({ pendingKey: null });
      if (input.type === "char" && !input.ctrl) {
        this.runJump(pendingKey, input.char);
      }
      return;
    }

    if (matchesKey(input, "QUIT")) {
      if (this.state.pendingComments.length === 0) {
        this.set({ shouldQuit: true });
      } else {
        this.set({ mode: { type: "quitConfirm" } });
      }
      return;
    }
    if (matchesKey(input, "SHOW_HELP")) {
      this.set({ mode: { type: "help", scroll: 0 } });
      return;
    }
    if (matchesKey(input, "SUBMIT_REVIEW")) {
      this.set({ mode: { type: "reviewSubmit", eventIndex: 0, quitAfterSubmit: false } });
      return;
    }
    if (matchesKey(input, "NEXT_PANEL")) return this.cyclePanel(1);
    if (matchesKey(input, "PREV_PANEL")) return this.cyclePanel(-1);
    if (matchesKey(input, "FOCUS_PANEL") && input.type === "char") {
      this.focusPanel(PANEL_CYCLE[Number(input.char) - 1]);
      return;
    }
    if (matchesKey(input, "TOGGLE_ZOOM")) {
      this.set({ zoomed: !this.state.zoomed });
      return;
    }
    if (matchesKey(input, "TOGGLE_WRAP")) return this.toggleWrap();
    if (matchesKey(input, "TOGGLE_LINE_NUMBERS")) return this.toggleLineNumbers();

    switch (focusedPanel) {
      case "prDescription":
        return this.handleDescriptionKey(input);
      case "commitList":
        return this.handleCommitListKey(input);
      case "fileTree":
        return this.handleFileTreeKey(input);
      case "diffView":
        return this.handleDiffKey(input);
    }
  }

  /** Shared list movement for the commit list and file tree. */
  private listStep(input: KeyInput, selected: number, count: number, height: number): number | null {
    const half = Math.max(1, Math.floor(height / 2));
    if (matchesKey(input, "MOVE_DOWN")) return selected + 1;
    if (matchesKey(input, "MOVE_UP")) return selected - 1;
    if (matchesKey(input, "HALF_PAGE_DOWN")) return selected + half;
    if (matchesKey(input, "HALF_PAGE_UP")) return selected - half;
    if (matchesKey(input, "PAGE_DOWN")) return selected + Math.max(1, height);
    if (matchesKey(input, "PAGE_UP")) return selected - Math.max(1, height);
    if (matchesKey(input, "GO_TOP")) return 0;
    if (matchesKey(input, "GO_BOTTOM")) return count - 1;
    return null;
  }

  private innerHeight(panel: Panel): number {
    return Math.max(1, (this.state.panelRects[panel]?.height ?? 10) - 2);
  }

  private handleDescriptionKey(input: KeyInput) {
    if (matchesKey(input, "OPEN_MEDIA")) return this.openMediaViewer();
    const max = Math.max(0, this.getDescriptionLines().length - 1);
    const next = this.listStep(input, this.state.prDescScroll, max + 1, this.innerHeight("prDescription"));
    if (next !== null) {
      this.set({ prDescScroll: Math.min(Math.max(next, 0), max) });
    }
  }

  private handleCommitListKey(input: KeyInput) {
    const commit = this.getCurrentCommit();
    if (matchesKey(input, "TOGGLE_VIEWED") && commit) {
      this.toggleCommitViewed(commit.sha);
      return;
    }
    if (matchesKey(input, "COPY") && commit) {
      this.copyToClipboard(commit.sha.slice(0, 7), "SHA");
      return;
    }
    if (matchesKey(input, "COPY_MESSAGE") && commit) {
      this.copyToClipboard(commit.message.split("\n")[0], "message");
      return;
    }
    const next = this.listStep(
      input,
      this.state.selectedCommit,
      this.state.commits.length,
      this.innerHeight("commitList")
    );
    if (next !== null) this.selectCommit(next);
  }

  private handleFileTreeKey(input: KeyInput) {
    const file = this.getCurrentFile();
    if (matchesKey(input, "OPEN")) return this.focusPanel("diffView");
    if (matchesKey(input, "TOGGLE_VIEWED") && file) {
      this.toggleFileViewed(file.filename);
      return;
    }
    if (matchesKey(input, "COPY") && file) {
      this.copyToClipboard(file.filename, "path");
      return;
    }
    const next = this.listStep(
      input,
      this.state.selectedFile,
      this.getCurrentFiles().length,
      this.innerHeight("fileTree")
    );
    if (next !== null) this.selectFile(next);
  }

  private handleDiffKey(input: KeyInput) {
    const lines = this.getDiffLines();
    const { diff } = this.state;
    const onHeader = lines[diff.cursor]?.kind === "header";
    const half = Math.max(1, Math.floor(diff.viewHeight / 2));

    if (matchesKey(input, "BACK")) return this.focusPanel("fileTree");
    if (matchesKey(input, "OPEN")) return this.openCommentView();
    if (matchesKey(input, "NEXT_PREFIX")) return this.set({ pendingKey: "]" });
    if (matchesKey(input, "PREV_PREFIX")) return this.set({ pendingKey: "[" });

    if (matchesKey(input, "SELECT_LINES")) {
      if (lines.length > 0 && !onHeader) {
        this.set({ mode: { type: "lineSelect", anchor: diff.cursor } });
      }
      return;
    }
    if (matchesKey(input, "COMMENT")) {
      if (lines.length > 0 && !onHeader) this.startComment(diff.cursor);
      return;
    }

    if (matchesKey(input, "MOVE_DOWN")) return this.setCursor(moveCursorDown(lines, diff.cursor));
    if (matchesKey(input, "MOVE_UP")) return this.setCursor(moveCursorUp(lines, diff.cursor));
    if (matchesKey(input, "HALF_PAGE_DOWN")) return this.setCursor(pageDown(lines, diff, half));
    if (matchesKey(input, "HALF_PAGE_UP")) return this.setCursor(pageUp(lines, diff, half));
    if (matchesKey(input, "PAGE_DOWN")) return this.setCursor(pageDown(lines, diff, diff.viewHeight));
    if (matchesKey(input, "PAGE_UP")) return this.setCursor(pageUp(lines, diff, diff.viewHeight));
    if (matchesKey(input, "GO_TOP")) return this.setCursor(scrollToTop(lines));
    if (matchesKey(input, "GO_BOTTOM")) return this.setCursor(scrollToEnd(lines));
  }

  private runJump(prefix: "]" | "[", target: string) {
    if (this.state.focusedPanel !== "diffView") return;
    const lines = this.getDiffLines();
    const { cursor } = this.state.diff;
    const forward = prefix === "]";

    switch (target) {
      case "c":
        return this.setCursor(forward ? jumpToNextChange(lines, cursor) : jumpToPrevChange(lines, cursor));
      case "h":
        return this.setCursor(forward ? jumpToNextHunk(lines, cursor) : jumpToPrevHunk(lines, cursor));
      case "n": {
        const commentLines = [...this.getCommentCounts().keys()];
        return this.setCursor(
          forward ? jumpToNextComment(commentLines, cursor) : jumpToPrevComment(commentLines, cursor)
        );
      }
    }
  }

  private toggleWrap() {
    const { diff } = this.state;
    const wrap = !diff.wrap;
    // The table is rebuilt before converting, so the conversion never reads a stale one
    this.offsetsKey = null;
    const next = this.withLayout({ ...diff, wrap, visualOffsets: null });
    const scroll = wrap
      ? visualLineOffset(next, diff.scroll)
      : visualToLogicalLine(diff, diff.scroll);
    const converted = { ...next, scroll };
    this.set({ diff: { ...converted, scroll: ensureCursorVisible(converted) } });
  }

  private toggleLineNumbers() {
    const { diff } = this.state;
    this.offsetsKey = null;
    const next = this.withLayout({
      ...diff,
      showLineNumbers: !diff.showLineNumbers,
      visualOffsets: null,
    });
    this.set({ diff: { ...next, scroll: ensureCursorVisible(next) } });
  }

  private startComment(anchor: number) {
    this.state.commentEditor.clear();
    this.set({
      mode: { type: "commentInput", anchor },
      editorVersion: this.state.editorVersion + 1,
    });
  }

  private copyToClipboard(text: string, label: string) {
    const { copyToClipboard } = this.deps;
    if (!copyToClipboard) {
      this.setStatus("✗ Failed to copy to clipboard: no clipboard available", "error");
      return;
    }
    void copyToClipboard(text).then(
      () => this.setStatus(`✓ Copied ${label}: ${text}`),
      (error: unknown) =>
        this.setStatus(`✗ Failed to copy to clipboard: ${errorMessage(error)}`, "error")
    );
  }

  private openCommentView() {
    const file = this.getCurrentFile();
    if (!file) return;
    const comments = commentsAtDiffLine(
      this.state.reviewComments,
      file.filename,
      this.getLineMap(),
      this.state.diff.cursor
    );
    if (comments.length === 0) return;
    this.set({ mode: { type: "commentView", comments, scroll: 0 } });
  }

  private openMediaViewer() {
    const first = this.state.mediaRefs[0];
    if (!first) {
      this.setStatus("No images or videos in PR description");
      return;
    }
    this.deps.mediaWorker?.request(first.url);
    this.set({ mode: { type: "mediaViewer", index: 0 } });
  }

  // ---------------------------------------------------------------------------
  // Modes
  // ---------------------------------------------------------------------------

  private handleLineSelectKey(input: KeyInput, anchor: number) {
    const lines = this.getDiffLines();
    const { cursor } = this.state.diff;

    if (matchesKey(input, "BACK")) {
      this.set({ mode: NORMAL });
      return;
    }
    if (matchesKey(input, "MOVE_DOWN")) return this.setCursor(extendSelection(lines, anchor, cursor, 1));
    if (matchesKey(input, "MOVE_UP")) return this.setCursor(extendSelection(lines, anchor, cursor, -1));
    if (matchesKey(input, "COMMENT")) {
      this.state.commentEditor.clear();
      this.set({
        mode: { type: "commentInput", anchor },
        editorVersion: this.state.editorVersion + 1,
      });
    }
  }

  private handleCommentInputKey(input: KeyInput, anchor: number) {
    const editor = this.state.commentEditor;

    if (isNamed(input, "escape")) {
      editor.clear();
      this.set({ mode: NORMAL, editorVersion: this.state.editorVersion + 1 });
      return;
    }

    if (matchesKey(input, "CONFIRM_INPUT")) {
      const body = editor.text();
      const file = this.getCurrentFile();
      const commit = this.getCurrentCommit();
      if (!file || !commit) return;
      if (body.trim().length === 0) {
        this.setStatus("Comment is empty");
        return;
      }

      const [startLine, endLine] = selectionRange(anchor, this.state.diff.cursor);
      const pending: PendingComment = {
        filePath: file.filename,
        startLine,
        endLine,
        body,
        commitSha: commit.sha,
      };
      editor.clear();
      this.set({
        mode: NORMAL,
        editorVersion: this.state.editorVersion + 1,
        pendingComments: [...this.state.pendingComments, pending],
      });
      return;
    }

    if (editor.handleKey(input)) {
      editor.ensureVisible(EDITOR_VISIBLE_HEIGHT);
      this.set({ editorVersion: this.state.editorVersion + 1 });
    }
  }

  private handleCommentViewKey(input: KeyInput, comments: ReviewComment[], scroll: number) {
    if (matchesKey(input, "BACK") || isChar(input, "q")) {
      this.set({ mode: NORMAL });
      return;
    }
    const max = Math.max(0, formatCommentThread(comments).length - 1);
    if (matchesKey(input, "MOVE_DOWN")) {
      this.set({ mode: { type: "commentView", comments, scroll: Math.min(scroll + 1, max) } });
    } else if (matchesKey(input, "MOVE_UP")) {
      this.set({ mode: { type: "commentView", comments, scroll: Math.max(scroll - 1, 0) } });
    }
  }

  private handleReviewSubmitKey(input: KeyInput, eventIndex: number, quitAfterSubmit: boolean) {
    const events = this.getAvailableEvents();

    if (matchesKey(input, "BACK")) {
      this.set({ mode: NORMAL });
      return;
    }
    if (matchesKey(input, "MOVE_DOWN")) {
      const next = (eventIndex + 1) % events.length;
      this.set({ mode: { type: "reviewSubmit", eventIndex: next, quitAfterSubmit } });
      return;
    }
    if (matchesKey(input, "MOVE_UP")) {
      const next = (eventIndex - 1 + events.length) % events.length;
      this.set({ mode: { type: "reviewSubmit", eventIndex: next, quitAfterSubmit } });
      return;
    }
    if (matchesKey(input, "OPEN")) {
      const event = events[eventIndex] ?? "COMMENT";
      if (event === "COMMENT" && this.state.pendingComments.length === 0) {
        this.set({ mode: NORMAL });
        this.setStatus("No pending comments to submit", "error");
        return;
      }
      this.state.reviewEditor.clear();
      this.set({
        mode: { type: "reviewBodyInput", event, quitAfterSubmit },
        editorVersion: this.state.editorVersion + 1,
      });
    }
  }

  private handleReviewBodyKey(input: KeyInput, event: ReviewEvent, quitAfterSubmit: boolean) {
    const editor = this.state.reviewEditor;

    if (isNamed(input, "escape")) {
      editor.clear();
      const eventIndex = Math.max(0, this.getAvailableEvents().indexOf(event));
      this.set({
        mode: { type: "reviewSubmit", eventIndex, quitAfterSubmit },
        editorVersion: this.state.editorVersion + 1,
      });
      return;
    }

    if (matchesKey(input, "CONFIRM_INPUT")) {
      this.set({ mode: NORMAL, submitRequest: { event, quitAfterSubmit } });
      return;
    }

    if (editor.handleKey(input)) {
      editor.ensureVisible(EDITOR_VISIBLE_HEIGHT);
      this.set({ editorVersion: this.state.editorVersion + 1 });
    }
  }

  private handleQuitConfirmKey(input: KeyInput) {
    if (isChar(input, "y")) {
      this.set({ mode: { type: "reviewSubmit", eventIndex: 0, quitAfterSubmit: true } });
    } else if (isChar(input, "n")) {
      this.set({ pendingComments: [], shouldQuit: true });
    } else if (isChar(input, "c") || isNamed(input, "escape")) {
      this.set({ mode: NORMAL });
    }
  }

  private handleHelpKey(input: KeyInput, scroll: number) {
    if (matchesKey(input, "SHOW_HELP") || matchesKey(input, "BACK") || isChar(input, "q")) {
      this.set({ mode: NORMAL });
      return;
    }
    if (matchesKey(input, "MOVE_DOWN")) this.scrollHelp(scroll + 1);
    else if (matchesKey(input, "MOVE_UP")) this.scrollHelp(scroll - 1);
  }

  private scrollHelp(scroll: number) {
    const max = Math.max(0, getHelpLines().length - 1);
    this.set({ mode: { type: "help", scroll: Math.min(Math.max(scroll, 0), max) } });
  }

  private handleMediaViewerKey(input: KeyInput, index: number) {
    const refs = this.state.mediaRefs;
    if (matchesKey(input, "BACK") || isChar(input, "q")) {
      this.set({ mode: NORMAL });
      return;
    }
    if (refs.length === 0) return;

    let next: number | null = null;
    if (isChar(input, "l") || isNamed(input, "right")) next = (index + 1) % refs.length;
    if (isChar(input, "h") || isNamed(input, "left")) next = (index - 1 + refs.length) % refs.length;
    if (next !== null) {
      this.deps.mediaWorker?.request(refs[next].url);
      this.set({ mode: { type: "mediaViewer", index: next } });
      return;
    }
    if (isChar(input, "o") && this.deps.openUrl) {
      const { url } = refs[index];
      void this.deps.openUrl(url).then(
        () => this.setStatus(`Opened ${url}`),
        (error: unknown) => this.setStatus(`✗ Failed: ${errorMessage(error)}`, "error")
      );
    }
  }

  // ---------------------------------------------------------------------------
  // Mouse
  // ---------------------------------------------------------------------------

  private panelAt(x: number, y: number): Panel | null {
    const panels: Panel[] = ["prDescription", "commitList", "fileTree", "diffView"];
    for (const panel of panels) {
      const rect = this.state.panelRects[panel];
      if (rect && containsPoint(rect, x, y)) return panel;
    }
    return null;
  }

  handleMouse = (event: MouseInput) => {
    const { mode } = this.state;
    if (mode.type === "help") {
      if (event.button === "wheelDown") this.scrollHelp(mode.scroll + WHEEL_ROWS);
      if (event.button === "wheelUp") this.scrollHelp(mode.scroll - WHEEL_ROWS);
      return;
    }
    if (mode.type !== "normal" && mode.type !== "lineSelect") return;

    const panel = this.panelAt(event.x, event.y);
    if (!panel) return;

    if (event.button !== "left") {
      this.handleWheel(panel, event.button === "wheelDown" ? WHEEL_ROWS : -WHEEL_ROWS);
      return;
    }
    if (event.action === "down") this.handleClick(panel, event.x, event.y);
    else if (event.action === "drag" && panel === "diffView") this.handleDrag(event.y);
  };

  private handleWheel(panel: Panel, rows: number) {
    switch (panel) {
      case "prDescription": {
        const max = Math.max(0, this.getDescriptionLines().length - 1);
        this.set({ prDescScroll: Math.min(Math.max(this.state.prDescScroll + rows, 0), max) });
        return;
      }
      case "commitList":
        return this.selectCommit(this.state.selectedCommit + Math.sign(rows));
      case "fileTree":
        return this.selectFile(this.state.selectedFile + Math.sign(rows));
      case "diffView": {
        if (this.state.mode.type !== "normal") return;
        const { cursor, scroll } = scrollByRows(this.getDiffLines(), this.state.diff, rows);
        this.set({ diff: { ...this.state.diff, cursor, scroll } });
        return;
      }
    }
  }

  private handleClick(panel: Panel, x: number, y: number) {
    const rect = this.state.panelRects[panel];
    if (!rect) return;
    const row = y - rect.y - 1;
    const height = rect.height - 2;

    if (this.state.mode.type === "lineSelect") {
      this.set({ mode: NORMAL });
    }

    switch (panel) {
      case "prDescription":
        this.focusPanel(panel);
        return;
      case "commitList": {
        this.focusPanel(panel);
        const count = this.state.commits.length;
        const start = listWindowStart(this.state.selectedCommit, count, height);
        if (row >= 0 && start + row < count) this.selectCommit(start + row);
        return;
      }
      case "fileTree": {
        this.focusPanel(panel);
        const count = this.getCurrentFiles().length;
        const start = listWindowStart(this.state.selectedFile, count, height);
        if (row >= 0 && start + row < count) this.selectFile(start + row);
        return;
      }
      case "diffView": {
        this.focusPanel(panel);
        const lines = this.getDiffLines();
        if (row < 0 || row >= height || lines.length === 0) return;
        // The right border doubles as a scrollbar
        if (x === rect.x + rect.width - 1) {
          const percent = height > 1 ? (row / (height - 1)) * 100 : 0;
          this.setCursor(jumpToPercent(lines, percent));
          return;
        }
        this.setCursor(lineAtViewRow(lines, this.state.diff, row));
        return;
      }
    }
  }

  private handleDrag(y: number) {
    const rect = this.state.panelRects.diffView;
    if (!rect || this.state.focusedPanel !== "diffView") return;
    const lines = this.getDiffLines();
    const { diff, mode } = this.state;

    let anchor: number;
    if (mode.type === "lineSelect") {
      anchor = mode.anchor;
    } else {
      if (lines[diff.cursor]?.kind === "header") return;
      anchor = diff.cursor;
      this.set({ mode: { type: "lineSelect", anchor } });
    }

    const target = lineAtViewRow(lines, diff, y - rect.y - 1);
    let cursor = diff.cursor;
    while (cursor !== target) {
      const next = extendSelection(lines, anchor, cursor, target > cursor ? 1 : -1);
      if (next === cursor) break;
      cursor = next;
    }
    this.setCursor(cursor);
  }

  // ---------------------------------------------------------------------------
  // Review Submission
  // ---------------------------------------------------------------------------

  /**
   * Send the requested review. Runs after the frame that recorded the
   * request, so the UI has already left the input mode.
   */
  submitPendingReview = async (): Promise<void> => {
    const request = this.state.submitRequest;
    if (!request || this.state.submitting) return;
    this.set({ submitRequest: null, submitting: true });

    try {
      const payload = buildReviewPayload({
        pendingComments: this.state.pendingComments,
        filesMap: this.state.filesMap,
        commits: this.state.commits,
        event: request.event,
        body: this.state.reviewEditor.text(),
      });
      if (!this.deps.submitReview) {
        throw new Error("Review submission is not configured");
      }
      await this.deps.submitReview(payload);

      const n = payload.comments.length;
      this.state.reviewEditor.clear();
      this.set({
        submitting: false,
        pendingComments: [],
        editorVersion: this.state.editorVersion + 1,
        shouldQuit: request.quitAfterSubmit,
      });
      const label = REVIEW_EVENT_LABELS[request.event];
      this.setStatus(n > 0 ? `✓ ${label} (${n} comment${n === 1 ? "" : "s"})` : `✓ ${label}`);
    } catch (error) {
      this.set({ submitting: false });
      this.setStatus(`✗ Failed: ${errorMessage(error)}`, "error");
    }
  };
}

// ============================================================================
// Context
// ============================================================================

const ReviewContext = createContext<ReviewStore | null>(null);

export function ReviewProvider({
  store,
  children,
}: {
  store: ReviewStore;
  children: ReactNode;
}) {
  return <ReviewContext.Provider value={store}>{children}</ReviewContext.Provider>;
}

// ============================================================================
// Base Hooks
// ============================================================================

function useStore(): ReviewStore {
  const store = useContext(ReviewContext);
  if (!store) {
    throw new Error("useStore must be used within ReviewProvider");
  }
  return store;
}

/**
 * Subscribe to a slice of state. Component only re-renders when the selected
 * value changes (using Object.is comparison).
 */
export function useReviewSelector<T>(selector: Selector<T>): T {
  const store = useStore();
  return useSyncExternalStore(
    store.subscribe,
    () => selector(store.getSnapshot()),
    () => selector(store.getSnapshot())
  );
}

/**
 * Get the store directly for accessing actions or reading state imperatively.
 * The store reference is stable and never changes.
 */
export function useReviewStore(): ReviewStore {
  return useStore();
}
