import { test, expect, vi } from "vitest";
import type { PullRequestData, ReviewComment, ReviewPayload } from "@/api/types";
import { charKey, namedKey, type KeyInput, type MouseInput } from "@/tui/lib/keys";
import { MediaWorker, type PreparedMedia } from "@/tui/lib/media";
import { computeScreenLayout, ReviewStore, sortFilesLikeTree, type ReviewStoreDeps } from "./index";

// ============================================================================
// Test Fixtures
// ============================================================================

// 0 @@, 1 ctx1, 2 -old, 3 +new, 4 ctx2, 5 @@, 6 ctx3, 7 +add, 8 ctx4
const INDEX_PATCH =
  "@@ -1,3 +1,3 @@\n ctx1\n-old\n+new\n ctx2\n@@ -20,2 +20,2 @@\n ctx3\n+add\n ctx4";

function createMockData(overrides?: Partial<PullRequestData>): PullRequestData {
  return {
    title: "Add widgets",
    body: "Adds widgets",
    author: "author",
    headSha: "bbb222",
    commits: [
      { sha: "aaa111", message: "First", author: "author", date: "2024-01-01T00:00:00Z" },
      { sha: "bbb222", message: "Second", author: "author", date: "2024-01-02T00:00:00Z" },
    ],
    filesMap: {
      aaa111: [
        { filename: "README.md", status: "modified", additions: 1, deletions: 0, patch: "@@ -1 +1,2 @@\n a\n+b" },
        { filename: "src/index.ts", status: "modified", additions: 2, deletions: 1, patch: INDEX_PATCH },
      ],
      bbb222: [
        { filename: "src/util.ts", status: "added", additions: 2, deletions: 0, patch: "@@ -0,0 +1,2 @@\n+a\n+b" },
      ],
    },
    ...overrides,
  };
}

function createMockComment(id: number, path: string, line: number): ReviewComment {
  return {
    id,
    node_id: `comment_${id}`,
    path,
    line,
    side: "RIGHT",
    body: `Comment ${id}`,
    user: { login: "reviewer" },
    created_at: "2024-01-03T00:00:00Z",
    updated_at: "2024-01-03T00:00:00Z",
  } as ReviewComment;
}

function createStore(overrides?: {
  data?: Partial<PullRequestData>;
  currentUser?: string;
  deps?: ReviewStoreDeps;
}) {
  return new ReviewStore(
    {
      owner: "octo",
      repo: "widgets",
      prNumber: 42,
      data: createMockData(overrides?.data),
      reviewComments: [createMockComment(1, "src/index.ts", 21)],
      currentUser: overrides?.currentUser ?? "reviewer",
    },
    overrides?.deps
  );
}

function press(store: ReviewStore, ...keys: Array<string | KeyInput>) {
  for (const key of keys) {
    store.handleKey(typeof key === "string" ? charKey(key) : key);
  }
}

const ctrl = (char: string) => charKey(char, true);
const enter = namedKey("enter");
const escape = namedKey("escape");

function click(x: number, y: number): MouseInput {
  return { button: "left", action: "down", x, y };
}

const flush = () => new Promise((resolve) => setTimeout(resolve, 0));

// ============================================================================
// Initial State
// ============================================================================

test("files are sorted like the tree and the cursor skips the first header", () => {
  const store = createStore();
  const state = store.getSnapshot();

  expect(state.focusedPanel).toBe("fileTree");
  expect(state.mode).toEqual({ type: "normal" });
  expect(store.getCurrentFile()?.filename).toBe("src/index.ts");
  expect(state.diff.cursor).toBe(1);
});

test("sortFilesLikeTree puts folders before files", () => {
  const sorted = sortFilesLikeTree([
    { filename: "README.md" },
    { filename: "src/index.ts" },
    { filename: "src/components/Button.tsx" },
  ]);
  expect(sorted.map((f) => f.filename)).toEqual([
    "src/components/Button.tsx",
    "src/index.ts",
    "README.md",
  ]);
});

test("subscribers are notified of changes", () => {
  const store = createStore();
  const listener = vi.fn();
  const unsubscribe = store.subscribe(listener);

  press(store, "2");
  expect(listener).toHaveBeenCalled();

  unsubscribe();
  listener.mockClear();
  press(store, "3");
  expect(listener).not.toHaveBeenCalled();
});

// ============================================================================
// Panels
// ============================================================================

test("enter opens the diff and escape returns to the file tree", () => {
  const store = createStore();
  press(store, enter);
  expect(store.getSnapshot().focusedPanel).toBe("diffView");

  press(store, escape);
  expect(store.getSnapshot().focusedPanel).toBe("fileTree");
});

test("tab cycles the left panels and treats the diff as the file tree", () => {
  const store = createStore();
  press(store, namedKey("tab"));
  expect(store.getSnapshot().focusedPanel).toBe("prDescription");
  press(store, "l");
  expect(store.getSnapshot().focusedPanel).toBe("commitList");
  press(store, namedKey("backtab"));
  expect(store.getSnapshot().focusedPanel).toBe("prDescription");

  press(store, "3", enter, namedKey("tab"));
  expect(store.getSnapshot().focusedPanel).toBe("prDescription");
});

test("selecting a commit resets the file and the diff cursor", () => {
  const store = createStore();
  press(store, "2", "j");

  const state = store.getSnapshot();
  expect(state.selectedCommit).toBe(1);
  expect(state.selectedFile).toBe(0);
  expect(store.getCurrentFile()?.filename).toBe("src/util.ts");
  expect(state.diff.cursor).toBe(1);

  press(store, "j");
  expect(store.getSnapshot().selectedCommit).toBe(1);
});

test("x marks files and whole commits as viewed", () => {
  const store = createStore();
  press(store, "x");
  expect(store.isFileViewed("src/index.ts")).toBe(true);
  expect(store.isCommitViewed("aaa111")).toBe(false);

  press(store, "j", "x");
  expect(store.getSnapshot().selectedFile).toBe(1);
  expect(store.isCommitViewed("aaa111")).toBe(true);

  press(store, "2", "x");
  expect(store.isCommitViewed("aaa111")).toBe(false);
  expect(store.isFileViewed("README.md")).toBe(false);
});

// ============================================================================
// Diff Navigation
// ============================================================================

test("line movement skips hunk headers", () => {
  const store = createStore();
  press(store, enter, "j", "j", "j");
  expect(store.getSnapshot().diff.cursor).toBe(4);

  press(store, "j");
  expect(store.getSnapshot().diff.cursor).toBe(6);

  press(store, "G");
  expect(store.getSnapshot().diff.cursor).toBe(8);
  press(store, "g");
  expect(store.getSnapshot().diff.cursor).toBe(1);
});

test("bracket prefixes jump to changes, hunks and comments", () => {
  const store = createStore();
  press(store, enter, "]", "c");
  expect(store.getSnapshot().diff.cursor).toBe(2);

  press(store, "]", "h");
  expect(store.getSnapshot().diff.cursor).toBe(6);

  press(store, "g", "]", "n");
  expect(store.getSnapshot().diff.cursor).toBe(7);

  press(store, "[", "h");
  expect(store.getSnapshot().diff.cursor).toBe(6);
  expect(store.getSnapshot().pendingKey).toBeNull();
});

test("an unknown jump target only clears the prefix", () => {
  const store = createStore();
  press(store, enter, "]");
  expect(store.getSnapshot().pendingKey).toBe("]");

  press(store, "z");
  expect(store.getSnapshot().pendingKey).toBeNull();
  expect(store.getSnapshot().diff.cursor).toBe(1);
});

test("toggling wrap builds and drops the visual offset table", () => {
  const store = createStore();
  press(store, enter, "w");
  expect(store.getSnapshot().diff.wrap).toBe(true);
  expect(store.getSnapshot().diff.visualOffsets).toHaveLength(10);

  press(store, "w");
  expect(store.getSnapshot().diff.wrap).toBe(false);
  expect(store.getSnapshot().diff.visualOffsets).toBeNull();

  press(store, "n");
  expect(store.getSnapshot().diff.showLineNumbers).toBe(true);
});

test("toggling wrap converts the scroll between logical and visual rows", () => {
  const store = createStore();
  // Three columns and three rows inside the border
  store.setPanelRects({ diffView: { x: 0, y: 0, width: 5, height: 5 } });
  press(store, enter, "G");
  expect(store.getSnapshot().diff.scroll).toBe(6);

  // Offsets at width 3: [0, 1, 3, 5, 7, 9, 10, 12, 14, 16]
  press(store, "w");
  expect(store.getSnapshot().diff.visualOffsets).toEqual([0, 1, 3, 5, 7, 9, 10, 12, 14, 16]);
  expect(store.getSnapshot().diff.scroll).toBe(13);

  press(store, "w");
  expect(store.getSnapshot().diff.scroll).toBe(7);
  expect(store.getSnapshot().diff.cursor).toBe(8);
});

// ============================================================================
// Line Selection and Comments
// ============================================================================

test("v enters line selection and escape cancels without a comment", () => {
  const store = createStore();
  press(store, enter, "v");
  expect(store.getSnapshot().mode).toEqual({ type: "lineSelect", anchor: 1 });

  press(store, escape);
  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
  expect(store.getSnapshot().pendingComments).toEqual([]);
});

test("a selection cannot grow past the end of its hunk", () => {
  const store = createStore();
  press(store, enter, "j", "j", "j", "v", "j");
  expect(store.getSnapshot().diff.cursor).toBe(4);
});

test("a confirmed comment is queued with its logical range", () => {
  const store = createStore();
  press(store, enter, "v", "j", "j", "c");
  expect(store.getSnapshot().mode).toEqual({ type: "commentInput", anchor: 1 });

  press(store, "F", "i", "x", ctrl("s"));

  const state = store.getSnapshot();
  expect(state.mode).toEqual({ type: "normal" });
  expect(state.pendingComments).toEqual([
    { filePath: "src/index.ts", startLine: 1, endLine: 3, body: "Fix", commitSha: "aaa111" },
  ]);
  expect(state.commentEditor.text()).toBe("");
});

test("keys typed into a comment do not trigger shortcuts", () => {
  const store = createStore();
  press(store, enter, "c", "q", "?", "j");

  expect(store.getSnapshot().mode.type).toBe("commentInput");
  expect(store.getSnapshot().commentEditor.text()).toBe("q?j");
  expect(store.getSnapshot().shouldQuit).toBe(false);
});

test("an empty comment stays open with a notice", () => {
  const store = createStore({ deps: { now: () => 1000 } });
  press(store, enter, "c", ctrl("s"));

  const state = store.getSnapshot();
  expect(state.mode.type).toBe("commentInput");
  expect(state.pendingComments).toEqual([]);
  expect(state.statusMessage).toEqual({ body: "Comment is empty", level: "info", createdAt: 1000 });
});

test("escape discards the comment being written", () => {
  const store = createStore();
  press(store, enter, "c", "a", escape);

  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
  expect(store.getSnapshot().commentEditor.text()).toBe("");
  expect(store.getSnapshot().pendingComments).toEqual([]);
});

test("enter on a commented line opens its thread", () => {
  const store = createStore();
  press(store, enter, enter);
  expect(store.getSnapshot().mode.type).toBe("normal");

  press(store, "]", "n", enter);
  const { mode } = store.getSnapshot();
  expect(mode.type).toBe("commentView");
  if (mode.type === "commentView") {
    expect(mode.comments.map((c) => c.id)).toEqual([1]);
  }

  press(store, "j");
  expect(store.getSnapshot().mode).toMatchObject({ type: "commentView", scroll: 1 });

  press(store, "q");
  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
});

// ============================================================================
// Quitting
// ============================================================================

test("q quits at once without pending comments", () => {
  const store = createStore();
  press(store, "q");
  expect(store.getSnapshot().shouldQuit).toBe(true);
});

test("q with pending comments asks first", () => {
  const store = createStore();
  press(store, enter, "c", "x", ctrl("s"), "q");
  expect(store.getSnapshot().mode).toEqual({ type: "quitConfirm" });

  press(store, "c");
  expect(store.getSnapshot().mode).toEqual({ type: "normal" });

  press(store, "q", "y");
  expect(store.getSnapshot().mode).toEqual({
    type: "reviewSubmit",
    eventIndex: 0,
    quitAfterSubmit: true,
  });

  press(store, escape, "q", "n");
  expect(store.getSnapshot().shouldQuit).toBe(true);
  expect(store.getSnapshot().pendingComments).toEqual([]);
});

// ============================================================================
// Review Submission
// ============================================================================

test("the event list wraps around", () => {
  const store = createStore();
  press(store, "S");
  expect(store.getSnapshot().mode).toMatchObject({ type: "reviewSubmit", eventIndex: 0 });

  press(store, "j");
  expect(store.getSnapshot().mode).toMatchObject({ eventIndex: 1 });
  press(store, "k", "k");
  expect(store.getSnapshot().mode).toMatchObject({ eventIndex: 2 });
});

test("authors can only comment on their own pull request", () => {
  const store = createStore({ currentUser: "author" });
  expect(store.getAvailableEvents()).toEqual(["COMMENT"]);

  press(store, "S", "j");
  expect(store.getSnapshot().mode).toMatchObject({ eventIndex: 0 });
});

test("a comment review without comments is refused", () => {
  const store = createStore({ deps: { now: () => 5 } });
  press(store, "S", enter);

  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
  expect(store.getSnapshot().statusMessage).toEqual({
    body: "No pending comments to submit",
    level: "error",
    createdAt: 5,
  });
});

test("escape from the review body goes back to the chosen event", () => {
  const store = createStore();
  press(store, "S", "j", enter);
  expect(store.getSnapshot().mode).toEqual({
    type: "reviewBodyInput",
    event: "APPROVE",
    quitAfterSubmit: false,
  });

  press(store, "o", "k", escape);
  expect(store.getSnapshot().mode).toEqual({
    type: "reviewSubmit",
    eventIndex: 1,
    quitAfterSubmit: false,
  });
  expect(store.getSnapshot().reviewEditor.text()).toBe("");
});

test("an approval is submitted against the head commit", async () => {
  const submitReview = vi.fn(async (_payload: ReviewPayload) => undefined);
  const store = createStore({ deps: { submitReview } });

  press(store, "S", "j", enter, "L", "G", "T", "M", ctrl("s"));
  expect(store.getSnapshot().submitRequest).toEqual({ event: "APPROVE", quitAfterSubmit: false });

  await store.submitPendingReview();

  expect(submitReview).toHaveBeenCalledWith({
    commit_id: "bbb222",
    body: "LGTM",
    event: "APPROVE",
    comments: [],
  });
  const state = store.getSnapshot();
  expect(state.submitRequest).toBeNull();
  expect(state.submitting).toBe(false);
  expect(state.statusMessage?.body).toBe("✓ Approve");
  expect(state.reviewEditor.text()).toBe("");
  expect(state.shouldQuit).toBe(false);
});

test("pending comments are sent with the review and then cleared", async () => {
  const submitReview = vi.fn(async (_payload: ReviewPayload) => undefined);
  const store = createStore({ deps: { submitReview } });

  press(store, enter, "v", "j", "j", "c", "F", "i", "x", ctrl("s"));
  press(store, "S", enter, ctrl("s"));
  await store.submitPendingReview();

  expect(submitReview).toHaveBeenCalledWith({
    commit_id: "bbb222",
    body: "",
    event: "COMMENT",
    comments: [
      {
        path: "src/index.ts",
        body: "Fix",
        line: 2,
        side: "RIGHT",
        start_line: 1,
        start_side: "RIGHT",
      },
    ],
  });
  expect(store.getSnapshot().pendingComments).toEqual([]);
  expect(store.getSnapshot().statusMessage?.body).toBe("✓ Comment (1 comment)");
});

test("a failed submission keeps the pending comments", async () => {
  const submitReview = vi.fn(async (_payload: ReviewPayload) => {
    throw new Error("Validation Failed");
  });
  const store = createStore({ deps: { submitReview } });

  press(store, enter, "c", "x", ctrl("s"), "S", enter, ctrl("s"));
  await store.submitPendingReview();

  const state = store.getSnapshot();
  expect(state.pendingComments).toHaveLength(1);
  expect(state.submitting).toBe(false);
  expect(state.statusMessage).toMatchObject({ body: "✗ Failed: Validation Failed", level: "error" });
});

test("submitting without a transport reports an error", async () => {
  const store = createStore();
  press(store, "S", "j", enter, ctrl("s"));
  await store.submitPendingReview();

  expect(store.getSnapshot().statusMessage?.body).toBe(
    "✗ Failed: Review submission is not configured"
  );
});

test("submitting from the quit prompt quits afterwards", async () => {
  const submitReview = vi.fn(async (_payload: ReviewPayload) => undefined);
  const store = createStore({ deps: { submitReview } });

  press(store, enter, "c", "x", ctrl("s"), "q", "y", enter, ctrl("s"));
  expect(store.getSnapshot().submitRequest).toEqual({ event: "COMMENT", quitAfterSubmit: true });

  await store.submitPendingReview();
  expect(submitReview).toHaveBeenCalledTimes(1);
  expect(store.getSnapshot().shouldQuit).toBe(true);
});

// ============================================================================
// Status and Help
// ============================================================================

test("the status message expires on tick", () => {
  let clock = 1000;
  const store = createStore({ deps: { now: () => clock } });
  store.setStatus("Saved");

  clock = 3999;
  store.tick();
  expect(store.getSnapshot().statusMessage?.body).toBe("Saved");

  clock = 4000;
  store.tick();
  expect(store.getSnapshot().statusMessage).toBeNull();
});

test("help opens, scrolls and closes", () => {
  const store = createStore();
  press(store, "?");
  expect(store.getSnapshot().mode).toEqual({ type: "help", scroll: 0 });

  press(store, "j", "j", "k");
  expect(store.getSnapshot().mode).toEqual({ type: "help", scroll: 1 });

  store.handleMouse({ button: "wheelDown", action: "down", x: 0, y: 0 });
  expect(store.getSnapshot().mode).toEqual({ type: "help", scroll: 4 });

  press(store, "k", "k", "k", "k", "k");
  expect(store.getSnapshot().mode).toEqual({ type: "help", scroll: 0 });

  press(store, "?");
  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
});

// ============================================================================
// Clipboard & Zoom
// ============================================================================

test("y copies the file path and the short commit SHA, Y the summary", async () => {
  const copied: string[] = [];
  const copyToClipboard = vi.fn(async (text: string) => {
    copied.push(text);
  });
  const store = createStore({
    data: {
      commits: [
        { sha: "aaa111ffff", message: "First\n\nLonger details", author: "author", date: "2024-01-01T00:00:00Z" },
      ],
      filesMap: { aaa111ffff: [{ filename: "src/index.ts", status: "modified", additions: 2, deletions: 1, patch: INDEX_PATCH }] },
    },
    deps: { copyToClipboard },
  });

  press(store, "y");
  await flush();
  expect(copied).toEqual(["src/index.ts"]);
  expect(store.getSnapshot().statusMessage?.body).toBe("✓ Copied path: src/index.ts");

  press(store, "2", "y");
  await flush();
  expect(store.getSnapshot().statusMessage?.body).toBe("✓ Copied SHA: aaa111f");

  press(store, "Y");
  await flush();
  expect(copied).toEqual(["src/index.ts", "aaa111f", "First"]);
  expect(store.getSnapshot().statusMessage?.body).toBe("✓ Copied message: First");
});

test("a clipboard failure is reported", async () => {
  const copyToClipboard = vi.fn(async (_text: string) => {
    throw new Error("no display");
  });
  const store = createStore({ deps: { copyToClipboard } });

  press(store, "y");
  await flush();
  expect(store.getSnapshot().statusMessage).toMatchObject({
    body: "✗ Failed to copy to clipboard: no display",
    level: "error",
  });
});

test("z zooms the focused panel and survives panel switches", () => {
  const store = createStore();
  press(store, "z");
  expect(store.getSnapshot().zoomed).toBe(true);

  press(store, namedKey("tab"));
  expect(store.getSnapshot().focusedPanel).toBe("prDescription");
  expect(store.getSnapshot().zoomed).toBe(true);

  press(store, "z");
  expect(store.getSnapshot().zoomed).toBe(false);
});

test("a panel hidden by zoom keeps the diff viewport", () => {
  const store = createStore();
  store.setPanelRects(computeScreenLayout(100, 30, "diffView").rects);
  expect(store.getSnapshot().diff.viewWidth).toBe(98);
  expect(store.getSnapshot().diff.viewHeight).toBe(25);

  store.setPanelRects(computeScreenLayout(100, 30, "fileTree").rects);
  expect(store.getSnapshot().diff.viewWidth).toBe(98);
  expect(store.getSnapshot().diff.viewHeight).toBe(25);
});

// ============================================================================
// Media Viewer
// ============================================================================

test("o without media reports it", () => {
  const store = createStore();
  press(store, "1", "o");

  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
  expect(store.getSnapshot().statusMessage?.body).toBe("No images or videos in PR description");
});

test("the media viewer requests and cycles through media", async () => {
  const requested: string[] = [];
  const fetcher = (url: string) => {
    requested.push(url);
    return new Promise<PreparedMedia>(() => undefined);
  };
  const openUrl = vi.fn(async (_url: string) => undefined);
  const store = createStore({
    data: {
      body: "![one](https://example.com/1.png)\n![two](https://example.com/2.png)",
    },
    deps: { mediaWorker: new MediaWorker(fetcher), openUrl },
  });

  press(store, "1", "o");
  expect(store.getSnapshot().mode).toEqual({ type: "mediaViewer", index: 0 });
  expect(store.getMediaEntry()).toEqual({ status: "loading", url: "https://example.com/1.png" });

  press(store, "l");
  expect(store.getSnapshot().mode).toEqual({ type: "mediaViewer", index: 1 });
  press(store, "l");
  expect(store.getSnapshot().mode).toEqual({ type: "mediaViewer", index: 0 });
  expect(requested).toEqual([
    "https://example.com/1.png",
    "https://example.com/2.png",
    "https://example.com/1.png",
  ]);

  press(store, "o");
  await flush();
  expect(openUrl).toHaveBeenCalledWith("https://example.com/1.png");
  expect(store.getSnapshot().statusMessage?.body).toBe("Opened https://example.com/1.png");

  press(store, escape);
  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
});

test("a failure to open media is reported", async () => {
  const openUrl = vi.fn(async (_url: string) => {
    throw new Error("spawn xdg-open ENOENT");
  });
  const store = createStore({
    data: { body: "![one](https://example.com/1.png)" },
    deps: { openUrl },
  });

  press(store, "1", "o", "o");
  await flush();
  expect(store.getSnapshot().statusMessage).toMatchObject({
    body: "✗ Failed: spawn xdg-open ENOENT",
    level: "error",
  });
});

// ============================================================================
// Mouse
// ============================================================================

// 100x30: left column 30 wide; files at y=16..27; diff at x=30..99, y=1..27
function createLaidOutStore() {
  const store = createStore();
  store.setPanelRects(computeScreenLayout(100, 30).rects);
  return store;
}

test("panel rects size the diff viewport", () => {
  const { diff } = createLaidOutStore().getSnapshot();
  expect(diff.viewHeight).toBe(25);
  expect(diff.viewWidth).toBe(68);
});

test("clicking a diff row focuses the diff and moves the cursor", () => {
  const store = createLaidOutStore();
  store.handleMouse(click(40, 5));

  expect(store.getSnapshot().focusedPanel).toBe("diffView");
  expect(store.getSnapshot().diff.cursor).toBe(3);
});

test("clicking the diff's right border jumps by percentage", () => {
  const store = createLaidOutStore();
  store.handleMouse(click(99, 26));
  expect(store.getSnapshot().diff.cursor).toBe(8);
});

test("clicking a file selects it", () => {
  const store = createLaidOutStore();
  store.handleMouse(click(5, 18));

  expect(store.getSnapshot().focusedPanel).toBe("fileTree");
  expect(store.getCurrentFile()?.filename).toBe("README.md");
});

test("the wheel moves the diff cursor with the viewport", () => {
  const store = createLaidOutStore();
  store.handleMouse({ button: "wheelDown", action: "down", x: 50, y: 10 });
  expect(store.getSnapshot().diff.cursor).toBe(4);
  expect(store.getSnapshot().diff.scroll).toBe(0);
});

test("dragging selects lines within one hunk", () => {
  const store = createLaidOutStore();
  store.handleMouse(click(40, 3));
  expect(store.getSnapshot().diff.cursor).toBe(1);

  store.handleMouse({ button: "left", action: "drag", x: 40, y: 6 });
  expect(store.getSnapshot().mode).toEqual({ type: "lineSelect", anchor: 1 });
  expect(store.getSnapshot().diff.cursor).toBe(4);

  store.handleMouse({ button: "left", action: "drag", x: 40, y: 9 });
  expect(store.getSnapshot().diff.cursor).toBe(4);

  store.handleMouse(click(40, 3));
  expect(store.getSnapshot().mode).toEqual({ type: "normal" });
});

test("the mouse is ignored while a dialog is open", () => {
  const store = createLaidOutStore();
  press(store, "S");
  store.handleMouse(click(40, 5));

  expect(store.getSnapshot().focusedPanel).toBe("fileTree");
  expect(store.getSnapshot().diff.cursor).toBe(1);
});
