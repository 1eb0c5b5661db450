import type { ReviewComment, ReviewEvent } from "@/api/types";

// ============================================================================
// Interaction Mode
// ============================================================================

export type Mode =
  | { type: "normal" }
  | { type: "lineSelect"; anchor: number }
  | { type: "commentInput"; anchor: number }
  | { type: "commentView"; comments: ReviewComment[]; scroll: number }
  | { type: "reviewSubmit"; eventIndex: number; quitAfterSubmit: boolean }
  | { type: "reviewBodyInput"; event: ReviewEvent; quitAfterSubmit: boolean }
  | { type: "quitConfirm" }
  | { type: "help"; scroll: number }
  | { type: "mediaViewer"; index: number };

export type ModeType = Mode["type"];

export const NORMAL: Mode = { type: "normal" };

/** Anchor of the active line selection, if the mode has one. */
export function selectionAnchor(mode: Mode): number | null {
  switch (mode.type) {
    case "lineSelect":
    case "commentInput":
      return mode.anchor;
    default:
      return null;
  }
}

// ============================================================================
// Panels
// ============================================================================

export type Panel = "prDescription" | "commitList" | "fileTree" | "diffView";

// Tab order; the diff view is reached from the file tree instead
export const PANEL_CYCLE: Panel[] = ["prDescription", "commitList", "fileTree"];

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export type PanelRects = Partial<Record<Panel, Rect>>;

export function containsPoint(rect: Rect, x: number, y: number): boolean {
  return x >= rect.x && x < rect.x + rect.width && y >= rect.y && y < rect.y + rect.height;
}

// ============================================================================
// Status Messages
// ============================================================================

export const STATUS_TTL_MS = 3000;

export interface StatusMessage {
  body: string;
  level: "info" | "error";
  createdAt: number;
}

export function isStatusExpired(message: StatusMessage, now: number): boolean {
  return now - message.createdAt >= STATUS_TTL_MS;
}

export interface SubmitRequest {
  event: ReviewEvent;
  quitAfterSubmit: boolean;
}

// ============================================================================
// Screen Layout
// ============================================================================

export interface ScreenLayout {
  rects: Required<PanelRects>;
  // Rows above and below the panels
  titleRow: number;
  statusRow: number;
  leftWidth: number;
  bodyHeight: number;
  // Outer width of centered dialogs
  dialogWidth: number;
  // Panel filling the body, if any
  zoomed: Panel | null;
}

const HIDDEN: Rect = { x: 0, y: 0, width: 0, height: 0 };

/**
 * Split the terminal into the four panels. The left column stacks the
 * description, commits and files; the diff takes the rest. One row above
 * holds the title and one below the status bar.
 *
 * With `zoomed` set, that panel fills the whole body and the others get an
 * empty rect, so the mouse never lands on them.
 */
export function computeScreenLayout(
  cols: number,
  rows: number,
  zoomed: Panel | null = null
): ScreenLayout {
  const bodyHeight = Math.max(9, rows - 3);
  const leftWidth = Math.min(Math.max(24, Math.floor(cols * 0.3)), 48);
  const descHeight = Math.max(3, Math.floor(bodyHeight / 3));
  const commitHeight = Math.max(3, Math.floor(bodyHeight / 4));
  const fileHeight = Math.max(3, bodyHeight - descHeight - commitHeight);
  const top = 1;
  const dialogWidth = Math.max(20, Math.min(cols - 4, 76));

  if (zoomed) {
    const rects: Required<PanelRects> = {
      prDescription: HIDDEN,
      commitList: HIDDEN,
      fileTree: HIDDEN,
      diffView: HIDDEN,
    };
    rects[zoomed] = { x: 0, y: top, width: Math.max(10, cols), height: bodyHeight };
    return {
      rects,
      titleRow: 0,
      statusRow: top + bodyHeight,
      leftWidth: 0,
      bodyHeight,
      dialogWidth,
      zoomed,
    };
  }

  return {
    rects: {
      prDescription: { x: 0, y: top, width: leftWidth, height: descHeight },
      commitList: { x: 0, y: top + descHeight, width: leftWidth, height: commitHeight },
      fileTree: { x: 0, y: top + descHeight + commitHeight, width: leftWidth, height: fileHeight },
      diffView: {
        x: leftWidth,
        y: top,
        width: Math.max(10, cols - leftWidth),
        height: bodyHeight,
      },
    },
    titleRow: 0,
    statusRow: top + bodyHeight,
    leftWidth,
    bodyHeight,
    dialogWidth,
    zoomed: null,
  };
}
