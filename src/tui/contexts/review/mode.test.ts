import { test, expect } from "vitest";
import {
  computeScreenLayout,
  containsPoint,
  isStatusExpired,
  NORMAL,
  selectionAnchor,
} from "./mode";

test("selectionAnchor is set while selecting or commenting", () => {
  expect(selectionAnchor({ type: "lineSelect", anchor: 4 })).toBe(4);
  expect(selectionAnchor({ type: "commentInput", anchor: 2 })).toBe(2);
  expect(selectionAnchor(NORMAL)).toBeNull();
  expect(selectionAnchor({ type: "help", scroll: 0 })).toBeNull();
});

test("containsPoint excludes the far edges", () => {
  const rect = { x: 10, y: 5, width: 4, height: 2 };
  expect(containsPoint(rect, 10, 5)).toBe(true);
  expect(containsPoint(rect, 13, 6)).toBe(true);
  expect(containsPoint(rect, 14, 6)).toBe(false);
  expect(containsPoint(rect, 13, 7)).toBe(false);
  expect(containsPoint(rect, 9, 5)).toBe(false);
});

test("status messages expire after three seconds", () => {
  const message = { body: "Saved", level: "info" as const, createdAt: 1000 };
  expect(isStatusExpired(message, 3999)).toBe(false);
  expect(isStatusExpired(message, 4000)).toBe(true);
});

// ============================================================================
// Screen Layout
// ============================================================================

test("computeScreenLayout stacks the left panels beside the diff", () => {
  const layout = computeScreenLayout(100, 30);

  expect(layout.rects).toEqual({
    prDescription: { x: 0, y: 1, width: 30, height: 9 },
    commitList: { x: 0, y: 10, width: 30, height: 6 },
    fileTree: { x: 0, y: 16, width: 30, height: 12 },
    diffView: { x: 30, y: 1, width: 70, height: 27 },
  });
  expect(layout.statusRow).toBe(28);
  expect(layout.dialogWidth).toBe(76);
});

test("computeScreenLayout keeps minimum sizes on small terminals", () => {
  const layout = computeScreenLayout(40, 5);

  expect(layout.bodyHeight).toBe(9);
  expect(layout.leftWidth).toBe(24);
  expect(layout.rects.fileTree.height).toBe(3);
  expect(layout.rects.diffView.width).toBe(16);
  expect(layout.dialogWidth).toBe(36);
});

test("computeScreenLayout caps the left column", () => {
  const layout = computeScreenLayout(200, 60);

  expect(layout.leftWidth).toBe(48);
  expect(layout.rects.diffView).toEqual({ x: 48, y: 1, width: 152, height: 57 });
});

test("computeScreenLayout gives a zoomed panel the whole body", () => {
  const layout = computeScreenLayout(100, 30, "diffView");

  expect(layout.zoomed).toBe("diffView");
  expect(layout.rects.diffView).toEqual({ x: 0, y: 1, width: 100, height: 27 });
  expect(layout.rects.fileTree).toEqual({ x: 0, y: 0, width: 0, height: 0 });
  expect(containsPoint(layout.rects.prDescription, 0, 0)).toBe(false);
  expect(layout.statusRow).toBe(28);
});
