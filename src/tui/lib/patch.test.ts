import { test, expect } from "vitest";
import {
  buildGutterNumbers,
  classifyLine,
  computeDiffVisualOffsets,
  displayText,
  formatGutter,
  formatHunkHeader,
  gutterWidth,
  parseHunkHeader,
  parseHunkHeaderRanges,
  parsePatch,
  parsePatchLineMap,
} from "./patch";

// ============================================================================
// Parsing
// ============================================================================

test("classifyLine uses the first character", () => {
  expect(classifyLine("@@ -1 +1 @@")).toBe("header");
  expect(classifyLine("+added")).toBe("added");
  expect(classifyLine("-removed")).toBe("removed");
  expect(classifyLine(" context")).toBe("context");
  expect(classifyLine("")).toBe("context");
});

test("parsePatch drops a single trailing empty line", () => {
  const lines = parsePatch("@@ -1 +1 @@\n-a\n+b\n");
  expect(lines.map((l) => l.kind)).toEqual(["header", "removed", "added"]);
});

test("parsePatch strips carriage returns from CRLF patches", () => {
  const lines = parsePatch("@@ -1 +1 @@\r\n-a\r\n+b\r\n");
  expect(lines.map((l) => l.text)).toEqual(["@@ -1 +1 @@", "-a", "+b"]);
  expect(parsePatchLineMap("@@ -3 +4 @@\r\n+b\r\n")).toEqual([
    null,
    { fileLine: 4, side: "RIGHT" },
  ]);
});

test("parseHunkHeader reads starts and defaults missing lengths to 1", () => {
  expect(parseHunkHeader("@@ -10,2 +12,3 @@ fn main()")).toEqual({ oldStart: 10, newStart: 12 });
  expect(parseHunkHeaderRanges("@@ -5 +7 @@")).toEqual({
    old: { start: 5, length: 1 },
    new: { start: 7, length: 1 },
    context: "",
  });
});

test("parseHunkHeader tolerates extra whitespace and odd lengths", () => {
  expect(parseHunkHeader("@@  -3,2   +4,2 @@")).toEqual({ oldStart: 3, newStart: 4 });
  expect(parseHunkHeaderRanges("@@ -3,x +4,2 @@ ctx")).toEqual({
    old: { start: 3, length: 1 },
    new: { start: 4, length: 2 },
    context: "ctx",
  });
});

test("parseHunkHeader rejects malformed headers", () => {
  expect(parseHunkHeader("@@ garbage @@")).toBeNull();
  expect(parseHunkHeader("@@ -a,1 +1 @@")).toBeNull();
  expect(parseHunkHeader("@@ -1 +1")).toBeNull();
});

// ============================================================================
// Line Map
// ============================================================================

test("line map resolves lines in a later hunk", () => {
  const map = parsePatchLineMap(
    "@@ -1,2 +1,2 @@\n-old1\n+new1\n@@ -10,2 +10,2 @@\n-old10\n+new10"
  );
  expect(map).toEqual([
    null,
    { fileLine: 1, side: "LEFT" },
    { fileLine: 1, side: "RIGHT" },
    null,
    { fileLine: 10, side: "LEFT" },
    { fileLine: 10, side: "RIGHT" },
  ]);
});

test("context lines advance both counters and map to the new side", () => {
  const map = parsePatchLineMap("@@ -3,3 +5,3 @@\n ctx\n-gone\n ctx2");
  expect(map).toEqual([
    null,
    { fileLine: 5, side: "RIGHT" },
    { fileLine: 4, side: "LEFT" },
    { fileLine: 6, side: "RIGHT" },
  ]);
});

test("malformed header keeps the previous counters", () => {
  const map = parsePatchLineMap("@@ -1 +1 @@\n a\n@@ broken @@\n+b");
  expect(map[2]).toBeNull();
  expect(map[3]).toEqual({ fileLine: 2, side: "RIGHT" });
});

// ============================================================================
// Gutter & Display
// ============================================================================

test("gutter numbers follow each side", () => {
  const lines = parsePatch("@@ -1,2 +1,2 @@\n-a\n+b\n c");
  expect(buildGutterNumbers(lines)).toEqual([
    { old: null, new: null },
    { old: 1, new: null },
    { old: null, new: 1 },
    { old: 2, new: 2 },
  ]);
});

test("gutter width depends on which sides a file has", () => {
  expect(gutterWidth("modified")).toBe(11);
  expect(gutterWidth("added")).toBe(6);
  expect(gutterWidth("removed")).toBe(6);
  expect(formatGutter({ old: 12, new: null }, "modified")).toBe("  12      │");
  expect(formatGutter({ old: null, new: 3 }, "added")).toBe("   3 │");
});

test("formatHunkHeader pads the rule to the width", () => {
  expect(formatHunkHeader("@@ -10,5 +12,7 @@ ctx", 40)).toBe(
    "─── L10-14 → L12-18 ─── ctx ───" + "─".repeat(9)
  );
  expect(formatHunkHeader("@@ -1 +1 @@", 0)).toBe("─── L1 → L1 ───");
});

test("displayText strips markers in whole-file diffs and blanks whitespace when wrapping", () => {
  expect(displayText({ kind: "added", text: "+hello" }, "added", false)).toBe("hello");
  expect(displayText({ kind: "added", text: "+hello" }, "modified", false)).toBe("+hello");
  expect(displayText({ kind: "context", text: "   " }, "modified", true)).toBe("");
  expect(displayText({ kind: "context", text: "   " }, "modified", false)).toBe("   ");
});

test("diff offsets count headers as one row and wrap the rest", () => {
  const lines = parsePatch("@@ -1 +1 @@ a very long context label\n+abcdefghij\n-x");
  const offsets = computeDiffVisualOffsets(lines, {
    width: 4,
    status: "modified",
    showLineNumbers: false,
  });
  // "+abcdefghij" is 11 columns: 3 rows at width 4
  expect(offsets).toEqual([0, 1, 4, 5]);
});

test("diff offsets include the gutter on the first row", () => {
  const lines = parsePatch("@@ -1 +1 @@\n+abcd");
  const offsets = computeDiffVisualOffsets(lines, {
    width: 12,
    status: "modified",
    showLineNumbers: true,
  });
  // 11 gutter columns + 5 text columns = 16 -> 2 rows at width 12
  expect(offsets).toEqual([0, 1, 3]);
});
