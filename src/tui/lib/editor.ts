/**
 * Multi-line text buffer used for comment and review bodies.
 *
 * The cursor column is a UTF-8 byte offset into the current line and always
 * sits on a character boundary. Wrapping follows `lineVisualHeight`.
 */

import { isCtrl, type KeyInput } from "./keys";
import { charWidth, displayWidth, lineVisualHeight, utf8Length, wrapLine } from "./layout";

// ============================================================================
// Byte Offsets
// ============================================================================

function byteLength(line: string): number {
  let n = 0;
  for (const ch of line) n += utf8Length(ch);
  return n;
}

/** JS string index for a byte offset that sits on a character boundary. */
function byteToIndex(line: string, offset: number): number {
  let bytes = 0;
  let index = 0;
  for (const ch of line) {
    if (bytes >= offset) break;
    bytes += utf8Length(ch);
    index += ch.length;
  }
  return index;
}

/** Clamp to the line length and snap down to a character boundary. */
function clampToBoundary(line: string, offset: number): number {
  let bytes = 0;
  for (const ch of line) {
    const next = bytes + utf8Length(ch);
    if (next > offset) return bytes;
    bytes = next;
  }
  return bytes;
}

function lastChar(text: string): string {
  const chars = Array.from(text);
  return chars[chars.length - 1] ?? "";
}

function firstChar(text: string): string {
  const cp = text.codePointAt(0);
  return cp === undefined ? "" : String.fromCodePoint(cp);
}

// ============================================================================
// Editor
// ============================================================================

export interface VisualPosition {
  col: number;
  row: number;
}

export interface ScrollbarState {
  total: number;
  position: number;
}

export class TextEditor {
  private lines: string[] = [""];
  private cursorRow = 0;
  private cursorCol = 0;
  private scroll = 0;
  // 0 = no wrapping
  private width = 0;

  get cursor(): { row: number; col: number } {
    return { row: this.cursorRow, col: this.cursorCol };
  }

  get scrollOffset(): number {
    return this.scroll;
  }

  get lineCount(): number {
    return this.lines.length;
  }

  clear = () => {
    this.lines = [""];
    this.cursorRow = 0;
    this.cursorCol = 0;
    this.scroll = 0;
  };

  isEmpty = (): boolean => this.lines.every((l) => l.length === 0);

  text = (): string => this.lines.join("\n");

  setDisplayWidth = (width: number) => {
    this.width = Math.max(0, width);
  };

  // ---------------------------------------------------------------------------
  // Editing
  // ---------------------------------------------------------------------------

  insertChar = (ch: string) => {
    const line = this.lines[this.cursorRow];
    const idx = byteToIndex(line, this.cursorCol);
    this.lines[this.cursorRow] = line.slice(0, idx) + ch + line.slice(idx);
    this.cursorCol += byteLength(ch);
  };

  insertNewline = () => {
    const line = this.lines[this.cursorRow];
    const idx = byteToIndex(line, this.cursorCol);
    this.lines.splice(this.cursorRow, 1, line.slice(0, idx), line.slice(idx));
    this.cursorRow++;
    this.cursorCol = 0;
  };

  backspace = () => {
    const line = this.lines[this.cursorRow];
    if (this.cursorCol > 0) {
      const idx = byteToIndex(line, this.cursorCol);
      const removed = lastChar(line.slice(0, idx));
      this.lines[this.cursorRow] =
        line.slice(0, idx - removed.length) + line.slice(idx);
      this.cursorCol -= utf8Length(removed);
    } else if (this.cursorRow > 0) {
      const prev = this.lines[this.cursorRow - 1];
      this.lines.splice(this.cursorRow - 1, 2, prev + line);
      this.cursorRow--;
      this.cursorCol = byteLength(prev);
    }
  };

  delete = () => {
    const line = this.lines[this.cursorRow];
    if (this.cursorCol < byteLength(line)) {
      const idx = byteToIndex(line, this.cursorCol);
      const removed = firstChar(line.slice(idx));
      this.lines[this.cursorRow] = line.slice(0, idx) + line.slice(idx + removed.length);
    } else if (this.cursorRow < this.lines.length - 1) {
      this.lines.splice(this.cursorRow, 2, line + this.lines[this.cursorRow + 1]);
    }
  };

  // ---------------------------------------------------------------------------
  // Movement
  // ---------------------------------------------------------------------------

  moveLeft = () => {
    if (this.cursorCol > 0) {
      const line = this.lines[this.cursorRow];
      const idx = byteToIndex(line, this.cursorCol);
      this.cursorCol -= utf8Length(lastChar(line.slice(0, idx)));
    } else if (this.cursorRow > 0) {
      this.cursorRow--;
      this.cursorCol = byteLength(this.lines[this.cursorRow]);
    }
  };

  moveRight = () => {
    const line = this.lines[this.cursorRow];
    if (this.cursorCol < byteLength(line)) {
      const idx = byteToIndex(line, this.cursorCol);
      this.cursorCol += utf8Length(firstChar(line.slice(idx)));
    } else if (this.cursorRow < this.lines.length - 1) {
      this.cursorRow++;
      this.cursorCol = 0;
    }
  };

  moveUp = () => {
    if (this.cursorRow === 0) return;
    this.cursorRow--;
    this.cursorCol = clampToBoundary(this.lines[this.cursorRow], this.cursorCol);
  };

  moveDown = () => {
    if (this.cursorRow >= this.lines.length - 1) return;
    this.cursorRow++;
    this.cursorCol = clampToBoundary(this.lines[this.cursorRow], this.cursorCol);
  };

  moveHome = () => {
    this.cursorCol = 0;
  };

  moveEnd = () => {
    this.cursorCol = byteLength(this.lines[this.cursorRow]);
  };

  // ---------------------------------------------------------------------------
  // Layout
  // ---------------------------------------------------------------------------

  /** Display column of the cursor within its (unwrapped) line. */
  cursorDisplayCol = (): number => {
    const line = this.lines[this.cursorRow];
    return displayWidth(line.slice(0, byteToIndex(line, this.cursorCol)));
  };

  /** Cursor cell relative to the first visible row. */
  cursorVisualPosition = (): VisualPosition => {
    let row = 0;
    for (let r = this.scroll; r < this.cursorRow; r++) {
      row += lineVisualHeight(this.lines[r], this.width);
    }

    const line = this.lines[this.cursorRow];
    const before = line.slice(0, byteToIndex(line, this.cursorCol));
    let col = 0;
    for (const ch of before) {
      const w = charWidth(ch);
      if (this.width > 0 && col + w > this.width) {
        row++;
        col = 0;
      }
      col += w;
    }
    // A cursor right after the last column is drawn at the next row's start
    if (this.width > 0 && col >= this.width) {
      row++;
      col = 0;
    }
    return { col, row };
  };

  /** Scroll so the cursor row lies within `height` visible rows. */
  ensureVisible = (height: number) => {
    if (height <= 0) return;
    if (this.cursorRow < this.scroll) {
      this.scroll = this.cursorRow;
    }
    while (
      this.cursorVisualPosition().row >= height &&
      this.scroll < this.cursorRow
    ) {
      this.scroll++;
    }
  };

  /** Null when the whole buffer fits in `height` rows. */
  scrollbarState = (height: number): ScrollbarState | null => {
    let total = 0;
    let position = 0;
    this.lines.forEach((line, i) => {
      const h = lineVisualHeight(line, this.width);
      total += h;
      if (i < this.scroll) position += h;
    });
    if (total <= height) return null;
    return { total, position };
  };

  /** Wrapped rows starting at the scroll offset. */
  visibleRows = (height: number): string[] => {
    const rows: string[] = [];
    for (let r = this.scroll; r < this.lines.length && rows.length < height; r++) {
      for (const row of wrapLine(this.lines[r], this.width)) {
        if (rows.length >= height) break;
        rows.push(row);
      }
    }
    return rows;
  };

  // ---------------------------------------------------------------------------
  // Input
  // ---------------------------------------------------------------------------

  /** Apply a key press. Returns false for keys the editor doesn't use. */
  handleKey = (input: KeyInput): boolean => {
    if (input.type === "char") {
      if (isCtrl(input, "a")) {
        this.moveHome();
        return true;
      }
      if (isCtrl(input, "e")) {
        this.moveEnd();
        return true;
      }
      if (isCtrl(input, "d")) {
        this.delete();
        return true;
      }
      if (input.ctrl) return false;
      this.insertChar(input.char);
      return true;
    }

    switch (input.name) {
      case "enter":
        this.insertNewline();
        return true;
      case "backspace":
        this.backspace();
        return true;
      case "delete":
        this.delete();
        return true;
      case "left":
        this.moveLeft();
        return true;
      case "right":
        this.moveRight();
        return true;
      case "up":
        this.moveUp();
        return true;
      case "down":
        this.moveDown();
        return true;
      case "home":
        this.moveHome();
        return true;
      case "end":
        this.moveEnd();
        return true;
      default:
        return false;
    }
  };
}
