/**
 * Terminal input events, independent of the rendering library.
 */

export type NamedKey =
  | "enter"
  | "escape"
  | "tab"
  | "backtab"
  | "up"
  | "down"
  | "left"
  | "right"
  | "backspace"
  | "delete"
  | "home"
  | "end"
  | "pageup"
  | "pagedown";

export type KeyInput =
  | { type: "char"; char: string; ctrl: boolean }
  | { type: "named"; name: NamedKey; ctrl: boolean };

export type MouseButton = "left" | "wheelUp" | "wheelDown";

export interface MouseInput {
  button: MouseButton;
  // "down" for presses and wheel ticks, "drag" for motion with the button held
  action: "down" | "drag" | "up";
  // 0-based terminal cell
  x: number;
  y: number;
}

export function charKey(char: string, ctrl = false): KeyInput {
  return { type: "char", char, ctrl };
}

export function namedKey(name: NamedKey, ctrl = false): KeyInput {
  return { type: "named", name, ctrl };
}

export function isChar(input: KeyInput, char: string): boolean {
  return input.type === "char" && !input.ctrl && input.char === char;
}

export function isCtrl(input: KeyInput, char: string): boolean {
  return input.type === "char" && input.ctrl && input.char.toLowerCase() === char;
}

export function isNamed(input: KeyInput, name: NamedKey): boolean {
  return input.type === "named" && input.name === name;
}

// ============================================================================
// Mouse (SGR 1006 encoding)
// ============================================================================

export const ENABLE_MOUSE = "\u001B[?1000h\u001B[?1002h\u001B[?1006h";
export const DISABLE_MOUSE = "\u001B[?1000l\u001B[?1002l\u001B[?1006l";

const MOUSE_SEQUENCE = /\u001B\[<(\d+);(\d+);(\d+)([mM])/g;

/** Matches SGR mouse reports, including ones whose ESC was split off. */
export const MOUSE_FRAGMENT = /(?:\u001B)?\[<\d+;\d+;\d+[mM]/;

export function parseMouseSequences(chunk: string): MouseInput[] {
  const events: MouseInput[] = [];
  for (const match of chunk.matchAll(MOUSE_SEQUENCE)) {
    const code = Number.parseInt(match[1], 10);
    const x = Number.parseInt(match[2], 10) - 1;
    const y = Number.parseInt(match[3], 10) - 1;
    const released = match[4] === "m";

    // Shift, meta and ctrl bits don't change which button it is
    const button = code & ~(4 | 8 | 16);

    if (button & 64) {
      // Only vertical wheel; horizontal (66/67) and wheel motion are ignored
      if (button === 64 || button === 65) {
        events.push({ button: button === 64 ? "wheelUp" : "wheelDown", action: "down", x, y });
      }
    } else if ((button & 3) === 0) {
      // Bit 5 marks motion while a button is held
      const action = released ? "up" : button & 32 ? "drag" : "down";
      events.push({ button: "left", action, x, y });
    }
  }
  return events;
}
