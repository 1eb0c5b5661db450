/**
 * Centralized keyboard shortcuts configuration.
 * This is the single source of truth for all keyboard shortcuts in the app.
 *
 * Both the store's key handling and the help overlay read from this config.
 */

import type { KeyInput, NamedKey } from "./keys";

// ============================================================================
// Types
// ============================================================================

export type ShortcutCategory =
  | "Navigation"
  | "Diff"
  | "Comments"
  | "Review"
  | "Help";

export interface ShortcutDefinition {
  /** The key(s) to display in the help overlay */
  keys: readonly string[];
  /** Human-readable description */
  description: string;
  /** Category for grouping in the help overlay */
  category: ShortcutCategory;
  /** Key presses that trigger it: a character, a named key, or "ctrl+x" */
  bindings: readonly string[];
}

// ============================================================================
// Shortcuts Configuration
// ============================================================================

export const SHORTCUTS = {
  // ---------------------------------------------------------------------------
  // Navigation
  // ---------------------------------------------------------------------------
  MOVE_DOWN: {
    keys: ["j", "↓"],
    description: "Move down",
    category: "Navigation",
    bindings: ["j", "down"],
  },
  MOVE_UP: {
    keys: ["k", "↑"],
    description: "Move up",
    category: "Navigation",
    bindings: ["k", "up"],
  },
  NEXT_PANEL: {
    keys: ["tab", "l", "→"],
    description: "Next panel",
    category: "Navigation",
    bindings: ["tab", "l", "right"],
  },
  PREV_PANEL: {
    keys: ["shift+tab", "h", "←"],
    description: "Previous panel",
    category: "Navigation",
    bindings: ["backtab", "h", "left"],
  },
  FOCUS_PANEL: {
    keys: ["1-3"],
    description: "Focus description / commits / files",
    category: "Navigation",
    bindings: ["1", "2", "3"],
  },
  TOGGLE_ZOOM: {
    keys: ["z"],
    description: "Zoom the focused panel",
    category: "Navigation",
    bindings: ["z"],
  },
  HALF_PAGE_DOWN: {
    keys: ["ctrl+d"],
    description: "Half page down",
    category: "Navigation",
    bindings: ["ctrl+d"],
  },
  HALF_PAGE_UP: {
    keys: ["ctrl+u"],
    description: "Half page up",
    category: "Navigation",
    bindings: ["ctrl+u"],
  },
  PAGE_DOWN: {
    keys: ["ctrl+f", "pgdn"],
    description: "Page down",
    category: "Navigation",
    bindings: ["ctrl+f", "pagedown"],
  },
  PAGE_UP: {
    keys: ["ctrl+b", "pgup"],
    description: "Page up",
    category: "Navigation",
    bindings: ["ctrl+b", "pageup"],
  },
  GO_TOP: {
    keys: ["g"],
    description: "Go to top",
    category: "Navigation",
    bindings: ["g"],
  },
  GO_BOTTOM: {
    keys: ["G"],
    description: "Go to bottom",
    category: "Navigation",
    bindings: ["G"],
  },
  OPEN: {
    keys: ["enter"],
    description: "Open diff / view comments on line",
    category: "Navigation",
    bindings: ["enter"],
  },
  BACK: {
    keys: ["esc"],
    description: "Back / cancel",
    category: "Navigation",
    bindings: ["escape"],
  },

  // ---------------------------------------------------------------------------
  // Diff
  // ---------------------------------------------------------------------------
  NEXT_PREFIX: {
    keys: ["]", "c/h/n"],
    description: "Next change / hunk / comment",
    category: "Diff",
    bindings: ["]"],
  },
  PREV_PREFIX: {
    keys: ["[", "c/h/n"],
    description: "Previous change / hunk / comment",
    category: "Diff",
    bindings: ["["],
  },
  TOGGLE_WRAP: {
    keys: ["w"],
    description: "Toggle line wrap",
    category: "Diff",
    bindings: ["w"],
  },
  TOGGLE_LINE_NUMBERS: {
    keys: ["n"],
    description: "Toggle line numbers",
    category: "Diff",
    bindings: ["n"],
  },
  TOGGLE_VIEWED: {
    keys: ["x"],
    description: "Toggle viewed (file or commit)",
    category: "Diff",
    bindings: ["x"],
  },
  COPY: {
    keys: ["y"],
    description: "Copy commit SHA / file path",
    category: "Diff",
    bindings: ["y"],
  },
  COPY_MESSAGE: {
    keys: ["Y"],
    description: "Copy commit message",
    category: "Diff",
    bindings: ["Y"],
  },
  OPEN_MEDIA: {
    keys: ["o"],
    description: "View images and videos in description",
    category: "Diff",
    bindings: ["o"],
  },

  // ---------------------------------------------------------------------------
  // Comments
  // ---------------------------------------------------------------------------
  SELECT_LINES: {
    keys: ["v"],
    description: "Select lines",
    category: "Comments",
    bindings: ["v"],
  },
  COMMENT: {
    keys: ["c"],
    description: "Comment on line / selection",
    category: "Comments",
    bindings: ["c"],
  },
  CONFIRM_INPUT: {
    keys: ["ctrl+s"],
    description: "Save comment / review body",
    category: "Comments",
    bindings: ["ctrl+s"],
  },

  // ---------------------------------------------------------------------------
  // Review
  // ---------------------------------------------------------------------------
  SUBMIT_REVIEW: {
    keys: ["S"],
    description: "Submit review",
    category: "Review",
    bindings: ["S"],
  },
  QUIT: {
    keys: ["q"],
    description: "Quit",
    category: "Review",
    bindings: ["q"],
  },

  // ---------------------------------------------------------------------------
  // Help
  // ---------------------------------------------------------------------------
  SHOW_HELP: {
    keys: ["?"],
    description: "Show keyboard shortcuts",
    category: "Help",
    bindings: ["?"],
  },
} as const satisfies Record<string, ShortcutDefinition>;

export type ShortcutId = keyof typeof SHORTCUTS;

// ============================================================================
// Utilities
// ============================================================================

/** Order for displaying categories in the help overlay */
const CATEGORY_ORDER: ShortcutCategory[] = [
  "Navigation",
  "Diff",
  "Comments",
  "Review",
  "Help",
];

/**
 * Get all shortcuts grouped by category, ordered for display.
 */
export function getShortcutsByCategory(): Array<{
  category: ShortcutCategory;
  shortcuts: ShortcutDefinition[];
}> {
  const map = new Map<ShortcutCategory, ShortcutDefinition[]>();
  for (const category of CATEGORY_ORDER) {
    map.set(category, []);
  }

  for (const shortcut of Object.values(SHORTCUTS)) {
    map.get(shortcut.category)?.push(shortcut);
  }

  return CATEGORY_ORDER.map((category) => ({
    category,
    shortcuts: map.get(category) ?? [],
  })).filter((group) => group.shortcuts.length > 0);
}

/** Help overlay text, one row per line. */
export function getHelpLines(): string[] {
  const lines: string[] = [];
  for (const { category, shortcuts } of getShortcutsByCategory()) {
    if (lines.length > 0) lines.push("");
    lines.push(category);
    for (const shortcut of shortcuts) {
      lines.push(`  ${shortcut.keys.join(" / ").padEnd(20)} ${shortcut.description}`);
    }
  }
  return lines;
}

const NAMED_KEYS = new Set<string>([
  "enter",
  "escape",
  "tab",
  "backtab",
  "up",
  "down",
  "left",
  "right",
  "backspace",
  "delete",
  "home",
  "end",
  "pageup",
  "pagedown",
]);

function isNamedKey(value: string): value is NamedKey {
  return NAMED_KEYS.has(value);
}

function matchesBinding(input: KeyInput, binding: string): boolean {
  if (binding.startsWith("ctrl+")) {
    const char = binding.slice(5);
    return input.type === "char" && input.ctrl && input.char.toLowerCase() === char;
  }
  if (isNamedKey(binding)) {
    return input.type === "named" && input.name === binding;
  }
  return input.type === "char" && !input.ctrl && input.char === binding;
}

/**
 * Check if a key press matches one of a shortcut's bindings.
 */
export function matchesKey(input: KeyInput, shortcutId: ShortcutId): boolean {
  const shortcut: ShortcutDefinition = SHORTCUTS[shortcutId];
  return shortcut.bindings.some((binding) => matchesBinding(input, binding));
}
