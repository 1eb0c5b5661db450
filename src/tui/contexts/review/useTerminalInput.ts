import { useEffect } from "react";
import { useInput, useStdin, useStdout, type Key } from "ink";
import {
  charKey,
  DISABLE_MOUSE,
  ENABLE_MOUSE,
  MOUSE_FRAGMENT,
  namedKey,
  parseMouseSequences,
  type KeyInput,
  type NamedKey,
} from "@/tui/lib/keys";
import type { ReviewStore } from "./index";

// ink passes unrecognized escape sequences through with the ESC removed
const RAW_SEQUENCES: Record<string, NamedKey> = {
  "[H": "home",
  "[1~": "home",
  OH: "home",
  "[F": "end",
  "[4~": "end",
  OF: "end",
};

/**
 * Translate one ink input callback into key events. Pasted text arrives as
 * a single callback and becomes one event per character.
 */
export function toKeyInputs(input: string, key: Key): KeyInput[] {
  if (MOUSE_FRAGMENT.test(input)) return [];

  if (key.upArrow) return [namedKey("up", key.ctrl)];
  if (key.downArrow) return [namedKey("down", key.ctrl)];
  if (key.leftArrow) return [namedKey("left", key.ctrl)];
  if (key.rightArrow) return [namedKey("right", key.ctrl)];
  if (key.pageUp) return [namedKey("pageup")];
  if (key.pageDown) return [namedKey("pagedown")];
  if (key.return) return [namedKey("enter")];
  if (key.escape) return [namedKey("escape")];
  if (key.tab) return [namedKey(key.shift ? "backtab" : "tab")];
  // Most terminals send DEL for backspace, which ink reports as delete
  if (key.backspace || key.delete) return [namedKey("backspace")];

  const raw = RAW_SEQUENCES[input];
  if (raw) return [namedKey(raw)];

  if (key.ctrl) {
    return input.length === 1 ? [charKey(input, true)] : [];
  }
  if (key.meta) return [];

  const keys: KeyInput[] = [];
  for (const ch of input.replace(/\r\n?/g, "\n")) {
    if (ch === "\n") {
      keys.push(namedKey("enter"));
    } else if (ch >= " " && ch !== "\u007f") {
      keys.push(charKey(ch));
    }
  }
  return keys;
}

/**
 * Feed keyboard and mouse input into the store. Mouse reporting is enabled
 * for as long as the hook is mounted and the terminal supports raw mode.
 */
export function useTerminalInput(store: ReviewStore) {
  const { stdin, isRawModeSupported } = useStdin();
  const { stdout } = useStdout();

  useInput((input, key) => {
    for (const event of toKeyInputs(input, key)) {
      store.handleKey(event);
    }
  });

  useEffect(() => {
    if (!isRawModeSupported || !stdout.isTTY) return;

    stdout.write(ENABLE_MOUSE);
    const onData = (chunk: Buffer | string) => {
      const text = typeof chunk === "string" ? chunk : chunk.toString("utf8");
      for (const event of parseMouseSequences(text)) {
        store.handleMouse(event);
      }
    };

    stdin.on("data", onData);
    return () => {
      stdin.off("data", onData);
      stdout.write(DISABLE_MOUSE);
    };
  }, [isRawModeSupported, stdin, stdout, store]);
}
