import { test, expect } from "vitest";
import type { Key } from "ink";
import { charKey, namedKey } from "@/tui/lib/keys";
import { toKeyInputs } from "./useTerminalInput";

function createKey(overrides?: Partial<Key>): Key {
  return {
    upArrow: false,
    downArrow: false,
    leftArrow: false,
    rightArrow: false,
    pageDown: false,
    pageUp: false,
    return: false,
    escape: false,
    ctrl: false,
    shift: false,
    tab: false,
    backspace: false,
    delete: false,
    meta: false,
    ...overrides,
  } as Key;
}

test("arrows and paging keys become named keys", () => {
  expect(toKeyInputs("", createKey({ upArrow: true }))).toEqual([namedKey("up")]);
  expect(toKeyInputs("", createKey({ downArrow: true, ctrl: true }))).toEqual([
    namedKey("down", true),
  ]);
  expect(toKeyInputs("", createKey({ pageDown: true }))).toEqual([namedKey("pagedown")]);
});

test("tab with shift is backtab", () => {
  expect(toKeyInputs("", createKey({ tab: true }))).toEqual([namedKey("tab")]);
  expect(toKeyInputs("", createKey({ tab: true, shift: true }))).toEqual([namedKey("backtab")]);
});

test("delete from the terminal is treated as backspace", () => {
  expect(toKeyInputs("", createKey({ delete: true }))).toEqual([namedKey("backspace")]);
  expect(toKeyInputs("", createKey({ backspace: true }))).toEqual([namedKey("backspace")]);
});

test("home and end arrive as raw sequences", () => {
  expect(toKeyInputs("[H", createKey())).toEqual([namedKey("home")]);
  expect(toKeyInputs("[4~", createKey())).toEqual([namedKey("end")]);
});

test("ctrl combinations keep the character", () => {
  expect(toKeyInputs("s", createKey({ ctrl: true }))).toEqual([charKey("s", true)]);
  expect(toKeyInputs("x", createKey({ meta: true }))).toEqual([]);
});

test("pasted text becomes one key per character", () => {
  expect(toKeyInputs("aあ\r\nb", createKey())).toEqual([
    charKey("a"),
    charKey("あ"),
    namedKey("enter"),
    charKey("b"),
  ]);
});

test("mouse reports are not keys", () => {
  expect(toKeyInputs("[<0;10;5M", createKey())).toEqual([]);
  expect(toKeyInputs("\u001b[<64;1;1M", createKey())).toEqual([]);
});
