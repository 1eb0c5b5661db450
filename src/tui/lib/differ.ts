import { spawnSync } from "child_process";
import { isWholeFileStatus } from "@/api/types";
import { splitPatchLines } from "./patch";

const ANSI_PATTERN = /\u001B\[[0-9;?]*[ -/]*[@-~]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

export const DEFAULT_DIFFER = "delta";

const availability = new Map<string, boolean>();

export function hasDiffer(command: string): boolean {
  const known = availability.get(command);
  if (known !== undefined) return known;
  const result = spawnSync(command, ["--version"], { stdio: "ignore" });
  const ok = !result.error && result.status === 0;
  availability.set(command, ok);
  return ok;
}

// Lets the differ detect the language from the file name
function diffHeader(filename: string): string {
  return `diff --git a/${filename} b/${filename}\n--- a/${filename}\n+++ b/${filename}\n`;
}

/**
 * Syntax-highlight a patch with an external differ.
 *
 * Returns one ANSI-styled line per patch line, or null when the differ
 * is missing, fails, or its output can't be lined up with the patch.
 */
export function highlightDiff(
  patch: string,
  filename: string,
  status: string,
  command = DEFAULT_DIFFER
): string[] | null {
  if (!hasDiffer(command)) return null;

  const patchLines = splitPatchLines(patch);
  // Whole-file diffs: turn +/- into context so only syntax colors apply
  const body = isWholeFileStatus(status)
    ? patchLines
        .map((l) => (l.startsWith("+") || l.startsWith("-") ? ` ${l.slice(1)}` : l))
        .join("\n")
    : patchLines.join("\n");

  const result = spawnSync(
    command,
    ["--no-gitconfig", "--paging=never", "--color-only", "--hunk-header-style=raw"],
    { input: diffHeader(filename) + body + "\n", encoding: "utf-8" }
  );
  if (result.error || result.status !== 0) return null;

  const lines = splitPatchLines(result.stdout);
  const firstHunk = lines.findIndex((l) => stripAnsi(l).startsWith("@@"));
  if (firstHunk === -1) return null;
  const out = lines.slice(firstHunk);

  // The differ may pad hunks with blank lines; every patch line has a prefix
  while (out.length > patchLines.length) {
    const blank = out.findIndex((l) => stripAnsi(l).length === 0);
    if (blank === -1) break;
    out.splice(blank, 1);
  }

  return out.length === patchLines.length ? out : null;
}
