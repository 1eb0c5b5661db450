import { DEFAULT_DIFFER } from "@/tui/lib/differ";
import type { ThemeName } from "@/tui/components/theme";
import type { PullRequestRef } from "@/api/github";

export const USAGE = "Usage: pr-lens <owner/repo#number> [--no-cache] [--theme dark|light]\n" +
  "       pr-lens --repo <owner/repo> --pr <number> [--no-cache] [--theme dark|light]";

export interface Config {
  ref: PullRequestRef;
  useCache: boolean;
  theme: ThemeName;
  differ: string;
  color: boolean;
}

function fail(message: string): never {
  throw new Error(`${message}\n${USAGE}`);
}

function parseRepo(value: string): { owner: string; repo: string } {
  const match = /^([\w.-]+)\/([\w.-]+)$/.exec(value);
  if (!match) fail(`Invalid repository "${value}" (expected owner/repo)`);
  return { owner: match[1], repo: match[2] };
}

function parseNumber(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    fail(`Invalid pull request number "${value}"`);
  }
  return Number(value);
}

/** Read the command line and environment. Throws with the usage text on bad input. */
export function parseConfig(args: string[], env: NodeJS.ProcessEnv = process.env): Config {
  const getArg = (name: string) => {
    const index = args.indexOf(`--${name}`);
    if (index === -1) return undefined;
    const value = args[index + 1];
    if (value === undefined || value.startsWith("--")) fail(`Missing value for --${name}`);
    return value;
  };

  const theme = getArg("theme") ?? "dark";
  if (theme !== "dark" && theme !== "light") {
    fail(`Unknown theme "${theme}" (use dark or light)`);
  }

  const valueFlags = new Set(["--repo", "--pr", "--theme"]);
  const positional = args.filter(
    (arg, i) => !arg.startsWith("--") && !valueFlags.has(args[i - 1] ?? "")
  );
  const unknown = args.find(
    (arg) => arg.startsWith("--") && arg !== "--no-cache" && !valueFlags.has(arg)
  );
  if (unknown) fail(`Unknown option ${unknown}`);

  let ref: PullRequestRef;
  const repoArg = getArg("repo");
  const prArg = getArg("pr");
  if (repoArg !== undefined || prArg !== undefined) {
    if (repoArg === undefined || prArg === undefined) fail("--repo and --pr must be given together");
    ref = { ...parseRepo(repoArg), number: parseNumber(prArg) };
  } else {
    if (positional.length !== 1) fail("Expected a pull request");
    const match = /^(.+)#(.+)$/.exec(positional[0]);
    if (!match) fail(`Invalid pull request "${positional[0]}" (expected owner/repo#number)`);
    ref = { ...parseRepo(match[1]), number: parseNumber(match[2]) };
  }

  return {
    ref,
    useCache: !args.includes("--no-cache"),
    theme,
    differ: env.PR_LENS_DIFFER?.trim() || DEFAULT_DIFFER,
    color: env.NO_COLOR === undefined || env.NO_COLOR === "",
  };
}
