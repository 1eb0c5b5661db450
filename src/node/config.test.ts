import { test, expect } from "vitest";
import { parseConfig } from "./config";

test("parses owner/repo#number", () => {
  expect(parseConfig(["octo/widgets#42"], {})).toEqual({
    ref: { owner: "octo", repo: "widgets", number: 42 },
    useCache: true,
    theme: "dark",
    differ: "delta",
    color: true,
  });
});

test("parses --repo and --pr with options", () => {
  const config = parseConfig(
    ["--repo", "octo/my.repo", "--pr", "7", "--no-cache", "--theme", "light"],
    {}
  );

  expect(config.ref).toEqual({ owner: "octo", repo: "my.repo", number: 7 });
  expect(config.useCache).toBe(false);
  expect(config.theme).toBe("light");
});

test("reads the differ and color settings from the environment", () => {
  const config = parseConfig(["octo/widgets#1"], { PR_LENS_DIFFER: " difft ", NO_COLOR: "1" });
  expect(config.differ).toBe("difft");
  expect(config.color).toBe(false);

  expect(parseConfig(["octo/widgets#1"], { NO_COLOR: "" }).color).toBe(true);
});

test("rejects malformed pull request references", () => {
  expect(() => parseConfig([], {})).toThrow("Expected a pull request");
  expect(() => parseConfig(["octo/widgets"], {})).toThrow(
    'Invalid pull request "octo/widgets" (expected owner/repo#number)'
  );
  expect(() => parseConfig(["octo#3"], {})).toThrow(
    'Invalid repository "octo" (expected owner/repo)'
  );
  expect(() => parseConfig(["octo/widgets#0"], {})).toThrow('Invalid pull request number "0"');
  expect(() => parseConfig(["octo/widgets#x1"], {})).toThrow('Invalid pull request number "x1"');
});

test("rejects bad options", () => {
  expect(() => parseConfig(["--repo", "octo/widgets"], {})).toThrow(
    "--repo and --pr must be given together"
  );
  expect(() => parseConfig(["octo/widgets#1", "--theme"], {})).toThrow("Missing value for --theme");
  expect(() => parseConfig(["octo/widgets#1", "--theme", "blue"], {})).toThrow(
    'Unknown theme "blue" (use dark or light)'
  );
  expect(() => parseConfig(["octo/widgets#1", "--verbose"], {})).toThrow("Unknown option --verbose");
});

test("errors carry the usage text", () => {
  expect(() => parseConfig([], {})).toThrow("Usage: pr-lens");
});
