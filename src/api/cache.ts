import { mkdirSync, readFileSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { dirname, join } from "path";
import type { CommitInfo, DiffFile, PullRequestData } from "./types";
import type { PullRequestRef } from "./github";

// On-disk shape; field names are kept stable across versions
export interface PrCacheSnapshot {
  head_sha: string;
  pr_title: string;
  pr_body: string;
  pr_author: string;
  commits: CommitInfo[];
  files_map: Record<string, DiffFile[]>;
}

export function cachePath(ref: PullRequestRef, baseDir: string = tmpdir()): string {
  return join(baseDir, "pr-lens", ref.owner, ref.repo, `pr-${ref.number}.json`);
}

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCommitInfo(value: unknown): value is CommitInfo {
  return (
    isRecord(value) &&
    typeof value.sha === "string" &&
    typeof value.message === "string" &&
    typeof value.author === "string" &&
    typeof value.date === "string"
  );
}

function isDiffFile(value: unknown): value is DiffFile {
  return (
    isRecord(value) &&
    typeof value.filename === "string" &&
    typeof value.status === "string" &&
    typeof value.additions === "number" &&
    typeof value.deletions === "number" &&
    (value.patch === undefined || typeof value.patch === "string")
  );
}

function isFilesMap(value: unknown): value is Record<string, DiffFile[]> {
  return (
    isRecord(value) &&
    Object.values(value).every((files) => Array.isArray(files) && files.every(isDiffFile))
  );
}

export function isSnapshot(value: unknown): value is PrCacheSnapshot {
  return (
    isRecord(value) &&
    typeof value.head_sha === "string" &&
    typeof value.pr_title === "string" &&
    typeof value.pr_body === "string" &&
    typeof value.pr_author === "string" &&
    Array.isArray(value.commits) &&
    value.commits.every(isCommitInfo) &&
    isFilesMap(value.files_map)
  );
}

// ============================================================================
// Load / Save
// ============================================================================

/** Null when there's no cache file or it can't be read. */
export function loadCache(ref: PullRequestRef, baseDir?: string): PrCacheSnapshot | null {
  let raw: string;
  try {
    raw = readFileSync(cachePath(ref, baseDir), "utf-8");
  } catch {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return isSnapshot(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/** Write the snapshot; a failure is only worth a warning. */
export function saveCache(
  ref: PullRequestRef,
  snapshot: PrCacheSnapshot,
  baseDir?: string
): boolean {
  const path = cachePath(ref, baseDir);
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(snapshot));
    return true;
  } catch (error) {
    console.warn(`Failed to write cache ${path}:`, error);
    return false;
  }
}

export function isCacheFresh(snapshot: PrCacheSnapshot, headSha: string): boolean {
  return snapshot.head_sha === headSha;
}

export function toSnapshot(data: PullRequestData): PrCacheSnapshot {
  return {
    head_sha: data.headSha,
    pr_title: data.title,
    pr_body: data.body,
    pr_author: data.author,
    commits: data.commits,
    files_map: data.filesMap,
  };
}

export function fromSnapshot(snapshot: PrCacheSnapshot): PullRequestData {
  return {
    title: snapshot.pr_title,
    body: snapshot.pr_body,
    author: snapshot.pr_author,
    headSha: snapshot.head_sha,
    commits: snapshot.commits,
    filesMap: snapshot.files_map,
  };
}
