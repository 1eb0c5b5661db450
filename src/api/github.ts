import { execSync } from "child_process";
import { Octokit } from "@octokit/core";
import type {
  CommitInfo,
  DiffFile,
  PullRequestCommit,
  PullRequestData,
  PullRequestFile,
  ReviewComment,
  ReviewPayload,
} from "./types";

// Get GitHub token from the environment, falling back to the gh CLI
let cachedToken: string | null = null;

export function getGitHubToken(env: NodeJS.ProcessEnv = process.env): string {
  if (cachedToken) return cachedToken;
  const fromEnv = env.GITHUB_TOKEN?.trim();
  if (fromEnv) {
    cachedToken = fromEnv;
    return cachedToken;
  }
  try {
    cachedToken = execSync("gh auth token", {
      encoding: "utf-8",
      stdio: ["ignore", "pipe", "ignore"],
    }).trim();
  } catch {
    throw new Error(
      "Failed to get GitHub token. Set GITHUB_TOKEN or authenticate the gh CLI: gh auth login"
    );
  }
  if (!cachedToken) {
    throw new Error("gh auth token returned an empty token");
  }
  return cachedToken;
}

// ============================================================================
// Conversions
// ============================================================================

export function toCommitInfo(commit: PullRequestCommit): CommitInfo {
  return {
    sha: commit.sha,
    message: commit.commit.message,
    author: commit.commit.author?.name ?? commit.author?.login ?? "unknown",
    date: commit.commit.author?.date ?? "",
  };
}

export function toDiffFile(file: PullRequestFile): DiffFile {
  return {
    filename: file.filename,
    status: file.status,
    additions: file.additions,
    deletions: file.deletions,
    patch: file.patch,
  };
}

// ============================================================================
// Client
// ============================================================================

export interface PullRequestRef {
  owner: string;
  repo: string;
  number: number;
}

const PER_PAGE = 100;

export function createGitHubClient(token: string, ref: PullRequestRef) {
  const octokit = new Octokit({ auth: token });
  const { owner, repo, number } = ref;

  async function getPullRequest() {
    const { data } = await octokit.request(
      "GET /repos/{owner}/{repo}/pulls/{pull_number}",
      { owner, repo, pull_number: number }
    );
    return data;
  }

  async function listCommits(): Promise<CommitInfo[]> {
    const commits: CommitInfo[] = [];
    for (let page = 1; ; page++) {
      const { data } = await octokit.request(
        "GET /repos/{owner}/{repo}/pulls/{pull_number}/commits",
        { owner, repo, pull_number: number, per_page: PER_PAGE, page }
      );
      commits.push(...data.map(toCommitInfo));
      if (data.length < PER_PAGE) break;
    }
    return commits;
  }

  async function listCommitFiles(sha: string): Promise<DiffFile[]> {
    const { data } = await octokit.request(
      "GET /repos/{owner}/{repo}/commits/{ref}",
      { owner, repo, ref: sha }
    );
    return (data.files ?? []).map(toDiffFile);
  }

  async function listReviewComments(): Promise<ReviewComment[]> {
    const comments: ReviewComment[] = [];
    for (let page = 1; ; page++) {
      const { data } = await octokit.request(
        "GET /repos/{owner}/{repo}/pulls/{pull_number}/comments",
        { owner, repo, pull_number: number, per_page: PER_PAGE, page }
      );
      comments.push(...data);
      if (data.length < PER_PAGE) break;
    }
    return comments;
  }

  async function getCurrentUser(): Promise<string> {
    const { data } = await octokit.request("GET /user");
    return data.login;
  }

  async function submitReview(payload: ReviewPayload) {
    const { data } = await octokit.request(
      "POST /repos/{owner}/{repo}/pulls/{pull_number}/reviews",
      {
        owner,
        repo,
        pull_number: number,
        commit_id: payload.commit_id,
        event: payload.event,
        body: payload.body,
        comments: payload.comments,
      }
    );
    return data;
  }

  /** PR metadata, commits, and the files each commit touched. */
  async function fetchPullRequestData(): Promise<PullRequestData> {
    const [pr, commits] = await Promise.all([getPullRequest(), listCommits()]);
    const fileLists = await Promise.all(commits.map((c) => listCommitFiles(c.sha)));

    const filesMap: Record<string, DiffFile[]> = {};
    commits.forEach((commit, i) => {
      filesMap[commit.sha] = fileLists[i];
    });

    return {
      title: pr.title,
      body: pr.body ?? "",
      author: pr.user.login,
      headSha: pr.head.sha,
      commits,
      filesMap,
    };
  }

  return {
    ref,
    getPullRequest,
    listCommits,
    listCommitFiles,
    listReviewComments,
    getCurrentUser,
    submitReview,
    fetchPullRequestData,
  };
}

export type GitHubClient = ReturnType<typeof createGitHubClient>;
