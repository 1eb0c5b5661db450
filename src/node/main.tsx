import { spawn } from "child_process";
import clipboard from "clipboardy";
import { render } from "ink";
import { createGitHubClient, getGitHubToken, type GitHubClient } from "@/api/github";
import { fromSnapshot, isCacheFresh, loadCache, saveCache, toSnapshot } from "@/api/cache";
import type { PullRequestData } from "@/api/types";
import { App } from "@/tui/components/app";
import { resolveTheme } from "@/tui/components/theme";
import { ReviewStore } from "@/tui/contexts/review";
import { highlightDiff } from "@/tui/lib/differ";
import { createMediaFetcher, MediaWorker } from "@/tui/lib/media";
import { parseConfig, type Config } from "./config";

const ENTER_ALT_SCREEN = "\u001B[?1049h\u001B[H";
const EXIT_ALT_SCREEN = "\u001B[?1049l";

function openUrl(url: string): Promise<void> {
  const [command, args]: [string, string[]] =
    process.platform === "darwin"
      ? ["open", [url]]
      : process.platform === "win32"
        ? ["cmd", ["/c", "start", "", url]]
        : ["xdg-open", [url]];

  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: "ignore", detached: true });
    child.once("error", reject);
    child.once("spawn", () => {
      child.unref();
      resolve();
    });
  });
}

async function loadPullRequest(client: GitHubClient, config: Config): Promise<PullRequestData> {
  const { ref } = config;
  const cached = config.useCache ? loadCache(ref) : null;

  if (cached) {
    const pr = await client.getPullRequest();
    if (isCacheFresh(cached, pr.head.sha)) {
      console.log(`Using cached data for ${ref.owner}/${ref.repo}#${ref.number}`);
      return fromSnapshot(cached);
    }
  }

  console.log(`Fetching ${ref.owner}/${ref.repo}#${ref.number}...`);
  const data = await client.fetchPullRequestData();
  const fileCount = Object.values(data.filesMap).reduce((n, files) => n + files.length, 0);
  console.log(`Loaded ${data.commits.length} commits, ${fileCount} files`);

  if (config.useCache) saveCache(ref, toSnapshot(data));
  return data;
}

async function main() {
  const config = parseConfig(process.argv.slice(2));
  const token = getGitHubToken();
  const client = createGitHubClient(token, config.ref);

  const data = await loadPullRequest(client, config);
  const [reviewComments, currentUser] = await Promise.all([
    client.listReviewComments(),
    client.getCurrentUser().catch((error: unknown) => {
      console.warn("Could not determine the current user:", error);
      return null;
    }),
  ]);

  const store = new ReviewStore(
    {
      owner: config.ref.owner,
      repo: config.ref.repo,
      prNumber: config.ref.number,
      data,
      reviewComments,
      currentUser,
    },
    {
      submitReview: client.submitReview,
      openUrl,
      copyToClipboard: (text) => clipboard.write(text),
      mediaWorker: new MediaWorker(createMediaFetcher(token)),
      highlight: config.color
        ? (patch, filename, status) => highlightDiff(patch, filename, status, config.differ)
        : undefined,
    }
  );

  process.stdout.write(ENTER_ALT_SCREEN);
  try {
    const instance = render(<App store={store} theme={resolveTheme(config.theme, config.color)} />);
    await instance.waitUntilExit();
  } finally {
    process.stdout.write(EXIT_ALT_SCREEN);
  }
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
