/**
 * Background preparation of the media shown in the media viewer.
 *
 * Each request is tagged with a generation. Finished work is collected by
 * `poll()` on the UI tick; every result lands in the URL-keyed cache, but
 * only the latest generation becomes the viewer's current item.
 */

export interface PreparedMedia {
  url: string;
  contentType: string;
  bytes: number;
}

export type MediaEntry =
  | { status: "loading"; url: string }
  | { status: "ready"; url: string; media: PreparedMedia }
  | { status: "error"; url: string; message: string };

export type MediaFetcher = (url: string) => Promise<PreparedMedia>;

interface Completion {
  generation: number;
  entry: Exclude<MediaEntry, { status: "loading" }>;
}

export class MediaWorker {
  private generation = 0;
  private cache = new Map<string, PreparedMedia>();
  private completions: Completion[] = [];
  private current: MediaEntry | null = null;

  constructor(private fetcher: MediaFetcher) {}

  get latestGeneration(): number {
    return this.generation;
  }

  getCurrent = (): MediaEntry | null => this.current;

  getCached = (url: string): PreparedMedia | undefined => this.cache.get(url);

  /** Start preparing `url` unless it's already cached. */
  request = (url: string) => {
    const cached = this.cache.get(url);
    if (cached) {
      this.generation++;
      this.current = { status: "ready", url, media: cached };
      return;
    }

    const generation = ++this.generation;
    this.current = { status: "loading", url };
    void this.fetcher(url).then(
      (media) => {
        this.completions.push({ generation, entry: { status: "ready", url, media } });
      },
      (error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        this.completions.push({ generation, entry: { status: "error", url, message } });
      }
    );
  };

  /** Collect finished work. Returns true if the current item changed. */
  poll = (): boolean => {
    if (this.completions.length === 0) return false;
    let changed = false;
    for (const { generation, entry } of this.completions.splice(0)) {
      if (entry.status === "ready") this.cache.set(entry.url, entry.media);
      if (generation === this.generation) {
        this.current = entry;
        changed = true;
      }
    }
    return changed;
  };
}

// ============================================================================
// Fetching
// ============================================================================

// Attachment hosts that may need the user's token
function needsAuth(url: string): boolean {
  return url.includes("private-user-images") || url.includes("user-attachments");
}

export function createMediaFetcher(token: string | null): MediaFetcher {
  return async (url) => {
    const headers: Record<string, string> = { "User-Agent": "pr-lens" };
    if (token && needsAuth(url)) headers.Authorization = `token ${token}`;

    const response = await fetch(url, {
      headers,
      signal: AbortSignal.timeout(10_000),
    });
    if (!response.ok) {
      throw new Error(`${response.status} ${response.statusText}`);
    }
    const data = await response.arrayBuffer();
    return {
      url,
      contentType: response.headers.get("content-type") ?? "unknown",
      bytes: data.byteLength,
    };
  };
}
