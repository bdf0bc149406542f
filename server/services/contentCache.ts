import type { Repository } from "../../src/lib/review";
import { repositoryName } from "../../src/lib/review";
import { getRawContentUrl } from "../utils/github";
import { GitHubApiError } from "../utils/errors";
import { logger } from "../utils/logger";
import { classifyStatus, type GitHubClient } from "./githubClient";

// ============================================
// CONTENT CACHE
// ============================================

/**
 * Process-wide file content cache.
 * Key: (owner/repo, revision, path), matched exactly.
 * Entries are never evicted: content at a commit hash never changes.
 * A branch or tag name as revision makes entries go stale; callers are
 * expected to pass commit hashes.
 */
export class ContentCache {
  private readonly entries = new Map<string, string>();
  private hits = 0;
  private misses = 0;

  static key(repository: Repository, revision: string, filePath: string): string {
    return JSON.stringify([repositoryName(repository), revision, filePath]);
  }

  get(key: string): string | undefined {
    const content = this.entries.get(key);
    if (content === undefined) {
      this.misses++;
    } else {
      this.hits++;
    }
    return content;
  }

  set(key: string, content: string): void {
    this.entries.set(key, content);
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  stats(): { hits: number; misses: number; size: number } {
    return { hits: this.hits, misses: this.misses, size: this.entries.size };
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }
}

// ============================================
// CONTENT RESOLVER
// ============================================

const decoder = new TextDecoder("utf-8");

export class ContentResolver {
  // One fetch per key at a time; concurrent callers share it
  private readonly inFlight = new Map<string, Promise<string>>();

  constructor(
    private readonly client: GitHubClient,
    private readonly cache: ContentCache,
    private readonly rawBaseUrl: string
  ) {}

  /**
   * Content of a file at a revision. A missing file resolves to "".
   * @throws GitHubApiError on any other non-200 status; nothing is cached
   */
  async resolve(repository: Repository, revision: string, filePath: string): Promise<string> {
    const key = ContentCache.key(repository, revision, filePath);

    // Waiting on a shared fetch is neither a hit nor another miss
    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const fetching = this.fetchContent(repository, revision, filePath, key);
    this.inFlight.set(key, fetching);
    try {
      return await fetching;
    } finally {
      this.inFlight.delete(key);
    }
  }

  private async fetchContent(
    repository: Repository,
    revision: string,
    filePath: string,
    key: string
  ): Promise<string> {
    const url = getRawContentUrl(this.rawBaseUrl, repository, revision, filePath);
    logger.debug("content", `Cache miss for ${filePath}@${revision}`);

    const { status, bytes } = await this.client.requestRaw(url);
    switch (classifyStatus(status, "content")) {
      case "absent":
        this.cache.set(key, "");
        return "";
      case "success": {
        const content = decoder.decode(bytes);
        this.cache.set(key, content);
        return content;
      }
      case "fatal":
        logger.error("content", `Failed to fetch ${filePath}@${revision}: ${status}`);
        throw new GitHubApiError(status, url, decoder.decode(bytes));
    }
  }
}
