import type { Repository } from "../../src/lib/review";

export const JSON_ACCEPT = "application/vnd.github.v3+json";
const USER_AGENT = "diffdeck";

/**
 * Get GitHub API headers with optional authentication
 */
export function getGitHubHeaders(
  token: string | null,
  accept: string | null = JSON_ACCEPT
): Record<string, string> {
  const headers: Record<string, string> = {
    "User-Agent": USER_AGENT,
  };
  if (accept) {
    headers["Accept"] = accept;
  }
  if (token) {
    headers["Authorization"] = `token ${token}`;
  }
  return headers;
}

function encodePath(filePath: string): string {
  return filePath.split("/").map(encodeURIComponent).join("/");
}

/**
 * Build GitHub API URL for comparing two revisions
 */
export function getCompareUrl(apiBaseUrl: string, { owner, repo }: Repository, base: string, head: string): string {
  return `${apiBaseUrl}/repos/${owner}/${repo}/compare/${base}...${head}`;
}

/**
 * Build GitHub API URL for a pull request
 */
export function getPullUrl(apiBaseUrl: string, { owner, repo }: Repository, number: number): string {
  return `${apiBaseUrl}/repos/${owner}/${repo}/pulls/${number}`;
}

/**
 * Build raw content URL for a file at a revision
 */
export function getRawContentUrl(rawBaseUrl: string, { owner, repo }: Repository, revision: string, filePath: string): string {
  return `${rawBaseUrl}/${owner}/${repo}/${revision}/${encodePath(filePath)}`;
}
