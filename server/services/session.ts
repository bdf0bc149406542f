import type { Commit, Comparison, Repository, ReviewSession } from "../../src/lib/review";
import { repositoryName, shortSha } from "../../src/lib/review";
import { logger } from "../utils/logger";
import { linearize } from "./ancestry";
import { fetchComparison } from "./comparison";
import type { GitHubClient } from "./githubClient";
import { parseReference, resolveReference, type SessionRequest } from "./reference";

export interface SessionDeps {
  client: GitHubClient;
  apiBaseUrl: string;
}

function findCommit(commits: readonly Commit[], revision: string): Commit | undefined {
  const exact = commits.find((commit) => commit.sha === revision);
  if (exact) return exact;

  // Abbreviated sha: only trust an unambiguous prefix
  const prefix = revision.toLowerCase();
  const matches = commits.filter((commit) => commit.sha.startsWith(prefix));
  return matches.length === 1 ? matches[0] : undefined;
}

/**
 * Replace revisions the compare response lets us resolve with full commit
 * hashes, so content cache keys stay immutable: an abbreviated head sha
 * becomes the commit it prefixes, and "X^" becomes X's first parent.
 */
export function pinRevisions(commits: readonly Commit[], base: string, head: string): { base: string; head: string } {
  const headCommit = findCommit(commits, head);

  let pinnedBase = base;
  if (base.endsWith("^")) {
    const child = findCommit(commits, base.slice(0, -1));
    if (child?.parents[0] !== undefined) {
      pinnedBase = child.parents[0];
    }
  }

  return { base: pinnedBase, head: headCommit?.sha ?? head };
}

function describeSession(request: SessionRequest, comparison: Comparison): string {
  if (request.description !== undefined) {
    return request.description;
  }

  const headCommit = comparison.commits.find((commit) => commit.sha === comparison.head);
  if (headCommit) {
    return request.context ? `${request.context} ${headCommit.message}` : headCommit.message;
  }
  return request.context ?? `${shortSha(comparison.base)}..${shortSha(comparison.head)}`;
}

/**
 * fetch -> linearize -> session. Nothing is built when the fetch fails.
 */
export async function openSession(deps: SessionDeps, request: SessionRequest): Promise<ReviewSession> {
  const { repository } = request;
  const fetched = await fetchComparison(deps.client, deps.apiBaseUrl, repository, request.base, request.head);

  const { base, head } = pinRevisions(fetched.commits, request.base, request.head);
  const comparison: Comparison = { ...fetched, base, head };
  const chain = linearize(comparison.commits, head);

  if (comparison.commits.length > 0 && chain.length === 0) {
    logger.warn("session", `Head ${head} is not among the ${comparison.commits.length} compared commits`);
  }
  logger.info(
    "session",
    `${repositoryName(repository)} ${shortSha(base)}..${shortSha(head)}: ${chain.length} commits, ${comparison.files.length} files`
  );

  return { description: describeSession(request, comparison), comparison, chain };
}

/**
 * Drill-down into one commit: the same pipeline over (commit^, commit)
 */
export function openCommitSession(deps: SessionDeps, repository: Repository, commit: Commit): Promise<ReviewSession> {
  return openSession(deps, {
    repository,
    base: commit.parents[0] ?? `${commit.sha}^`,
    head: commit.sha,
    description: commit.message,
  });
}

/**
 * Entry point for a pull request or commit reference
 */
export async function openReference(deps: SessionDeps, input: string): Promise<ReviewSession> {
  const reference = parseReference(input);
  const request = await resolveReference(deps.client, deps.apiBaseUrl, reference);
  return openSession(deps, request);
}
