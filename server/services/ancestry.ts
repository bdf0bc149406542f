import type { Commit } from "../../src/lib/review";

/**
 * First-parent chain ending at headRevision, oldest first.
 *
 * Only parents[0] is followed, so commits merged in from side branches
 * never appear. The walk stops at the first commit missing from the set
 * (its parent lies outside the compared range); an unknown head gives [].
 */
export function linearize(commits: readonly Commit[], headRevision: string): Commit[] {
  const bySha = new Map<string, Commit>();
  for (const commit of commits) {
    bySha.set(commit.sha, commit);
  }

  const chain: Commit[] = [];
  const visited = new Set<string>();
  let current = bySha.get(headRevision);

  while (current && !visited.has(current.sha)) {
    visited.add(current.sha);
    chain.unshift(current);

    const firstParent = current.parents[0];
    current = firstParent === undefined ? undefined : bySha.get(firstParent);
  }

  return chain;
}
