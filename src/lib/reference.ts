export interface ReferenceParams {
  owner?: string;
  repo?: string;
  prNumber?: string;
  sha?: string;
}

/**
 * Route params -> the short reference form the server parses
 * (owner/repo#12, owner/repo@sha, owner/repo#12@sha)
 */
export function buildReference({ owner, repo, prNumber, sha }: ReferenceParams): string | null {
  if (!owner || !repo || (!prNumber && !sha)) return null;

  let reference = `${owner}/${repo}`;
  if (prNumber) reference += `#${prNumber}`;
  if (sha) reference += `@${sha}`;
  return reference;
}
