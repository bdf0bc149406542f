/**
 * Review session model shared by the server and the browser
 */

export interface Repository {
  owner: string;
  repo: string;
}

export const FILE_STATUSES = [
  "added",
  "removed",
  "modified",
  "renamed",
  "copied",
  "changed",
  "unchanged",
] as const;

export type FileStatus = (typeof FILE_STATUSES)[number];

export interface Commit {
  sha: string;
  // First entry is the first parent
  parents: string[];
  author: string;
  message: string;
}

export interface ChangedFile {
  path: string;
  previousPath?: string;
  status: FileStatus;
  additions: number;
  deletions: number;
}

export interface Comparison {
  repository: Repository;
  base: string;
  head: string;
  // Unordered, as reported by the compare endpoint
  commits: Commit[];
  // API order
  files: ChangedFile[];
}

export interface ReviewSession {
  description: string;
  comparison: Comparison;
  // Oldest first
  chain: Commit[];
}

export interface FileCoordinates {
  repository: Repository;
  baseRevision: string;
  headRevision: string;
  path: string;
  // Where the file lived at the base revision (differs for renames)
  basePath: string;
}

export function isFileStatus(value: unknown): value is FileStatus {
  return typeof value === "string" && FILE_STATUSES.some((status) => status === value);
}

export function repositoryName(repository: Repository): string {
  return `${repository.owner}/${repository.repo}`;
}

export function shortSha(sha: string): string {
  return sha.slice(0, 7);
}

export function summaryLine(message: string): string {
  return message.split("\n")[0].trim();
}

/**
 * Coordinates needed to resolve both sides of a changed file
 * @throws RangeError when index is outside the file list
 */
export function describeFile(session: ReviewSession, index: number): FileCoordinates {
  const { comparison } = session;
  const file = comparison.files[index];
  if (!Number.isInteger(index) || !file) {
    throw new RangeError(`No changed file at index ${index} (session has ${comparison.files.length})`);
  }

  return {
    repository: comparison.repository,
    baseRevision: comparison.base,
    headRevision: comparison.head,
    path: file.path,
    basePath: file.previousPath ?? file.path,
  };
}
