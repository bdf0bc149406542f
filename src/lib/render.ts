import type { ChangedFile, Commit, FileCoordinates, ReviewSession } from "./review";
import { describeFile, repositoryName, shortSha, summaryLine } from "./review";

// Rows carry what activating them needs, not just their text
export type ActivationEvent =
  | { type: "file"; index: number; coordinates: FileCoordinates }
  | { type: "commit"; index: number; commit: Commit };

export interface NavigatorRow {
  key: string;
  text: string;
  activation: ActivationEvent;
}

export interface NavigatorRows {
  header: string[];
  commits: NavigatorRow[];
  files: NavigatorRow[];
}

export const SUMMARY_WIDTH = 72;

// Width counts code points, so surrogate pairs are never split
export function truncate(text: string, width: number): string {
  const chars = Array.from(text);
  return chars.length <= width ? text : `${chars.slice(0, width - 1).join("")}…`;
}

export function formatCommitRow(commit: Commit): string {
  return `${shortSha(commit.sha)}  ${commit.author}  ${truncate(summaryLine(commit.message), SUMMARY_WIDTH)}`;
}

export function formatFileRow(file: ChangedFile): string {
  const row = `${file.status} (+${file.additions} −${file.deletions}) - ${file.path}`;
  return file.previousPath && file.previousPath !== file.path ? `${row} (from ${file.previousPath})` : row;
}

/**
 * Everything the list widget shows for a session: description header,
 * commits oldest first, files in API order
 */
export function renderSession(session: ReviewSession): NavigatorRows {
  const { comparison, chain } = session;

  const header = [
    ...session.description.trimEnd().split(/\r?\n/),
    `${repositoryName(comparison.repository)} ${shortSha(comparison.base)}..${shortSha(comparison.head)}`,
    `${chain.length} commit${chain.length === 1 ? "" : "s"}, ${comparison.files.length} file${comparison.files.length === 1 ? "" : "s"} changed`,
  ];

  const commits = chain.map((commit, index): NavigatorRow => ({
    key: `commit:${commit.sha}`,
    text: formatCommitRow(commit),
    activation: { type: "commit", index, commit },
  }));

  const files = comparison.files.map((file, index): NavigatorRow => ({
    key: `file:${index}:${file.path}`,
    text: formatFileRow(file),
    activation: { type: "file", index, coordinates: describeFile(session, index) },
  }));

  return { header, commits, files };
}
