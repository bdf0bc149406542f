import type { ChangedFile, Commit, Comparison, Repository } from "../../src/lib/review";
import { isFileStatus } from "../../src/lib/review";
import { getCompareUrl } from "../utils/github";
import { ResponseParseError } from "../utils/errors";
import { isObject } from "../utils/json";
import { logger } from "../utils/logger";
import type { GitHubClient } from "./githubClient";

function expectString(value: unknown, what: string, url: string): string {
  if (typeof value !== "string") {
    throw new ResponseParseError(url, `${what} is not a string`);
  }
  return value;
}

function expectCount(value: unknown, what: string, url: string): number {
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ResponseParseError(url, `${what} is not a line count`);
  }
  return value;
}

function parseCommit(raw: unknown, index: number, url: string): Commit {
  const where = `commits[${index}]`;
  if (!isObject(raw)) {
    throw new ResponseParseError(url, `${where} is not an object`);
  }
  if (!Array.isArray(raw.parents)) {
    throw new ResponseParseError(url, `${where}.parents is not an array`);
  }
  const parents = raw.parents.map((parent, i) =>
    expectString(isObject(parent) ? parent.sha : undefined, `${where}.parents[${i}].sha`, url)
  );

  if (!isObject(raw.commit)) {
    throw new ResponseParseError(url, `${where}.commit is not an object`);
  }
  // Commits by deleted accounts can come back without an author block
  const author = isObject(raw.commit.author) && typeof raw.commit.author.name === "string"
    ? raw.commit.author.name
    : "unknown";

  return {
    sha: expectString(raw.sha, `${where}.sha`, url),
    parents,
    author,
    message: expectString(raw.commit.message, `${where}.commit.message`, url),
  };
}

function parseChangedFile(raw: unknown, index: number, url: string): ChangedFile {
  const where = `files[${index}]`;
  if (!isObject(raw)) {
    throw new ResponseParseError(url, `${where} is not an object`);
  }
  if (!isFileStatus(raw.status)) {
    throw new ResponseParseError(url, `${where}.status ${JSON.stringify(raw.status)} is not a known file status`);
  }

  const file: ChangedFile = {
    path: expectString(raw.filename, `${where}.filename`, url),
    status: raw.status,
    additions: expectCount(raw.additions, `${where}.additions`, url),
    deletions: expectCount(raw.deletions, `${where}.deletions`, url),
  };
  if (typeof raw.previous_filename === "string") {
    file.previousPath = raw.previous_filename;
  }
  return file;
}

/**
 * Validate a compare response into typed commits and files.
 * File order is kept; commit order carries no meaning.
 */
export function parseComparison(
  body: unknown,
  repository: Repository,
  base: string,
  head: string,
  url: string
): Comparison {
  if (!isObject(body)) {
    throw new ResponseParseError(url, "body is not an object");
  }
  if (!Array.isArray(body.commits)) {
    throw new ResponseParseError(url, "commits is not an array");
  }
  // An empty comparison omits files entirely
  const rawFiles = body.files ?? [];
  if (!Array.isArray(rawFiles)) {
    throw new ResponseParseError(url, "files is not an array");
  }

  return {
    repository,
    base,
    head,
    commits: body.commits.map((commit, i) => parseCommit(commit, i, url)),
    files: rawFiles.map((file, i) => parseChangedFile(file, i, url)),
  };
}

/**
 * One call to the compare endpoint. Errors propagate unchanged.
 */
export async function fetchComparison(
  client: GitHubClient,
  apiBaseUrl: string,
  repository: Repository,
  base: string,
  head: string
): Promise<Comparison> {
  const url = getCompareUrl(apiBaseUrl, repository, base, head);
  const body = await client.getJson(url);
  const comparison = parseComparison(body, repository, base, head, url);

  logger.debug(
    "comparison",
    `${repository.owner}/${repository.repo} ${base}...${head}: ${comparison.commits.length} commits, ${comparison.files.length} files`
  );
  return comparison;
}
