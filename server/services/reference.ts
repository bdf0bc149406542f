import type { Repository } from "../../src/lib/review";
import { getPullUrl } from "../utils/github";
import { InvalidReferenceError, ResponseParseError } from "../utils/errors";
import { isObject } from "../utils/json";
import { logger } from "../utils/logger";
import type { GitHubClient } from "./githubClient";

export type ReviewReference =
  | { kind: "pull"; repository: Repository; number: number }
  | { kind: "commit"; repository: Repository; sha: string }
  | { kind: "pull-commit"; repository: Repository; number: number; sha: string };

/** Entry contract of the engine, whatever the reference looked like */
export interface SessionRequest {
  repository: Repository;
  base: string;
  head: string;
  // Filled in from the head commit message when absent
  description?: string;
  // Prepended to the head commit message when description is absent
  context?: string;
}

const NAME = "[A-Za-z0-9_.-]+";
const SHA = "[0-9a-fA-F]{7,40}";

// https://github.com/owner/repo/pull/12[/commits/<sha>] or .../commit/<sha>
const URL_PATTERN = new RegExp(
  `^(?:https?://)?(?:www\\.)?github\\.com/(${NAME})/(${NAME})/(?:pull/(\\d+)(?:/commits/(${SHA}))?|commit/(${SHA}))/?(?:[?#].*)?$`
);
// owner/repo#12, owner/repo@<sha>, owner/repo#12@<sha>
const SHORT_PATTERN = new RegExp(`^(${NAME})/(${NAME})(?:#(\\d+))?(?:@(${SHA}))?$`);

function toRepository(owner: string, repo: string): Repository {
  return { owner, repo: repo.replace(/\.git$/, "") };
}

function toReference(
  input: string,
  repository: Repository,
  pull: string | undefined,
  sha: string | undefined
): ReviewReference {
  const number = pull === undefined ? undefined : parseInt(pull, 10);
  if (number !== undefined && number <= 0) {
    throw new InvalidReferenceError(input);
  }

  if (number !== undefined && sha !== undefined) {
    return { kind: "pull-commit", repository, number, sha: sha.toLowerCase() };
  }
  if (number !== undefined) {
    return { kind: "pull", repository, number };
  }
  if (sha !== undefined) {
    return { kind: "commit", repository, sha: sha.toLowerCase() };
  }
  throw new InvalidReferenceError(input);
}

/**
 * Parse a pull request or commit reference
 * @throws InvalidReferenceError for anything else
 */
export function parseReference(input: string): ReviewReference {
  const trimmed = input.trim();

  const url = trimmed.match(URL_PATTERN);
  if (url) {
    const [, owner, repo, pull, pullCommit, commit] = url;
    return toReference(input, toRepository(owner, repo), pull, pullCommit ?? commit);
  }

  const short = trimmed.match(SHORT_PATTERN);
  if (short) {
    const [, owner, repo, pull, sha] = short;
    return toReference(input, toRepository(owner, repo), pull, sha);
  }

  throw new InvalidReferenceError(input);
}

interface PullInfo {
  baseSha: string;
  headSha: string;
  title: string;
  body: string;
}

function parsePull(body: unknown, url: string): PullInfo {
  if (!isObject(body)) {
    throw new ResponseParseError(url, "body is not an object");
  }
  const baseSha = isObject(body.base) ? body.base.sha : undefined;
  const headSha = isObject(body.head) ? body.head.sha : undefined;
  if (typeof baseSha !== "string" || typeof headSha !== "string") {
    throw new ResponseParseError(url, "pull request has no base/head sha");
  }

  return {
    baseSha,
    headSha,
    title: typeof body.title === "string" ? body.title : "",
    // null when the author left the description empty
    body: typeof body.body === "string" ? body.body : "",
  };
}

/**
 * Turn a reference into the (repository, base, head, description) the
 * session pipeline takes. Only pull requests need a network call.
 */
export async function resolveReference(
  client: GitHubClient,
  apiBaseUrl: string,
  reference: ReviewReference
): Promise<SessionRequest> {
  const { repository } = reference;

  switch (reference.kind) {
    case "pull": {
      const url = getPullUrl(apiBaseUrl, repository, reference.number);
      const pull = parsePull(await client.getJson(url), url);
      logger.info("reference", `#${reference.number} resolved to ${pull.baseSha}...${pull.headSha}`);

      const body = pull.body.trim();
      return {
        repository,
        base: pull.baseSha,
        head: pull.headSha,
        description: body ? `#${reference.number} ${pull.title}\n\n${body}` : `#${reference.number} ${pull.title}`,
      };
    }
    case "commit":
      return { repository, base: `${reference.sha}^`, head: reference.sha };
    case "pull-commit":
      return { repository, base: `${reference.sha}^`, head: reference.sha, context: `#${reference.number}` };
  }
}
