/**
 * A GitHub endpoint answered with a status its caller cannot use.
 * The body is kept verbatim: GitHub does not reliably tell "not found"
 * apart from "no access" for private repositories.
 */
export class GitHubApiError extends Error {
  readonly status: number;
  readonly url: string;
  readonly body: string;

  constructor(status: number, url: string, body: string) {
    super(`GitHub API error ${status} for ${url}${body ? `: ${body}` : ""}`);
    this.name = "GitHubApiError";
    this.status = status;
    this.url = url;
    this.body = body;
  }
}

/** The request to GitHub never produced a complete response */
export class GitHubTransportError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Request to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = "GitHubTransportError";
    this.url = url;
  }
}

/** A successful response whose body does not have the expected shape */
export class ResponseParseError extends Error {
  readonly url: string;

  constructor(url: string, detail: string) {
    super(`Unexpected response from ${url}: ${detail}`);
    this.name = "ResponseParseError";
    this.url = url;
  }
}

/** Rejected before any network call */
export class InvalidReferenceError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Not a pull request or commit reference: "${input}"`);
    this.name = "InvalidReferenceError";
    this.input = input;
  }
}

/** A request body or query is missing required fields */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}
