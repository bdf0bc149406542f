import { getGitHubHeaders } from "../utils/github";
import { GitHubApiError, GitHubTransportError, ResponseParseError } from "../utils/errors";
import { logger } from "../utils/logger";

export type EndpointKind = "json" | "content";
export type StatusClass = "success" | "absent" | "fatal";

export interface JsonResponse {
  status: number;
  // Parsed JSON on 200, raw text otherwise
  body: unknown;
}

export interface RawResponse {
  status: number;
  bytes: Uint8Array;
}

export type FetchFn = (url: string, init: { headers: Record<string, string> }) => Promise<Response>;

export interface GitHubClientOptions {
  token?: string | null;
  fetch?: FetchFn;
}

/**
 * 200 is the only success. A 404 on a content endpoint means the file
 * does not exist at that revision (an addition or deletion).
 */
export function classifyStatus(status: number, kind: EndpointKind): StatusClass {
  if (status === 200) return "success";
  if (kind === "content" && status === 404) return "absent";
  return "fatal";
}

/**
 * Thin GitHub HTTP client. Never retries, never caches.
 */
export class GitHubClient {
  private readonly token: string | null;
  private readonly fetchFn: FetchFn;

  constructor(options: GitHubClientOptions = {}) {
    this.token = options.token ?? null;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  get authenticated(): boolean {
    return this.token !== null;
  }

  // Network failures, including a body cut off mid-read, carry the URL
  private async send<T>(
    url: string,
    headers: Record<string, string>,
    read: (response: Response) => Promise<T>
  ): Promise<{ status: number; body: T }> {
    logger.debug("github", `GET ${url}`);
    try {
      const response = await this.fetchFn(url, { headers });
      const body = await read(response);
      logger.debug("github", `${response.status} ${url}`);
      return { status: response.status, body };
    } catch (error) {
      const transportError = new GitHubTransportError(url, error);
      logger.error("github", transportError.message);
      throw transportError;
    }
  }

  async request(url: string): Promise<JsonResponse> {
    const { status, body: text } = await this.send(url, getGitHubHeaders(this.token), (response) => response.text());

    if (status !== 200) {
      return { status, body: text };
    }

    try {
      return { status, body: JSON.parse(text) };
    } catch {
      throw new ResponseParseError(url, "body is not valid JSON");
    }
  }

  async requestRaw(url: string): Promise<RawResponse> {
    const { status, body: buffer } = await this.send(url, getGitHubHeaders(this.token, null), (response) =>
      response.arrayBuffer()
    );
    return { status, bytes: new Uint8Array(buffer) };
  }

  /**
   * Fetch a JSON endpoint and fail on anything but 200
   */
  async getJson(url: string): Promise<unknown> {
    const { status, body } = await this.request(url);
    if (classifyStatus(status, "json") !== "success") {
      logger.error("github", `GitHub API error ${status} for ${url}`);
      throw new GitHubApiError(status, url, typeof body === "string" ? body : "");
    }
    return body;
  }
}
