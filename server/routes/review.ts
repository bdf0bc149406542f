import { Router, type Response } from "express";
import type { Commit, Repository } from "../../src/lib/review";
import type { ContentCache, ContentResolver } from "../services/contentCache";
import { openCommitSession, openReference, type SessionDeps } from "../services/session";
import { BadRequestError, GitHubApiError, GitHubTransportError, InvalidReferenceError, ResponseParseError } from "../utils/errors";
import { isObject } from "../utils/json";
import { logger } from "../utils/logger";

export interface ReviewRouteDeps extends SessionDeps {
  resolver: ContentResolver;
  cache: ContentCache;
}

export interface ErrorResponse {
  status: number;
  body: { error: string; status?: number; url?: string };
}

/**
 * Map an engine error to the HTTP answer the browser sees. GitHub
 * failures keep the upstream status, URL and body so credential and
 * reference problems can be told apart by a person.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof InvalidReferenceError || error instanceof BadRequestError) {
    return { status: 400, body: { error: error.message } };
  }
  if (error instanceof GitHubApiError) {
    return { status: 502, body: { error: error.message, status: error.status, url: error.url } };
  }
  if (error instanceof ResponseParseError || error instanceof GitHubTransportError) {
    return { status: 502, body: { error: error.message, url: error.url } };
  }
  return { status: 500, body: { error: error instanceof Error ? error.message : "Unknown error" } };
}

function sendError(res: Response, context: string, error: unknown) {
  const { status, body } = toErrorResponse(error);
  logger.error(context, `Failed (${status}):`, body.error);
  res.status(status).json(body);
}

function requireString(source: Record<string, unknown>, field: string): string {
  const value = source[field];
  if (typeof value !== "string" || value === "") {
    throw new BadRequestError(`Missing ${field}`);
  }
  return value;
}

function parseRepository(source: Record<string, unknown>): Repository {
  return { owner: requireString(source, "owner"), repo: requireString(source, "repo") };
}

function parseCommit(value: unknown): Commit {
  if (!isObject(value)) {
    throw new BadRequestError("Missing commit");
  }
  const parents = Array.isArray(value.parents)
    ? value.parents.filter((parent): parent is string => typeof parent === "string")
    : [];
  return {
    sha: requireString(value, "sha"),
    parents,
    author: typeof value.author === "string" ? value.author : "",
    message: typeof value.message === "string" ? value.message : "",
  };
}

export function createReviewRouter(deps: ReviewRouteDeps): Router {
  const router = Router();

  // Open a session from a pull request or commit reference
  router.post("/review", async (req, res) => {
    try {
      const body: unknown = req.body;
      const reference = requireString(isObject(body) ? body : {}, "reference");
      logger.info("review", `Opening ${reference}`);
      res.json(await openReference(deps, reference));
    } catch (error) {
      sendError(res, "review", error);
    }
  });

  // Nested session for a single commit of an open session
  router.post("/review/commit", async (req, res) => {
    try {
      const body: unknown = req.body;
      const source = isObject(body) ? body : {};
      const repository = parseRepository(source);
      const commit = parseCommit(source.commit);
      logger.info("review", `Opening commit ${commit.sha} of ${repository.owner}/${repository.repo}`);
      res.json(await openCommitSession(deps, repository, commit));
    } catch (error) {
      sendError(res, "review-commit", error);
    }
  });

  router.get("/content", async (req, res) => {
    try {
      const query: Record<string, unknown> = req.query;
      const repository = parseRepository(query);
      const content = await deps.resolver.resolve(
        repository,
        requireString(query, "revision"),
        requireString(query, "path")
      );
      res.type("text/plain").send(content);
    } catch (error) {
      sendError(res, "content", error);
    }
  });

  router.get("/cache-stats", (_req, res) => {
    res.json(deps.cache.stats());
  });

  return router;
}
