import type { Commit, Repository, ReviewSession } from "./review";

// In production the server serves the app. In dev, use localhost:3001
const API_BASE = import.meta.env.DEV ? "http://localhost:3001" : "";

/**
 * A server call failed. For GitHub failures, upstreamStatus and
 * upstreamUrl point at the request GitHub rejected.
 */
export class ApiRequestError extends Error {
  status: number;
  upstreamStatus: number | null;
  upstreamUrl: string | null;

  constructor(message: string, status: number, upstreamStatus: number | null = null, upstreamUrl: string | null = null) {
    super(message);
    this.name = "ApiRequestError";
    this.status = status;
    this.upstreamStatus = upstreamStatus;
    this.upstreamUrl = upstreamUrl;
  }
}

async function toApiError(res: Response, fallback: string): Promise<ApiRequestError> {
  const text = await res.text();
  try {
    const data: unknown = JSON.parse(text);
    if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
      const upstreamStatus = "status" in data && typeof data.status === "number" ? data.status : null;
      const upstreamUrl = "url" in data && typeof data.url === "string" ? data.url : null;
      return new ApiRequestError(data.error, res.status, upstreamStatus, upstreamUrl);
    }
  } catch {
    // Not JSON: fall through to the raw text
  }
  return new ApiRequestError(text || fallback, res.status);
}

export async function openReview(reference: string): Promise<ReviewSession> {
  const res = await fetch(`${API_BASE}/api/review`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ reference }),
  });

  if (!res.ok) {
    throw await toApiError(res, "Failed to open review");
  }

  return res.json();
}

export async function openCommitReview({ owner, repo }: Repository, commit: Commit): Promise<ReviewSession> {
  const res = await fetch(`${API_BASE}/api/review/commit`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ owner, repo, commit }),
  });

  if (!res.ok) {
    throw await toApiError(res, "Failed to open commit");
  }

  return res.json();
}

export async function fetchContent({ owner, repo }: Repository, revision: string, path: string): Promise<string> {
  const params = new URLSearchParams({ owner, repo, revision, path });
  const res = await fetch(`${API_BASE}/api/content?${params}`);

  if (!res.ok) {
    throw await toApiError(res, `Failed to load ${path}@${revision}`);
  }

  return res.text();
}
