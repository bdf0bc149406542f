/**
 * Server configuration, read from the environment once at startup
 */

export interface ServerConfig {
  port: number;
  // Optional credential; requests go out unauthenticated without it
  githubToken: string | null;
  apiBaseUrl: string;
  rawBaseUrl: string;
  debug: boolean;
}

const DEFAULT_PORT = 3001;
const DEFAULT_API_URL = "https://api.github.com";
const DEFAULT_RAW_URL = "https://raw.githubusercontent.com";

function trimTrailingSlash(url: string): string {
  return url.replace(/\/+$/, "");
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = env.PORT ? parseInt(env.PORT, 10) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port <= 0) {
    throw new Error(`Invalid PORT: ${env.PORT}`);
  }

  return {
    port,
    githubToken: env.GITHUB_TOKEN?.trim() || null,
    apiBaseUrl: trimTrailingSlash(env.GITHUB_API_URL || DEFAULT_API_URL),
    rawBaseUrl: trimTrailingSlash(env.GITHUB_RAW_URL || DEFAULT_RAW_URL),
    debug: env.DEBUG === "true",
  };
}
