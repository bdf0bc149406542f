import { existsSync } from "fs";
import path from "path";
import express from "express";
import cors from "cors";
import type { ServerConfig } from "./config";
import { createReviewRouter } from "./routes/review";
import { ContentCache, ContentResolver } from "./services/contentCache";
import { GitHubClient } from "./services/githubClient";

export interface AppDeps {
  config: ServerConfig;
  client?: GitHubClient;
  // Shared by every session for the life of the process
  cache?: ContentCache;
  // Built front end to serve, if any
  staticDir?: string;
}

export function createApp({ config, client, cache, staticDir }: AppDeps) {
  const github = client ?? new GitHubClient({ token: config.githubToken });
  const contentCache = cache ?? new ContentCache();
  const resolver = new ContentResolver(github, contentCache, config.rawBaseUrl);

  const app = express();
  app.use(cors());
  app.use(express.json());

  app.get("/api/config", (_req, res) => {
    res.json({
      authenticated: github.authenticated,
      apiBaseUrl: config.apiBaseUrl,
    });
  });

  app.use(
    "/api",
    createReviewRouter({
      client: github,
      apiBaseUrl: config.apiBaseUrl,
      resolver,
      cache: contentCache,
    })
  );

  if (staticDir && existsSync(staticDir)) {
    app.use(express.static(staticDir));
    // Client-side routes
    app.get("*", (_req, res) => {
      res.sendFile(path.join(staticDir, "index.html"));
    });
  }

  return app;
}
