import path from "path";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { logger, setDebugLogging } from "./utils/logger";

const config = loadConfig();
setDebugLogging(config.debug);

if (!config.githubToken) {
  logger.info("server", "GITHUB_TOKEN not set, requests to GitHub are unauthenticated");
}

createApp({ config, staticDir: path.resolve(process.cwd(), "dist") }).listen(config.port, () => {
  logger.info("server", `diffdeck server running on http://localhost:${config.port}`);
});
