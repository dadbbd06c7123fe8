import { serve } from "@hono/node-server";
import { createRequire } from "node:module";
import { loadConfig, ROOT_PATH_ENV } from "@export-tracker/core/config";
import { createServer } from "./bootstrap.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const DRAIN_TIMEOUT_MS = 5_000;

async function main(): Promise<void> {
  const rootPath = process.env[ROOT_PATH_ENV];
  const config = await loadConfig({ rootPath });
  const context = await createServer(config, { rootPath });
  const { app, logger, paths } = context;

  const server = serve(
    { fetch: app.fetch, port: config.server.port, hostname: config.server.host },
    (info) => {
      logger.info(
        {
          host: config.server.host,
          port: info.port,
          version: pkg.version,
          rootPath: paths.rootPath,
        },
        "HTTP server started",
      );
    },
  );

  // HTTP is already listening, so the browsing pages work during the first cycle
  context.startBackgroundServices();

  async function shutdown(signal: string): Promise<void> {
    logger.info({ signal }, "Shutdown signal received, draining connections");

    try {
      await context.cleanup();
    } catch (err) {
      logger.error({ err }, "Cleanup failed");
    }

    server.close(() => {
      logger.info("Server stopped");
      process.exit(0);
    });

    // Force exit after drain timeout
    setTimeout(() => {
      logger.warn("Drain timeout exceeded, forcing exit");
      process.exit(1);
    }, DRAIN_TIMEOUT_MS).unref();
  }

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err) => {
  console.error("Failed to start server:", err);
  process.exit(1);
});
