import { Hono } from "hono";
import { TrackerError } from "@export-tracker/core/errors";
import type { DownHostLog } from "@export-tracker/core/failures";
import type { SyncManager } from "@export-tracker/core/sync";
import type { Logger } from "pino";
import { healthRoute } from "./routes/health.js";
import { syncRoutes } from "./routes/sync.js";
import { browseRoutes } from "./routes/browse.js";

export interface AppDeps {
  logger: Logger;
  version: string;
  startedAt: Date;
  exportDir: string;
  downHostLog: DownHostLog;
  syncManager: SyncManager;
}

export function createApp(deps: AppDeps): Hono {
  const app = new Hono();

  app.route(
    "/",
    healthRoute({ version: deps.version, startedAt: deps.startedAt }),
  );

  app.route(
    "/v1/sync",
    syncRoutes({ logger: deps.logger, syncManager: deps.syncManager }),
  );

  // Catch-all "/:entity" lives here, so this goes last
  app.route(
    "/",
    browseRoutes({ exportDir: deps.exportDir, downHostLog: deps.downHostLog }),
  );

  // Global error handler
  app.onError((err, c) => {
    if (err instanceof TrackerError) {
      deps.logger.error({ err, errorCode: err.errorCode }, err.message);
    } else {
      deps.logger.error({ err }, "Unhandled error");
    }
    return c.json(
      {
        error: {
          code: 500,
          errorCode: "INTERNAL_ERROR",
          message: "Internal server error",
        },
      },
      500,
    );
  });

  // 404 fallback
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 404,
          errorCode: "NOT_FOUND",
          message: "Not found",
        },
      },
      404,
    );
  });

  return app;
}
