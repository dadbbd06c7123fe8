/**
 * Sync routes: trigger a cycle and report sync engine status.
 * Triggering is limited to local callers.
 */

import { Hono } from "hono";
import type { Logger } from "pino";
import type { SyncManager } from "@export-tracker/core/sync";
import { createLocalOnlyMiddleware } from "../middleware/local-only.js";

export interface SyncRouteDeps {
  logger: Logger;
  syncManager: SyncManager;
}

export function syncRoutes(deps: SyncRouteDeps): Hono {
  const app = new Hono();
  const localOnly = createLocalOnlyMiddleware();

  // POST /trigger — start a cycle now; the result shows up in /status
  app.post("/trigger", localOnly, (c) => {
    deps.syncManager.trigger().catch((err: unknown) => {
      deps.logger.error({ err }, "Triggered sync cycle failed");
    });
    return c.json({ status: "started", message: "Sync triggered" }, 202);
  });

  app.get("/status", (c) => {
    return c.json(deps.syncManager.getStatus());
  });

  return app;
}
