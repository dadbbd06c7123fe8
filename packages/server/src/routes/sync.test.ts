import { describe, it, expect, vi } from "vitest";
import { pino } from "pino";
import type { CycleResult, SyncManager, SyncStatus } from "@export-tracker/core/sync";
import { syncRoutes } from "./sync.js";

const logger = pino({ level: "silent" });

const status: SyncStatus = {
  enabled: true,
  running: true,
  lastSync: "2026-10-19T10:00:05.000Z",
  lastResult: null,
  archive: { enabled: true, active: 1, pending: 4 },
  errors: [],
};

function createMockSyncManager(overrides?: Partial<SyncManager>): SyncManager {
  return {
    start: vi.fn(),
    stop: vi.fn<() => Promise<void>>().mockResolvedValue(undefined),
    trigger: vi.fn<() => Promise<CycleResult>>().mockResolvedValue({
      status: "aborted",
      startedAt: "2026-10-19T10:00:00.000Z",
      finishedAt: "2026-10-19T10:00:01.000Z",
      error: "offline",
    }),
    getStatus: vi.fn<() => SyncStatus>().mockReturnValue(status),
    running: true,
    ...overrides,
  };
}

describe("syncRoutes", () => {
  describe("POST /trigger", () => {
    it("returns 202 and triggers a cycle", async () => {
      const syncManager = createMockSyncManager();
      const app = syncRoutes({ logger, syncManager });

      const res = await app.request("/trigger", { method: "POST" });

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ status: "started", message: "Sync triggered" });
      expect(syncManager.trigger).toHaveBeenCalledTimes(1);
    });

    it("returns 202 even when the cycle later fails", async () => {
      const syncManager = createMockSyncManager({
        trigger: vi.fn<() => Promise<CycleResult>>().mockRejectedValue(new Error("boom")),
      });
      const app = syncRoutes({ logger, syncManager });

      const res = await app.request("/trigger", { method: "POST" });

      expect(res.status).toBe(202);
    });

    it("rejects proxied requests", async () => {
      const syncManager = createMockSyncManager();
      const app = syncRoutes({ logger, syncManager });

      const res = await app.request("/trigger", {
        method: "POST",
        headers: { "X-Forwarded-For": "203.0.113.7" },
      });

      expect(res.status).toBe(403);
      expect(syncManager.trigger).not.toHaveBeenCalled();
    });
  });

  describe("GET /status", () => {
    it("returns the manager status", async () => {
      const app = syncRoutes({ logger, syncManager: createMockSyncManager() });

      const res = await app.request("/status");

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(status);
    });
  });
});
