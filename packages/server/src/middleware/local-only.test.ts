import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { createLocalOnlyMiddleware } from "./local-only.js";

function createTestApp() {
  const app = new Hono();
  const localOnly = createLocalOnlyMiddleware();

  app.post("/trigger", localOnly, (c) => c.json({ ok: true }));

  return app;
}

describe("createLocalOnlyMiddleware", () => {
  it("allows requests without proxy headers", async () => {
    const app = createTestApp();
    const res = await app.request("/trigger", { method: "POST" });
    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body).toEqual({ ok: true });
  });

  it("rejects requests with X-Forwarded-For header", async () => {
    const app = createTestApp();
    const res = await app.request("/trigger", {
      method: "POST",
      headers: { "X-Forwarded-For": "1.2.3.4" },
    });
    expect(res.status).toBe(403);
    const body = await res.json();
    expect(body.error.errorCode).toBe("LOCAL_ONLY");
  });

  it("rejects requests with a Forwarded header", async () => {
    const app = createTestApp();
    const res = await app.request("/trigger", {
      method: "POST",
      headers: { Forwarded: "for=192.0.2.60;proto=https" },
    });
    expect(res.status).toBe(403);
    const body = await res.json();
    expect(body.error.errorCode).toBe("LOCAL_ONLY");
  });
});
