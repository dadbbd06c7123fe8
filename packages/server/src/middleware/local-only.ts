/**
 * Middleware that rejects requests relayed by a reverse proxy.
 *
 * Detection:
 * - X-Forwarded-For header (added by nginx, Caddy and most other proxies)
 * - Forwarded header (RFC 7239)
 *
 * Apply to routes that must only be called from the host itself
 * (e.g. triggering a sync).
 */

import type { MiddlewareHandler } from "hono";

export function createLocalOnlyMiddleware(): MiddlewareHandler {
  return async (c, next) => {
    if (c.req.header("x-forwarded-for") || c.req.header("forwarded")) {
      return c.json(
        {
          error: {
            code: 403,
            errorCode: "LOCAL_ONLY",
            message: "This endpoint is only accessible locally",
          },
        },
        403,
      );
    }
    await next();
  };
}
