import type { MiddlewareHandler } from "hono";
import type { Logger } from "../logger.js";

/**
 * Request audit middleware.
 *
 * Emits one structured log line per request with timing, status, method,
 * path and client IP. The level follows the response status.
 */
export function auditLog(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const ip =
      c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
      c.req.header("x-real-ip") ||
      "unknown";

    await next();

    const status = c.res.status;
    const level = status >= 500 ? "error" : status >= 400 ? "warn" : "info";
    logger[level]("request", {
      method: c.req.method,
      path: c.req.path,
      query: c.req.query(),
      status,
      duration: Date.now() - start,
      ip,
      userAgent: c.req.header("user-agent") || "unknown",
    });
  };
}
