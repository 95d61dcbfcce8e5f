import type { MiddlewareHandler } from "hono";
import type { Logger } from "./logger.js";

/** Logs one line per request. The path is logged without its query, which carries the feed secret. */
export function createHttpLogger(log: Logger): MiddlewareHandler {
  return async (c, next) => {
    const startTime = performance.now();

    await next();

    const status = c.res.status;
    const logData = {
      "http.request.method": c.req.method,
      "http.response.status_code": status,
      "url.path": new URL(c.req.url).pathname,
      "user_agent.original": c.req.header("User-Agent"),
      "client.address": c.req.header("X-Forwarded-For") || c.req.header("X-Real-IP"),
      "http.server.request.duration_ms": Math.round(performance.now() - startTime)
    };

    if (status >= 500) {
      log.error(logData, "HTTP request failed");
    } else if (status >= 400) {
      log.warn(logData, "HTTP request client error");
    } else {
      log.info(logData, "HTTP request completed");
    }
  };
}
