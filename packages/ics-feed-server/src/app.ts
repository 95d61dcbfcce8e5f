import { Hono } from "hono";
import type { FeedHandler, FeedOutcome } from "./feed.js";
import { createHttpLogger } from "./httpLogger.js";
import type { Logger } from "./logger.js";

export { FeedHandler } from "./feed.js";
export type { CalendarSource, CalendarState, FeedOutcome, FeedRequest } from "./feed.js";
export { HomeAssistantClient, HomeAssistantError } from "./homeAssistantClient.js";
export { loadConfig, loadSettings, resolveSettings, validateConfig, type Config, type Settings } from "./config.js";
export { createLogger } from "./logger.js";

type ErrorOutcome = Exclude<FeedOutcome, { kind: "success" }>;

// Bodies stay generic: no detail about the upstream, the secret or other calendars.
const ERROR_RESPONSES: Record<ErrorOutcome["kind"], { status: 401 | 404 | 500 | 502 | 503; body: string }> = {
  notFound: { status: 404, body: "Not Found" },
  unauthorized: { status: 401, body: "Unauthorized" },
  unavailable: { status: 503, body: "Service Unavailable" },
  upstreamError: { status: 502, body: "Bad Gateway" },
  encodingError: { status: 500, body: "Internal Server Error" }
};

export function createFeedRoutes(handler: FeedHandler): Hono {
  const feeds = new Hono();

  // GET /api/ics/calendar.bins?s=<secret>
  feeds.get("/:entityId", async (c) => {
    const entityId = c.req.param("entityId");
    const outcome = await handler.handle({ entityId, secret: c.req.query("s") });

    if (outcome.kind !== "success") {
      const { status, body } = ERROR_RESPONSES[outcome.kind];
      return c.text(body, status);
    }

    return c.body(outcome.feed.body, 200, {
      "Content-Type": outcome.feed.contentType,
      "Content-Disposition": `inline; filename="${entityId.replace(/[^A-Za-z0-9._-]/g, "_")}.ics"`,
      "Cache-Control": "no-store"
    });
  });

  return feeds;
}

export function createApp(deps: { handler: FeedHandler; basePath: string; logger: Logger }): Hono {
  const app = new Hono();

  app.use("*", createHttpLogger(deps.logger));
  app.get("/healthz", (c) => c.json({ status: "ok" }));
  app.route(deps.basePath, createFeedRoutes(deps.handler));
  app.notFound((c) => c.text("Not Found", 404));

  return app;
}
