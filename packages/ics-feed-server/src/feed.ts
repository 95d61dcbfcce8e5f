import { EncodingError, encodeFeed, type CalendarEvent, type EncodedFeed } from "@ics-feed/core";
import type { Settings } from "./config.js";
import type { Logger } from "./logger.js";

export type CalendarState = {
  entityId: string;
  state: string;
  friendlyName?: string;
};

export type CalendarSource = {
  getCalendar(entityId: string): Promise<CalendarState | null>;
  listEvents(args: { entityId: string; start: Date; end: Date }): Promise<CalendarEvent[]>;
};

export type FeedRequest = {
  entityId: string;
  secret?: string;
};

export type FeedOutcome =
  | { kind: "success"; feed: EncodedFeed; eventCount: number }
  | { kind: "notFound" }
  | { kind: "unauthorized" }
  | { kind: "unavailable" }
  | { kind: "upstreamError"; error: unknown }
  | { kind: "encodingError"; error: EncodingError };

const UNAVAILABLE_STATES = new Set(["unavailable", "unknown"]);

const DAY_MS = 24 * 60 * 60 * 1000;

export class FeedHandler {
  private readonly now: () => Date;

  constructor(
    private readonly deps: {
      settings: Settings;
      source: CalendarSource;
      logger: Logger;
      now?: () => Date;
    }
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Resolve, authorize, then render. Nothing is cached between requests. */
  async handle(request: FeedRequest): Promise<FeedOutcome> {
    const { settings, logger } = this.deps;
    const { entityId } = request;

    if (!settings.secrets.has(entityId)) {
      logger.warn({ entityId }, "Feed requested for an unconfigured calendar");
      return { kind: "notFound" };
    }

    if (settings.secrets.authorize(entityId, request.secret) === "denied") {
      logger.warn(
        { entityId },
        request.secret === undefined ? "Feed requested without secret" : "Feed requested with invalid secret"
      );
      return { kind: "unauthorized" };
    }

    return this.render(entityId);
  }

  /** Builds the feed of a configured calendar without checking any secret. */
  async render(entityId: string): Promise<FeedOutcome> {
    const { settings, source, logger } = this.deps;
    if (!settings.secrets.has(entityId)) {
      return { kind: "notFound" };
    }

    const now = this.now();
    const start = new Date(now.getTime() - settings.window.lookbackDays * DAY_MS);
    const end = new Date(now.getTime() + settings.window.lookaheadDays * DAY_MS);

    let calendar: CalendarState;
    let events: CalendarEvent[];
    try {
      const found = await source.getCalendar(entityId);
      if (!found) {
        logger.warn({ entityId }, "Calendar entity not found upstream");
        return { kind: "notFound" };
      }
      if (UNAVAILABLE_STATES.has(found.state)) {
        logger.warn({ entityId, state: found.state }, "Calendar entity is unavailable");
        return { kind: "unavailable" };
      }
      calendar = found;
      events = await source.listEvents({ entityId, start, end });
    } catch (error) {
      logger.error({ err: error, entityId }, "Failed to fetch calendar events");
      return { kind: "upstreamError", error };
    }

    const calendarName = settings.calendarNames.get(entityId) ?? calendar.friendlyName ?? entityId;
    try {
      const feed = encodeFeed({
        calendarName,
        entityId,
        events,
        colorFor: (summary) => settings.colors.colorFor(summary),
        generatedAt: now
      });
      logger.debug({ entityId, events: events.length }, "Feed rendered");
      return { kind: "success", feed, eventCount: events.length };
    } catch (error) {
      if (error instanceof EncodingError) {
        logger.error({ err: error, entityId, eventIndex: error.eventIndex }, "Failed to encode calendar feed");
        return { kind: "encodingError", error };
      }
      throw error;
    }
  }
}
