import pino from "pino";
import type { CalendarEvent } from "@ics-feed/core";
import { resolveSettings, type Config, type Settings } from "../src/config.js";
import type { CalendarSource, CalendarState } from "../src/feed.js";
import type { Logger } from "../src/logger.js";

export const NOW = new Date("2024-05-30T12:00:00.000Z");

export function testConfig(): Config {
  return {
    homeAssistant: { url: "http://homeassistant.test", token: "test-token" },
    calendars: [
      { entityId: "calendar.bins", secret: "test-secret" },
      { entityId: "calendar.holidays", secret: "holiday-secret", name: "Holidays" }
    ],
    colors: [{ name: "Recycling", colour: "green" }]
  };
}

export function testSettings(config: Config = testConfig()): Settings {
  return resolveSettings(config, {});
}

/** Captures log lines in memory. */
export function createTestLogger(): { log: Logger; lines: () => Array<Record<string, unknown>> } {
  const logs: string[] = [];
  const stream = { write(msg: string) { logs.push(msg); } };
  const log = pino({ level: "trace" }, stream);
  return { log, lines: () => logs.map((line) => JSON.parse(line) as Record<string, unknown>) };
}

/** In-memory stand-in for Home Assistant. */
export class FakeCalendarSource implements CalendarSource {
  readonly calendars = new Map<string, CalendarState>();
  readonly events = new Map<string, CalendarEvent[]>();
  readonly listCalls: Array<{ entityId: string; start: Date; end: Date }> = [];
  readonly latencyMs = new Map<string, number>();
  failWith: Error | null = null;

  add(state: CalendarState, events: CalendarEvent[] = []): this {
    this.calendars.set(state.entityId, state);
    this.events.set(state.entityId, events);
    return this;
  }

  async getCalendar(entityId: string): Promise<CalendarState | null> {
    return this.calendars.get(entityId) ?? null;
  }

  async listEvents(args: { entityId: string; start: Date; end: Date }): Promise<CalendarEvent[]> {
    this.listCalls.push(args);
    const latency = this.latencyMs.get(args.entityId);
    if (latency !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, latency));
    }
    if (this.failWith) {
      throw this.failWith;
    }
    return this.events.get(args.entityId) ?? [];
  }
}

export function recycling(): CalendarEvent {
  return {
    summary: "Recycling",
    start: { kind: "date", date: "2024-06-01" },
    end: { kind: "date", date: "2024-06-02" }
  };
}
