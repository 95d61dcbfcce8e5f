import type { CalendarEvent, EventTime } from "@ics-feed/core";
import type { CalendarSource, CalendarState } from "./feed.js";

export class HomeAssistantError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HomeAssistantError";
  }
}

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type HomeAssistantClientOptions = {
  url: string;
  token: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function toEventTime(value: unknown, field: string): EventTime {
  if (typeof value !== "string" || value.length === 0) {
    throw new HomeAssistantError(`Malformed event: ${field} is missing`);
  }
  return DATE_ONLY.test(value) ? { kind: "date", date: value } : { kind: "dateTime", dateTime: value };
}

/** Maps one event of a calendar.get_events response. */
export function toCalendarEvent(raw: unknown): CalendarEvent {
  if (!isRecord(raw)) {
    throw new HomeAssistantError("Malformed event: not an object");
  }

  const event: CalendarEvent = {
    summary: typeof raw.summary === "string" ? raw.summary : "",
    start: toEventTime(raw.start, "start"),
    end: toEventTime(raw.end, "end")
  };

  const description = optionalText(raw.description);
  if (description !== undefined) {
    event.description = description;
  }
  const location = optionalText(raw.location);
  if (location !== undefined) {
    event.location = location;
  }
  const uid = optionalText(raw.uid);
  if (uid !== undefined) {
    event.uid = uid;
  }
  const recurrenceId = optionalText(raw.recurrence_id);
  if (recurrenceId !== undefined) {
    event.recurrenceId = recurrenceId;
  }

  return event;
}

/** Calendar entities and their events over the Home Assistant REST API. */
export class HomeAssistantClient implements CalendarSource {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: HomeAssistantClientOptions) {
    this.baseUrl = options.url.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  private async request(path: string, init: { method: "GET" | "POST"; body?: unknown }): Promise<Response> {
    const url = `${this.baseUrl}${path}`;
    try {
      return await this.fetchImpl(url, {
        method: init.method,
        headers: {
          Authorization: `Bearer ${this.options.token}`,
          "Content-Type": "application/json"
        },
        body: init.body === undefined ? undefined : JSON.stringify(init.body),
        signal: AbortSignal.timeout(this.options.timeoutMs ?? 10_000)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new HomeAssistantError(`${init.method} ${path} failed: ${message}`, undefined, { cause: error });
    }
  }

  private async json(response: Response, path: string): Promise<unknown> {
    if (!response.ok) {
      throw new HomeAssistantError(`${path} returned HTTP ${response.status}`, response.status);
    }
    try {
      return await response.json();
    } catch (error) {
      throw new HomeAssistantError(`${path} returned invalid JSON`, response.status, { cause: error });
    }
  }

  async getCalendar(entityId: string): Promise<CalendarState | null> {
    const path = `/api/states/${encodeURIComponent(entityId)}`;
    const response = await this.request(path, { method: "GET" });
    if (response.status === 404) {
      return null;
    }

    const body = await this.json(response, path);
    if (!isRecord(body) || typeof body.state !== "string") {
      throw new HomeAssistantError(`${path} returned an unexpected payload`);
    }

    const attributes = isRecord(body.attributes) ? body.attributes : {};
    const state: CalendarState = { entityId, state: body.state };
    const friendlyName = optionalText(attributes.friendly_name);
    if (friendlyName !== undefined) {
      state.friendlyName = friendlyName;
    }
    return state;
  }

  async listEvents(args: { entityId: string; start: Date; end: Date }): Promise<CalendarEvent[]> {
    const path = "/api/services/calendar/get_events?return_response";
    const response = await this.request(path, {
      method: "POST",
      body: {
        entity_id: args.entityId,
        start_date_time: args.start.toISOString(),
        end_date_time: args.end.toISOString()
      }
    });

    const body = await this.json(response, path);
    const serviceResponse = isRecord(body) ? body.service_response : undefined;
    const entry = isRecord(serviceResponse) ? serviceResponse[args.entityId] : undefined;
    if (!isRecord(entry) || !Array.isArray(entry.events)) {
      throw new HomeAssistantError(`No events returned for ${args.entityId}`);
    }

    return entry.events.map((raw) => toCalendarEvent(raw));
  }
}
