export type EventTime =
  | { kind: "date"; date: string }
  | { kind: "dateTime"; dateTime: string; timeZone?: string };

export type CalendarEvent = {
  summary: string;
  start: EventTime;
  end: EventTime;
  description?: string;
  location?: string;
  uid?: string;
  recurrenceId?: string;
};

export type ColorRule = {
  name: string;
  colour: string;
};

export type SecretBinding = {
  entityId: string;
  secret: string;
};

export type Authorization = "granted" | "denied";

export const ICS_CONTENT_TYPE = "text/calendar; charset=utf-8";

export type EncodedFeed = {
  body: string;
  contentType: typeof ICS_CONTENT_TYPE;
};

export type ParsedEvent = {
  uid?: string;
  summary?: string;
  description?: string;
  location?: string;
  color?: string;
  allDay: boolean;
  start?: string;
  end?: string;
};

export type ParsedCalendar = {
  name?: string;
  properties: Record<string, string>;
  events: ParsedEvent[];
};
