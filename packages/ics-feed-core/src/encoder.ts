import { Buffer } from "node:buffer";
import { createHash } from "node:crypto";
import { Store } from "@tanstack/store";
import { DateTime } from "luxon";
import { EncodingError } from "./errors.js";
import { ICS_CONTENT_TYPE, type CalendarEvent, type EncodedFeed, type EventTime } from "./types.js";

export const CRLF = "\r\n";
export const PRODID = "-//ics-feed//Calendar Feed//EN";

const MAX_LINE_OCTETS = 75;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// Backslash first, so later escapes are not doubled.
export function escapeText(text: string): string {
  return text
    .replace(/\\/g, "\\\\")
    .replace(/;/g, "\\;")
    .replace(/,/g, "\\,")
    .replace(/\r\n|\r|\n/g, "\\n");
}

// Continuation lines start with a space, which counts towards their 75 octets.
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, "utf8") <= MAX_LINE_OCTETS) {
    return line;
  }

  const parts: string[] = [];
  let current = "";
  let octets = 0;
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const size = Buffer.byteLength(char, "utf8");
    if (octets + size > limit) {
      parts.push(current);
      current = "";
      octets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    octets += size;
  }
  parts.push(current);

  return parts.join(`${CRLF} `);
}

export function isAllDay(event: CalendarEvent): boolean {
  return event.start.kind === "date";
}

type Bounds = {
  kind: EventTime["kind"];
  start: DateTime;
  end: DateTime;
};

function parseDate(value: string, index: number): DateTime {
  const parsed = DATE_PATTERN.test(value) ? DateTime.fromISO(value, { zone: "UTC" }) : null;
  if (!parsed?.isValid) {
    throw new EncodingError(`invalid date "${value}"`, index);
  }
  return parsed;
}

function parseDateTime(value: string, timeZone: string | undefined, index: number): DateTime {
  // An explicit offset in the value wins over the zone, which only places local times.
  const parsed = DateTime.fromISO(value, { zone: timeZone ?? "UTC" });
  if (!parsed.isValid) {
    throw new EncodingError(`invalid date-time "${value}" (${parsed.invalidExplanation ?? parsed.invalidReason})`, index);
  }
  return parsed.toUTC();
}

function resolveTime(time: EventTime, index: number): DateTime {
  switch (time.kind) {
    case "date":
      return parseDate(time.date, index);
    case "dateTime":
      return parseDateTime(time.dateTime, time.timeZone, index);
  }
}

function resolveBounds(event: CalendarEvent, index: number): Bounds {
  if (event.start.kind !== event.end.kind) {
    throw new EncodingError(`start is a ${event.start.kind} but end is a ${event.end.kind}`, index);
  }

  const start = resolveTime(event.start, index);
  const end = resolveTime(event.end, index);
  if (end.toMillis() < start.toMillis()) {
    throw new EncodingError(`end ${end.toISO() ?? ""} precedes start ${start.toISO() ?? ""}`, index);
  }

  return { kind: event.start.kind, start, end };
}

function formatDate(value: DateTime): string {
  return value.toFormat("yyyyLLdd");
}

function formatUtc(value: DateTime): string {
  return value.toUTC().toFormat("yyyyLLdd'T'HHmmss'Z'");
}

function boundLines(bounds: Bounds): [string, string] {
  switch (bounds.kind) {
    case "date":
      return [`DTSTART;VALUE=DATE:${formatDate(bounds.start)}`, `DTEND;VALUE=DATE:${formatDate(bounds.end)}`];
    case "dateTime":
      return [`DTSTART:${formatUtc(bounds.start)}`, `DTEND:${formatUtc(bounds.end)}`];
  }
}

export function summaryHash(summary: string): string {
  return createHash("sha256").update(summary, "utf8").digest("hex").slice(0, 16);
}

function eventIdentity(entityId: string, event: CalendarEvent, bounds: Bounds): string {
  const startStamp = bounds.kind === "date" ? formatDate(bounds.start) : formatUtc(bounds.start);
  const base = event.uid ? `${entityId}-${event.uid}` : `${entityId}-${startStamp}-${summaryHash(event.summary)}`;
  return event.recurrenceId ? `${base}-${event.recurrenceId}` : base;
}

type UidRegistry = {
  used: Set<string>;
  // Next suffix to try per base.
  nextSuffix: Map<string, number>;
};

function claimUid(base: string, registry: UidRegistry): string {
  let uid = base;
  if (registry.used.has(base)) {
    let suffix = registry.nextSuffix.get(base) ?? 2;
    while (registry.used.has(`${base}-${suffix}`)) {
      suffix += 1;
    }
    registry.nextSuffix.set(base, suffix + 1);
    uid = `${base}-${suffix}`;
  }
  registry.used.add(uid);
  return uid;
}

export type EncodeOptions = {
  calendarName: string;
  // Prefixes every UID.
  entityId: string;
  events: readonly CalendarEvent[];
  colorFor?: (summary: string) => string | undefined;
  generatedAt?: Date;
};

type EncodeState = {
  blocks: string[];
};

function buildVEvent(event: CalendarEvent, bounds: Bounds, uid: string, dtstamp: string, color: string | undefined): string {
  const lines: string[] = ["BEGIN:VEVENT", `UID:${escapeText(uid)}`, `DTSTAMP:${dtstamp}`, ...boundLines(bounds)];

  lines.push(`SUMMARY:${escapeText(event.summary)}`);
  if (event.description !== undefined) {
    lines.push(`DESCRIPTION:${escapeText(event.description)}`);
  }
  if (event.location !== undefined) {
    lines.push(`LOCATION:${escapeText(event.location)}`);
  }
  if (color) {
    lines.push(`COLOR:${color}`);
  }
  lines.push("END:VEVENT");

  return lines.map(foldLine).join(CRLF);
}

/** Recurring series must arrive expanded. Throws EncodingError on malformed bounds. */
export function encodeCalendar(options: EncodeOptions): string {
  const dtstamp = formatUtc(DateTime.fromJSDate(options.generatedAt ?? new Date()));
  const name = escapeText(options.calendarName);

  const blocks: string[] = [];
  const registry: UidRegistry = { used: new Set(), nextSuffix: new Map() };

  for (const [index, event] of options.events.entries()) {
    const bounds = resolveBounds(event, index);
    const uid = claimUid(eventIdentity(options.entityId, event, bounds), registry);
    blocks.push(buildVEvent(event, bounds, uid, dtstamp, options.colorFor?.(event.summary)));
  }

  const state = new Store<EncodeState>({ blocks: [] });
  state.setState(() => ({ blocks }));

  const parts = [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    `PRODID:${PRODID}`,
    "CALSCALE:GREGORIAN",
    "METHOD:PUBLISH",
    foldLine(`X-WR-CALNAME:${name}`),
    foldLine(`NAME:${name}`),
    ...state.state.blocks,
    "END:VCALENDAR"
  ];

  return parts.join(CRLF) + CRLF;
}

export function encodeFeed(options: EncodeOptions): EncodedFeed {
  return { body: encodeCalendar(options), contentType: ICS_CONTENT_TYPE };
}
