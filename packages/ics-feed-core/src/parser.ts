import { IcsParseError } from "./errors.js";
import type { ParsedCalendar, ParsedEvent } from "./types.js";

export function unfoldLines(text: string): string {
  return text.replace(/\r\n|\r/g, "\n").replace(/\n[ \t]/g, "");
}

export function unescapeText(text: string): string {
  return text.replace(/\\([\\;,nN])/g, (_, escaped: string) => (escaped === "n" || escaped === "N" ? "\n" : escaped));
}

export type PropertyLine = {
  name: string;
  params: Record<string, string>;
  value: string;
};

// Quoted parameter values may contain colons.
export function parsePropertyLine(line: string): PropertyLine | null {
  let colonIndex = -1;
  let inQuote = false;
  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (char === '"') {
      inQuote = !inQuote;
    } else if (char === ":" && !inQuote) {
      colonIndex = i;
      break;
    }
  }
  if (colonIndex <= 0) {
    return null;
  }

  const [name = "", ...rawParams] = line.slice(0, colonIndex).split(";");
  const params: Record<string, string> = {};
  for (const param of rawParams) {
    const eq = param.indexOf("=");
    if (eq === -1) {
      continue;
    }
    params[param.slice(0, eq).toUpperCase()] = param.slice(eq + 1).replace(/^"|"$/g, "");
  }

  return { name: name.toUpperCase(), params, value: line.slice(colonIndex + 1) };
}

function applyEventProperty(event: ParsedEvent, property: PropertyLine): void {
  switch (property.name) {
    case "UID":
      event.uid = unescapeText(property.value);
      return;
    case "SUMMARY":
      event.summary = unescapeText(property.value);
      return;
    case "DESCRIPTION":
      event.description = unescapeText(property.value);
      return;
    case "LOCATION":
      event.location = unescapeText(property.value);
      return;
    case "COLOR":
      event.color = property.value;
      return;
    case "DTSTART":
      event.start = property.value;
      event.allDay = property.params.VALUE === "DATE";
      return;
    case "DTEND":
      event.end = property.value;
      return;
  }
}

/** Reads calendar properties and top-level VEVENTs; other components are skipped. */
export function parseCalendar(text: string): ParsedCalendar {
  const lines = unfoldLines(text).split("\n");
  const stack: string[] = [];
  const properties: Record<string, string> = {};
  const events: ParsedEvent[] = [];
  let current: ParsedEvent | null = null;
  let sawCalendar = false;

  for (const [index, line] of lines.entries()) {
    if (line.length === 0) {
      continue;
    }
    const property = parsePropertyLine(line);
    if (!property) {
      throw new IcsParseError(`malformed content line "${line}"`, index + 1);
    }

    if (property.name === "BEGIN") {
      const component = property.value.toUpperCase();
      if (stack.length === 0 && component !== "VCALENDAR") {
        throw new IcsParseError(`expected BEGIN:VCALENDAR, got BEGIN:${component}`, index + 1);
      }
      if (component === "VCALENDAR") {
        sawCalendar = true;
      }
      if (component === "VEVENT" && stack.length === 1) {
        current = { allDay: false };
      }
      stack.push(component);
      continue;
    }

    if (property.name === "END") {
      const component = property.value.toUpperCase();
      const open = stack.pop();
      if (open !== component) {
        throw new IcsParseError(`END:${component} does not close ${open ?? "anything"}`, index + 1);
      }
      if (component === "VEVENT" && stack.length === 1 && current) {
        events.push(current);
        current = null;
      }
      continue;
    }

    if (stack.length === 1) {
      properties[property.name] = property.value;
    } else if (stack.length === 2 && current) {
      applyEventProperty(current, property);
    }
  }

  if (!sawCalendar) {
    throw new IcsParseError("no VCALENDAR component");
  }
  if (stack.length > 0) {
    throw new IcsParseError(`unterminated ${stack.join(" > ")}`);
  }

  const rawName = properties["X-WR-CALNAME"] ?? properties.NAME;
  return {
    name: rawName === undefined ? undefined : unescapeText(rawName),
    properties,
    events
  };
}
