import { readFileSync } from "node:fs";
import { ColorRuleTable, SecretStore, isNamedColor, type ColorRule } from "@ics-feed/core";

export type Config = {
  homeAssistant: {
    url: string;
    /** Long-lived access token. Falls back to HASS_TOKEN. */
    token?: string;
    timeoutSeconds?: number;
  };
  server?: {
    host?: string;
    port?: number;
    basePath?: string;
  };
  window?: {
    lookbackDays?: number;
    lookaheadDays?: number;
  };
  calendars: CalendarConfig[];
  colors?: ColorRule[];
  logging?: {
    level?: string;
  };
};

export type CalendarConfig = {
  entityId: string;
  secret: string;
  name?: string;
};

export type Settings = Readonly<{
  homeAssistant: Readonly<{ url: string; token: string; timeoutMs: number }>;
  server: Readonly<{ host: string; port: number; basePath: string }>;
  window: Readonly<{ lookbackDays: number; lookaheadDays: number }>;
  calendarNames: ReadonlyMap<string, string>;
  secrets: SecretStore;
  colors: ColorRuleTable;
  logLevel: string;
}>;

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export const DEFAULTS = {
  host: "0.0.0.0",
  port: 8080,
  basePath: "/api/ics",
  // 4 weeks back, 52 weeks ahead
  lookbackDays: 28,
  lookaheadDays: 364,
  timeoutSeconds: 10,
  logLevel: "info"
} as const;

export function loadConfig(path: string): Config {
  const raw = readFileSync(path, "utf8");
  return JSON.parse(raw) as Config;
}

function isHttpUrl(value: unknown): boolean {
  if (typeof value !== "string") {
    return false;
  }
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

function isWholeNumber(value: unknown, min: number): boolean {
  return typeof value === "number" && Number.isInteger(value) && value >= min;
}

export function validateConfig(config: Config, env: Env = process.env): string[] {
  const errors: string[] = [];

  if (!config.homeAssistant || !isHttpUrl(config.homeAssistant.url)) {
    errors.push("homeAssistant.url must be an http(s) URL");
  }
  if (!config.homeAssistant?.token && !env.HASS_TOKEN) {
    errors.push("homeAssistant.token is required (or set HASS_TOKEN)");
  }
  const timeout = config.homeAssistant?.timeoutSeconds;
  if (timeout !== undefined && !isWholeNumber(timeout, 1)) {
    errors.push("homeAssistant.timeoutSeconds must be an integer >= 1");
  }

  if (!Array.isArray(config.calendars) || config.calendars.length === 0) {
    errors.push("config.calendars must be a non-empty array");
  } else {
    const entityIds = new Set<string>();
    for (const [index, calendar] of config.calendars.entries()) {
      if (!calendar.entityId) {
        errors.push(`calendars[${index}].entityId is required`);
      } else if (!calendar.entityId.startsWith("calendar.")) {
        errors.push(`calendars[${index}].entityId must start with 'calendar.': ${calendar.entityId}`);
      } else if (entityIds.has(calendar.entityId)) {
        errors.push(`calendars[${index}].entityId must be unique: ${calendar.entityId}`);
      } else {
        entityIds.add(calendar.entityId);
      }

      if (typeof calendar.secret !== "string" || calendar.secret.length === 0) {
        errors.push(`calendars[${index}].secret is required`);
      }
    }
  }

  if (config.colors !== undefined && !Array.isArray(config.colors)) {
    errors.push("config.colors must be an array");
  }
  for (const [index, rule] of (Array.isArray(config.colors) ? config.colors : []).entries()) {
    if (!rule.name) {
      errors.push(`colors[${index}].name is required`);
    }
    if (typeof rule.colour !== "string" || !isNamedColor(rule.colour)) {
      errors.push(`colors[${index}].colour must be a CSS colour name: ${String(rule.colour)}`);
    }
  }

  const lookback = config.window?.lookbackDays;
  if (lookback !== undefined && !isWholeNumber(lookback, 0)) {
    errors.push("window.lookbackDays must be an integer >= 0");
  }
  const lookahead = config.window?.lookaheadDays;
  if (lookahead !== undefined && !isWholeNumber(lookahead, 1)) {
    errors.push("window.lookaheadDays must be an integer >= 1");
  }

  const port = config.server?.port;
  if (port !== undefined && (!isWholeNumber(port, 1) || port > 65535)) {
    errors.push("server.port must be an integer between 1 and 65535");
  }
  const basePath = config.server?.basePath;
  if (basePath !== undefined && (!basePath.startsWith("/") || basePath.endsWith("/"))) {
    errors.push("server.basePath must start with '/' and not end with '/'");
  }

  const level = config.logging?.level;
  if (level !== undefined && !LOG_LEVELS.includes(level)) {
    errors.push(`logging.level must be one of ${LOG_LEVELS.join("|")}`);
  } else if (level === undefined && env.LOG_LEVEL !== undefined && !LOG_LEVELS.includes(env.LOG_LEVEL)) {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join("|")}: ${env.LOG_LEVEL}`);
  }

  return errors;
}

/** Freezes a validated config into the settings shared by every request. */
export function resolveSettings(config: Config, env: Env = process.env): Settings {
  const errors = validateConfig(config, env);
  if (errors.length > 0) {
    throw new Error(`Config invalid:\n${errors.join("\n")}`);
  }

  const calendarNames = new Map<string, string>();
  for (const calendar of config.calendars) {
    if (calendar.name) {
      calendarNames.set(calendar.entityId, calendar.name);
    }
  }

  return Object.freeze({
    homeAssistant: Object.freeze({
      url: config.homeAssistant.url.replace(/\/+$/, ""),
      token: config.homeAssistant.token ?? env.HASS_TOKEN ?? "",
      timeoutMs: (config.homeAssistant.timeoutSeconds ?? DEFAULTS.timeoutSeconds) * 1000
    }),
    server: Object.freeze({
      host: config.server?.host ?? DEFAULTS.host,
      port: config.server?.port ?? DEFAULTS.port,
      basePath: config.server?.basePath ?? DEFAULTS.basePath
    }),
    window: Object.freeze({
      lookbackDays: config.window?.lookbackDays ?? DEFAULTS.lookbackDays,
      lookaheadDays: config.window?.lookaheadDays ?? DEFAULTS.lookaheadDays
    }),
    calendarNames,
    secrets: new SecretStore(config.calendars.map(({ entityId, secret }) => ({ entityId, secret }))),
    colors: new ColorRuleTable(config.colors ?? []),
    logLevel: config.logging?.level ?? env.LOG_LEVEL ?? DEFAULTS.logLevel
  });
}

export function loadSettings(path: string, env: Env = process.env): Settings {
  return resolveSettings(loadConfig(path), env);
}
