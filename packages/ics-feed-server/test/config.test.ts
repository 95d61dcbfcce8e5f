import { fileURLToPath } from "node:url";
import { describe, expect, it } from "vitest";
import { loadConfig, resolveSettings, validateConfig, type Config } from "../src/config.js";

function validConfig(): Config {
  return {
    homeAssistant: { url: "http://homeassistant.local:8123/", token: "test-token" },
    calendars: [
      { entityId: "calendar.bins", secret: "test-secret", name: "Bins" },
      { entityId: "calendar.holidays", secret: "other-secret" }
    ],
    colors: [{ name: "Recycling", colour: "green" }]
  };
}

describe("validateConfig", () => {
  it("accepts valid baseline config", () => {
    expect(validateConfig(validConfig(), {})).toEqual([]);
  });

  it("accepts the sample config", () => {
    const config = loadConfig(fileURLToPath(new URL("../../../config/sample.config.json", import.meta.url)));
    expect(validateConfig(config, { HASS_TOKEN: "test-token" })).toEqual([]);
  });

  it("takes the token from HASS_TOKEN", () => {
    const config = validConfig();
    delete config.homeAssistant.token;

    expect(validateConfig(config, {})).toEqual(["homeAssistant.token is required (or set HASS_TOKEN)"]);
    expect(validateConfig(config, { HASS_TOKEN: "test-token" })).toEqual([]);
  });

  it("rejects a non-http Home Assistant url", () => {
    const config = validConfig();
    config.homeAssistant.url = "ftp://homeassistant.local";

    expect(validateConfig(config, {})).toEqual(["homeAssistant.url must be an http(s) URL"]);
  });

  it("rejects an empty calendar list", () => {
    const config = validConfig();
    config.calendars = [];

    expect(validateConfig(config, {})).toContain("config.calendars must be a non-empty array");
  });

  it("rejects duplicate and non-calendar entity ids", () => {
    const config = validConfig();
    config.calendars = [
      { entityId: "calendar.bins", secret: "a" },
      { entityId: "calendar.bins", secret: "b" },
      { entityId: "sensor.bins", secret: "c" }
    ];

    expect(validateConfig(config, {})).toEqual([
      "calendars[1].entityId must be unique: calendar.bins",
      "calendars[2].entityId must start with 'calendar.': sensor.bins"
    ]);
  });

  it("rejects empty secrets", () => {
    const config = validConfig();
    config.calendars = [{ entityId: "calendar.bins", secret: "" }];

    expect(validateConfig(config, {})).toEqual(["calendars[0].secret is required"]);
  });

  it("rejects colour rules without a name or with an unknown colour", () => {
    const config = validConfig();
    config.colors = [
      { name: "", colour: "green" },
      { name: "Recycling", colour: "greenish" }
    ];

    expect(validateConfig(config, {})).toEqual([
      "colors[0].name is required",
      "colors[1].colour must be a CSS colour name: greenish"
    ]);
  });

  it("rejects out-of-range window, port, base path and log level", () => {
    const config = validConfig();
    config.window = { lookbackDays: -1, lookaheadDays: 0 };
    config.server = { port: 70000, basePath: "api/ics" };
    config.logging = { level: "loud" };

    expect(validateConfig(config, {})).toEqual([
      "window.lookbackDays must be an integer >= 0",
      "window.lookaheadDays must be an integer >= 1",
      "server.port must be an integer between 1 and 65535",
      "server.basePath must start with '/' and not end with '/'",
      "logging.level must be one of fatal|error|warn|info|debug|trace|silent"
    ]);
  });
});

describe("resolveSettings", () => {
  it("fills in defaults", () => {
    const settings = resolveSettings(validConfig(), {});

    expect(settings.homeAssistant).toEqual({
      url: "http://homeassistant.local:8123",
      token: "test-token",
      timeoutMs: 10_000
    });
    expect(settings.server).toEqual({ host: "0.0.0.0", port: 8080, basePath: "/api/ics" });
    expect(settings.window).toEqual({ lookbackDays: 28, lookaheadDays: 364 });
    expect(settings.logLevel).toBe("info");
    expect(Object.isFrozen(settings)).toBe(true);
  });

  it("builds the secret store and colour table", () => {
    const settings = resolveSettings(validConfig(), {});

    expect(settings.secrets.authorize("calendar.bins", "test-secret")).toBe("granted");
    expect(settings.secrets.authorize("calendar.holidays", "test-secret")).toBe("denied");
    expect(settings.colors.colorFor("Recycling")).toBe("green");
    expect(settings.calendarNames.get("calendar.bins")).toBe("Bins");
    expect(settings.calendarNames.has("calendar.holidays")).toBe(false);
  });

  it("rejects an unknown LOG_LEVEL unless the config sets a level", () => {
    expect(validateConfig(validConfig(), { LOG_LEVEL: "verbose" })).toEqual([
      "LOG_LEVEL must be one of fatal|error|warn|info|debug|trace|silent: verbose"
    ]);
    const config = validConfig();
    config.logging = { level: "warn" };
    expect(resolveSettings(config, { LOG_LEVEL: "verbose" }).logLevel).toBe("warn");
  });

  it("reads LOG_LEVEL when the config sets no level", () => {
    expect(resolveSettings(validConfig(), { LOG_LEVEL: "debug" }).logLevel).toBe("debug");
  });

  it("throws with every validation error", () => {
    const config = validConfig();
    config.calendars = [];

    expect(() => resolveSettings(config, {})).toThrow("Config invalid:\nconfig.calendars must be a non-empty array");
  });
});
