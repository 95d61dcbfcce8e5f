#!/usr/bin/env node
import { serve } from "@hono/node-server";
import { Command } from "commander";
import { parseCalendar } from "@ics-feed/core";
import { createApp } from "./app.js";
import { loadConfig, loadSettings, validateConfig, type Settings } from "./config.js";
import { FeedHandler } from "./feed.js";
import { HomeAssistantClient } from "./homeAssistantClient.js";
import { createLogger, type Logger } from "./logger.js";

function createHandler(settings: Settings, logger: Logger): FeedHandler {
  const source = new HomeAssistantClient({
    url: settings.homeAssistant.url,
    token: settings.homeAssistant.token,
    timeoutMs: settings.homeAssistant.timeoutMs
  });
  return new FeedHandler({ settings, source, logger });
}

async function main(): Promise<void> {
  const program = new Command();
  program.name("ics-feed").description("iCalendar feeds for Home Assistant calendars");

  program.option("--config <path>", "path to JSON config file", "./config/sample.config.json");

  program
    .command("validate-config")
    .action(() => {
      const opts = program.opts<{ config: string }>();
      const config = loadConfig(opts.config);
      const errors = validateConfig(config);
      if (errors.length > 0) {
        for (const error of errors) {
          console.error(`ERROR: ${error}`);
        }
        process.exitCode = 1;
        return;
      }
      console.log("Config valid");
    });

  program
    .command("serve")
    .description("serve the configured calendars over HTTP")
    .action(() => {
      const opts = program.opts<{ config: string }>();
      const settings = loadSettings(opts.config);
      const logger = createLogger(settings.logLevel);
      const app = createApp({
        handler: createHandler(settings, logger),
        basePath: settings.server.basePath,
        logger
      });

      const server = serve({ fetch: app.fetch, hostname: settings.server.host, port: settings.server.port }, (info) => {
        logger.info(
          { port: info.port, basePath: settings.server.basePath, calendars: settings.secrets.entityIds() },
          "Server started"
        );
      });

      const shutdown = (signal: string) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => {
          logger.info("Server stopped");
        });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  program
    .command("render")
    .description("print one calendar's feed to stdout")
    .requiredOption("--calendar <entityId>", "calendar entity id, e.g. calendar.bins")
    .option("--check", "parse the rendered feed back and report its event count", false)
    .action(async (options: { calendar: string; check: boolean }) => {
      const opts = program.opts<{ config: string }>();
      const settings = loadSettings(opts.config);
      const logger = createLogger(settings.logLevel, process.stderr);
      const outcome = await createHandler(settings, logger).render(options.calendar);

      if (outcome.kind !== "success") {
        throw new Error(`${options.calendar}: ${outcome.kind}`);
      }
      if (options.check) {
        const parsed = parseCalendar(outcome.feed.body);
        console.log(`${options.calendar}: events=${parsed.events.length} name=${parsed.name ?? ""}`);
        return;
      }
      process.stdout.write(outcome.feed.body);
    });

  await program.parseAsync(process.argv);
}

main().catch((error) => {
  const message = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(message);
  process.exit(1);
});
