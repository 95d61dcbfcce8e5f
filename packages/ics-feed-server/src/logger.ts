import pino, { type DestinationStream, type Logger } from "pino";

export type { Logger } from "pino";

export function createLogger(level: string = process.env.LOG_LEVEL || "info", destination?: DestinationStream): Logger {
  const options = {
    level,
    timestamp: pino.stdTimeFunctions.isoTime,
    // drop pid and hostname
    base: {
      "service.name": process.env.SERVICE_NAME || "ics-feed"
    }
  };
  return destination ? pino(options, destination) : pino(options);
}
