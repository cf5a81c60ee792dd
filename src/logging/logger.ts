// ---------------------------------------------------------------------------
// Logger factory. One JSON line per intake event; pino-pretty when a person
// is watching the terminal.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

const SERVICE = "shelf-intake";

/**
 * Create the application logger.
 *
 * Lines carry `service` and `version`, an ISO timestamp and the level as a
 * label (`"level":"warn"`) so intake logs read the same with or without the
 * pretty printer. `destination` replaces stdout; it is ignored when
 * `prettyPrint` is on, since pino-pretty owns the output then.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: {
      service: SERVICE,
      version: process.env["SHELF_INTAKE_VERSION"] ?? "dev",
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:HH:MM:ss",
          ignore: "pid,hostname,service,version",
        },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}

/** Discards everything; the default for callers that pass no logger. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
