// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { DestinationStream, Logger, LoggerOptions } from "pino";
import type { LoggingConfig } from "../core/types.js";

export type { Logger };

/** Member contact details kept out of log output. */
const PERSONAL_DATA_PATHS: string[] = ["email", "*.email"];

/** File descriptor 2: the CLI prints its tables on stdout. */
const STDERR = 2;

/**
 * Create a configured pino logger instance.
 *
 * - JSON output on stderr (pino default format)
 * - Base fields: `service` and `version`
 * - Optional redaction of member e-mail addresses
 * - Optional pretty-print via `pino-pretty` transport for development
 *
 * Pass `destination` to capture output elsewhere; it takes precedence over
 * `prettyPrint`.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: DestinationStream,
): Logger {
  const baseOptions: LoggerOptions = {
    level: config.level,
    base: {
      service: "lending-desk",
      version: process.env["APP_VERSION"] ?? "dev",
    },
    ...(config.redactPersonalData
      ? {
          redact: {
            paths: PERSONAL_DATA_PATHS,
            censor: "[REDACTED]",
          },
        }
      : {}),
  };

  if (destination) {
    return pino(baseOptions, destination);
  }

  if (config.prettyPrint) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          destination: STDERR,
        },
      },
    });
  }

  return pino(baseOptions, pino.destination(STDERR));
}
