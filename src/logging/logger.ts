// ---------------------------------------------------------------------------
// Pino structured JSON logger factory.
// ---------------------------------------------------------------------------

import pino from "pino";
import type { LoggingConfig } from "../core/types.js";

export type Logger = pino.Logger;

export const SERVICE_NAME = "oai-pmh-repository";

/** Credentials a harvester may send; never written to the log. */
const REDACTED_HEADERS: string[] = [
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",
];

/**
 * Create the root logger. Every line carries `service` and `env`, and
 * timestamps are UTC ISO 8601 so they line up with response datestamps.
 *
 * `destination` replaces stdout; it is ignored when pretty-printing, which
 * goes through the `pino-pretty` transport.
 */
export function createLogger(
  config: LoggingConfig,
  destination?: pino.DestinationStream,
): Logger {
  const options: pino.LoggerOptions = {
    level: config.level,
    base: { service: SERVICE_NAME, env: config.env },
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (config.redactSecrets) {
    options.redact = { paths: REDACTED_HEADERS, censor: "[REDACTED]" };
  }

  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, ignore: "pid,hostname,service,env" },
      },
    });
  }

  return destination ? pino(options, destination) : pino(options);
}
