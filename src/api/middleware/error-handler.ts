// ---------------------------------------------------------------------------
// Hono error handler for faults outside the OAI-PMH protocol.
// ---------------------------------------------------------------------------

import type { Context } from "hono";
import type { AppEnv } from "../env.js";

/**
 * Hono `onError` handler. Protocol errors never reach it: they are answered
 * as OAI-PMH `<error>` documents with status 200. Anything that does arrive
 * here is a fault, logged and answered with 500.
 *
 * In production the message is replaced so internal details stay private.
 */
export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const isProduction = process.env["NODE_ENV"] === "production";

  const logger = c.get("logger");
  if (logger) {
    logger.error({ err }, "unhandled error");
  }

  const message = isProduction ? "Internal server error" : err.message;
  return c.json({ error: message, type: "internal_error" }, 500);
}
