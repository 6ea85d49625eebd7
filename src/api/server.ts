// ---------------------------------------------------------------------------
// Hono application factory.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Logger } from "../logging/logger.js";
import type { OaiService } from "../protocol/oai-service.js";
import type { AppEnv } from "./env.js";

import { requestIdMiddleware } from "./middleware/request-id.js";
import { createRequestLogger } from "../logging/context.js";
import { errorHandler } from "./middleware/error-handler.js";

import { oaiRoutes } from "./routes/oai.js";
import { healthRoutes } from "./routes/health.js";

// ── Dependency bundle ──────────────────────────────────────────────────────

export interface AppDependencies {
  oaiService: OaiService;
  logger: Logger;
}

// ── App factory ────────────────────────────────────────────────────────────

/**
 * Create and configure the Hono application.
 *
 * Middleware stack (applied in order):
 * 1. Request ID generation (`X-Request-ID`).
 * 2. Request-scoped child logger attached to context.
 * 3. Route handlers.
 * 4. Global error handler.
 */
export function createApp(deps: AppDependencies): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.use("*", requestIdMiddleware());
  app.use("*", createRequestLogger(deps.logger));

  app.route("/oai", oaiRoutes({ oaiService: deps.oaiService }));
  app.route("/health", healthRoutes());

  app.onError(errorHandler);

  return app;
}
