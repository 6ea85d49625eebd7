// ---------------------------------------------------------------------------
// Request ID middleware for Hono.
// ---------------------------------------------------------------------------

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../env.js";

/** Client-supplied IDs are reused only when they are short and plain. */
const SAFE_REQUEST_ID_RE = /^[a-zA-Z0-9_-]{1,128}$/;

/**
 * Returns a Hono middleware that stores a request ID on the context as
 * `"requestId"` and echoes it in the `X-Request-ID` response header.
 *
 * An incoming `X-Request-ID` is reused when it matches
 * {@link SAFE_REQUEST_ID_RE}; otherwise a UUID is generated.
 */
export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const existing = c.req.header("x-request-id");
    const requestId =
      existing && SAFE_REQUEST_ID_RE.test(existing)
        ? existing
        : crypto.randomUUID();

    c.set("requestId", requestId);
    c.header("X-Request-ID", requestId);

    await next();
  };
}
