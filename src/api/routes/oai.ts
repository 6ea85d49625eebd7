// ---------------------------------------------------------------------------
// OAI-PMH endpoint.
// ---------------------------------------------------------------------------

import { Hono } from "hono";
import type { Context } from "hono";
import type { OaiService } from "../../protocol/oai-service.js";
import type { AppEnv } from "../env.js";

export interface OaiRouteDeps {
  oaiService: OaiService;
}

const XML_CONTENT_TYPE = "text/xml; charset=UTF-8";

/**
 * Mounts the protocol endpoint:
 *
 * - `GET /`  -- arguments in the query string.
 * - `POST /` -- arguments as an `application/x-www-form-urlencoded` body.
 *
 * Protocol errors are part of a normal response, so both answer 200.
 */
export function oaiRoutes(deps: OaiRouteDeps): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  const answer = (c: Context<AppEnv>, rawQuery: string): Response => {
    const { xml } = deps.oaiService.handle(rawQuery, c.get("logger"));
    return c.body(xml, 200, { "Content-Type": XML_CONTENT_TYPE });
  };

  app.get("/", (c) => {
    const search = new URL(c.req.url).search;
    return answer(c, search.startsWith("?") ? search.slice(1) : search);
  });

  app.post("/", async (c) => {
    const contentType = c.req.header("content-type") ?? "";
    const body = contentType.startsWith("application/x-www-form-urlencoded")
      ? await c.req.text()
      : "";
    return answer(c, body);
  });

  return app;
}
