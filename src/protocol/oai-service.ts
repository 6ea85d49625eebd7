// ---------------------------------------------------------------------------
// One OAI-PMH exchange: raw query in, XML document out.
// ---------------------------------------------------------------------------

import type { Logger } from "../logging/logger.js";
import { ProtocolError } from "../core/errors.js";
import type { ErrorReport, OaiErrorCode, RequestDTO } from "../core/types.js";
import type { RepositoryIdentity } from "../domain/identity/repository-identity.js";
import type { RequestHandler } from "../verbs/request-handler.js";
import { singleErrorReport } from "./error-accumulator.js";
import { ParsedQuery } from "./parsed-query.js";
import { RequestValidator } from "./request-validator.js";
import { renderErrors, renderResponse } from "./response-renderer.js";
import type { RenderContext } from "./response-renderer.js";

export interface OaiResponse {
  readonly xml: string;
  /** The validated request, or `null` when the query was rejected. */
  readonly request: RequestDTO | null;
  /** Codes of every protocol error in the response; empty on success. */
  readonly errorCodes: readonly OaiErrorCode[];
}

export interface OaiServiceDeps {
  identity: RepositoryIdentity;
  handler: RequestHandler;
  logger: Logger;
  /** Source of responseDate. */
  clock?: () => Date;
}

export class OaiService {
  private readonly validator = new RequestValidator();
  private readonly clock: () => Date;

  constructor(private readonly deps: OaiServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Answer one request. Protocol errors become `<error>` elements; anything
   * else is a fault and propagates.
   */
  handle(rawQuery: string, logger: Logger = this.deps.logger): OaiResponse {
    const ctx: RenderContext = {
      baseURL: this.deps.identity.baseURL.value,
      responseDate: this.clock(),
    };

    let request: RequestDTO | null = null;
    try {
      const validation = this.validator.validate(new ParsedQuery(rawQuery));
      if (!validation.ok) {
        return this.reject(ctx, null, validation.report, logger);
      }
      request = validation.request;
      logger.debug({ verb: request.verb }, "request validated");

      const result = this.deps.handler.handle(request);
      if (!result.ok) {
        return this.reject(ctx, request, result.report, logger);
      }

      logger.info({ verb: request.verb, outcome: "ok" }, "OAI-PMH request answered");
      return { xml: renderResponse(ctx, request, result.body), request, errorCodes: [] };
    } catch (err) {
      if (!(err instanceof ProtocolError)) throw err;
      return this.reject(ctx, request, singleErrorReport(err.code, err.message), logger);
    }
  }

  private reject(
    ctx: RenderContext,
    request: RequestDTO | null,
    report: ErrorReport,
    logger: Logger,
  ): OaiResponse {
    const errorCodes = report.entries.map((entry) => entry.code);
    logger.info(
      { verb: request?.verb ?? null, outcome: "rejected", errorCodes },
      "OAI-PMH request rejected",
    );
    return { xml: renderErrors(ctx, request, report), request, errorCodes };
  }
}
