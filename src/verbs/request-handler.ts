import type { ErrorReport, OaiVerb, RequestDTO, VerbBody } from "../core/types.js";
import { checkArguments } from "./argument-rules.js";
import { GetRecordHandler } from "./get-record.js";
import { IdentifyHandler } from "./identify.js";
import { ListMetadataFormatsHandler } from "./list-metadata-formats.js";
import { ListIdentifiersHandler, ListRecordsHandler } from "./list-records.js";
import { ListSetsHandler } from "./list-sets.js";
import type { RepositoryContext, VerbHandler } from "./verb-handler.js";

export type HandlerResult =
  | { readonly ok: true; readonly body: VerbBody }
  | { readonly ok: false; readonly report: ErrorReport };

/**
 * Dispatches a validated request to its verb handler once the verb's
 * argument rules pass. Handler failures surface as `ProtocolError`.
 */
export class RequestHandler {
  private readonly handlers: ReadonlyMap<OaiVerb, VerbHandler>;

  constructor(private readonly ctx: RepositoryContext) {
    const handlers: VerbHandler[] = [
      new IdentifyHandler(ctx),
      new ListMetadataFormatsHandler(ctx),
      new ListSetsHandler(ctx),
      new GetRecordHandler(ctx),
      new ListIdentifiersHandler(ctx),
      new ListRecordsHandler(ctx),
    ];
    this.handlers = new Map(handlers.map((h) => [h.verb, h]));
  }

  handle(request: RequestDTO): HandlerResult {
    const report = checkArguments(request, this.ctx.identity.granularity);
    if (report.entries.length > 0) return { ok: false, report };

    const handler = this.handlers.get(request.verb);
    if (!handler) {
      throw new Error(`no handler registered for verb ${request.verb}`);
    }
    return { ok: true, body: handler.handle(request) };
  }
}
