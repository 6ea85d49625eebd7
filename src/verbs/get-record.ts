import { OaiVerb } from "../core/types.js";
import type { RequestDTO, VerbBody } from "../core/types.js";
import { cannotDisseminateFormat, idDoesNotExist } from "./protocol-errors.js";
import { recordNode } from "./record-xml.js";
import type { RepositoryContext, VerbHandler } from "./verb-handler.js";

export class GetRecordHandler implements VerbHandler {
  readonly verb = OaiVerb.GET_RECORD;

  constructor(private readonly ctx: RepositoryContext) {}

  handle(request: RequestDTO): VerbBody {
    const prefix = request.metadataPrefix ?? "";
    const identifier = request.identifier ?? "";

    const plugin = this.ctx.formats.get(prefix);
    if (!plugin) throw cannotDisseminateFormat(prefix);

    const record = this.ctx.store.findRecord(identifier);
    if (!record) throw idDoesNotExist(identifier);

    return { element: this.verb, content: { record: recordNode(record, plugin) } };
  }
}
