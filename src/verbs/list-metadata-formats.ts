import { ProtocolError } from "../core/errors.js";
import { OaiErrorCode, OaiVerb } from "../core/types.js";
import type { RequestDTO, VerbBody } from "../core/types.js";
import { idDoesNotExist } from "./protocol-errors.js";
import type { RepositoryContext, VerbHandler } from "./verb-handler.js";

/**
 * Every registered format. With an identifier the record must exist; all
 * formats are then offered for it, deleted or not.
 */
export class ListMetadataFormatsHandler implements VerbHandler {
  readonly verb = OaiVerb.LIST_METADATA_FORMATS;

  constructor(private readonly ctx: RepositoryContext) {}

  handle(request: RequestDTO): VerbBody {
    if (request.identifier !== null && !this.ctx.store.findRecord(request.identifier)) {
      throw idDoesNotExist(request.identifier);
    }

    const formats = this.ctx.formats.list();
    if (formats.length === 0) {
      throw new ProtocolError(
        OaiErrorCode.NO_METADATA_FORMATS,
        "There are no metadata formats available",
      );
    }

    return {
      element: this.verb,
      content: {
        metadataFormat: formats.map(({ format }) => ({
          metadataPrefix: format.metadataPrefix.value,
          schema: format.schema.value,
          metadataNamespace: format.metadataNamespace.value,
        })),
      },
    };
  }
}
