// ---------------------------------------------------------------------------
// ListIdentifiers and ListRecords: selective harvesting by date and set.
// ---------------------------------------------------------------------------

import { ProtocolError } from "../core/errors.js";
import { OaiErrorCode, OaiVerb } from "../core/types.js";
import type { RequestDTO, VerbBody } from "../core/types.js";
import type { OaiRecord } from "../domain/entities/oai-record.js";
import { SetSpec } from "../domain/value-objects/set-spec.js";
import { UTCdatetime } from "../domain/value-objects/utc-datetime.js";
import type { MetadataFormatPlugin } from "../formats/metadata-format-plugin.js";
import type { RecordFilter } from "../store/record-store.js";
import { badResumptionToken, cannotDisseminateFormat, noSetHierarchy } from "./protocol-errors.js";
import { headerNode, recordNode } from "./record-xml.js";
import type { RepositoryContext, VerbHandler } from "./verb-handler.js";

/**
 * Shared harvesting flow. Every match is returned in one response; no
 * resumption token is ever issued.
 */
abstract class HarvestHandler implements VerbHandler {
  abstract readonly verb: typeof OaiVerb.LIST_IDENTIFIERS | typeof OaiVerb.LIST_RECORDS;

  constructor(protected readonly ctx: RepositoryContext) {}

  protected abstract body(records: OaiRecord[], plugin: MetadataFormatPlugin): VerbBody;

  handle(request: RequestDTO): VerbBody {
    if (request.resumptionToken !== null) {
      throw badResumptionToken(request.resumptionToken);
    }

    const prefix = request.metadataPrefix ?? "";
    const plugin = this.ctx.formats.get(prefix);
    if (!plugin) throw cannotDisseminateFormat(prefix);

    const filter: RecordFilter = {};
    if (request.from !== null) filter.from = UTCdatetime.parse(request.from);
    if (request.until !== null) filter.until = UTCdatetime.parse(request.until);
    if (request.set !== null) {
      if (!this.ctx.store.hasSets()) throw noSetHierarchy();
      filter.set = new SetSpec(request.set);
    }

    const records = this.ctx.store.listRecords(filter);
    if (records.length === 0) {
      throw new ProtocolError(OaiErrorCode.NO_RECORDS_MATCH, "No records match the request");
    }

    return this.body(records, plugin);
  }
}

export class ListIdentifiersHandler extends HarvestHandler {
  readonly verb = OaiVerb.LIST_IDENTIFIERS;

  protected body(records: OaiRecord[]): VerbBody {
    return {
      element: this.verb,
      content: { header: records.map((record) => headerNode(record.header)) },
    };
  }
}

export class ListRecordsHandler extends HarvestHandler {
  readonly verb = OaiVerb.LIST_RECORDS;

  protected body(records: OaiRecord[], plugin: MetadataFormatPlugin): VerbBody {
    return {
      element: this.verb,
      content: { record: records.map((record) => recordNode(record, plugin)) },
    };
  }
}
