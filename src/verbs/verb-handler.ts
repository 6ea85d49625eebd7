import type { OaiVerb, RequestDTO, VerbBody } from "../core/types.js";
import type { RepositoryIdentity } from "../domain/identity/repository-identity.js";
import type { MetadataFormatRegistry } from "../formats/format-registry.js";
import type { RecordStore } from "../store/record-store.js";

/** Everything a verb handler may read. */
export interface RepositoryContext {
  identity: RepositoryIdentity;
  formats: MetadataFormatRegistry;
  store: RecordStore;
}

/**
 * Answers one verb. Arguments have already passed the verb's argument
 * rules; protocol failures are thrown as `ProtocolError`.
 */
export interface VerbHandler {
  readonly verb: OaiVerb;
  handle(request: RequestDTO): VerbBody;
}
