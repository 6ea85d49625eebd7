import type { OaiRecord } from "../domain/entities/oai-record.js";
import type { OaiSet } from "../domain/entities/oai-set.js";
import type { SetSpec } from "../domain/value-objects/set-spec.js";
import type { UTCdatetime } from "../domain/value-objects/utc-datetime.js";

/** Selective-harvesting criteria. Every bound is inclusive. */
export interface RecordFilter {
  from?: UTCdatetime;
  until?: UTCdatetime;
  set?: SetSpec;
}

/** Read access to the items and sets a repository exposes. */
export interface RecordStore {
  findRecord(identifier: string): OaiRecord | undefined;
  /** Records matching `filter`, ordered by datestamp then identifier. */
  listRecords(filter?: RecordFilter): OaiRecord[];
  listSets(): OaiSet[];
  hasSets(): boolean;
}
