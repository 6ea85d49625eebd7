// ---------------------------------------------------------------------------
// RecordStore over records and sets held in memory.
// ---------------------------------------------------------------------------

import { InvariantViolation } from "../core/errors.js";
import type { OaiRecord } from "../domain/entities/oai-record.js";
import type { OaiSet } from "../domain/entities/oai-set.js";
import type { RecordFilter, RecordStore } from "./record-store.js";

function byDatestampThenIdentifier(a: OaiRecord, b: OaiRecord): number {
  const diff = a.header.datestamp.compare(b.header.datestamp);
  if (diff !== 0) return diff;
  const left = a.header.identifier.value;
  const right = b.header.identifier.value;
  return left < right ? -1 : left > right ? 1 : 0;
}

export class InMemoryRecordStore implements RecordStore {
  private readonly records: readonly OaiRecord[];
  private readonly byIdentifier = new Map<string, OaiRecord>();
  private readonly sets: readonly OaiSet[];

  constructor(records: readonly OaiRecord[] = [], sets: readonly OaiSet[] = []) {
    for (const record of records) {
      const id = record.header.identifier.value;
      if (this.byIdentifier.has(id)) {
        throw new InvariantViolation(`record identifier "${id}" is used twice`);
      }
      this.byIdentifier.set(id, record);
    }

    const specs = new Set<string>();
    for (const set of sets) {
      if (specs.has(set.spec.value)) {
        throw new InvariantViolation(`set spec "${set.spec.value}" is declared twice`);
      }
      specs.add(set.spec.value);
    }

    this.records = Object.freeze([...records].sort(byDatestampThenIdentifier));
    this.sets = Object.freeze([...sets]);
  }

  findRecord(identifier: string): OaiRecord | undefined {
    return this.byIdentifier.get(identifier);
  }

  listRecords(filter: RecordFilter = {}): OaiRecord[] {
    const { from, until, set } = filter;
    const fromTime = from?.toDate().getTime();
    const untilTime = until?.endOfPeriod().getTime();

    return this.records.filter((record) => {
      const stamp = record.header.datestamp.toDate().getTime();
      if (fromTime !== undefined && stamp < fromTime) return false;
      if (untilTime !== undefined && stamp > untilTime) return false;
      if (set && !record.header.belongsToSetHierarchy(set)) return false;
      return true;
    });
  }

  listSets(): OaiSet[] {
    return [...this.sets];
  }

  hasSets(): boolean {
    return this.sets.length > 0;
  }
}
