import { InvariantViolation } from "../../core/errors.js";
import type { RecordHeader } from "./record-header.js";

/** Metadata payload: element name to one value or a list of values. */
export type MetadataPayload = Readonly<Record<string, string | readonly string[]>>;

/**
 * An OAI-PMH record: header plus an optional metadata payload. A deleted record
 * never carries metadata.
 *
 * Two records are the same record when their identifiers are equal,
 * whatever their payloads.
 */
export class OaiRecord {
  public readonly header: RecordHeader;
  private readonly metadata: MetadataPayload | null;

  constructor(header: RecordHeader, metadata: MetadataPayload | null = null) {
    if (header.isDeleted && metadata !== null) {
      throw new InvariantViolation("deleted record cannot carry metadata");
    }
    this.header = header;
    this.metadata = metadata === null ? null : freezePayload(metadata);
  }

  getMetadata(): MetadataPayload | null {
    return this.metadata;
  }

  get isDeleted(): boolean {
    return this.header.isDeleted;
  }

  equals(other: OaiRecord): boolean {
    return this.header.identifier.equals(other.header.identifier);
  }
}

/** Copy of `payload` with every value list copied and frozen as well. */
function freezePayload(payload: MetadataPayload): MetadataPayload {
  const copy: Record<string, string | readonly string[]> = {};
  for (const [element, value] of Object.entries(payload)) {
    copy[element] = typeof value === "string" ? value : Object.freeze([...value]);
  }
  return Object.freeze(copy);
}
