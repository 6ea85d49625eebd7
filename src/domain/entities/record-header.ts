import { InvariantViolation } from "../../core/errors.js";
import type { RecordIdentifier } from "../value-objects/record-identifier.js";
import { SetSpec } from "../value-objects/set-spec.js";
import type { UTCdatetime } from "../value-objects/utc-datetime.js";

/**
 * Header of a record: identifier, datestamp, deletion status and the sets
 * the item belongs to.
 */
export class RecordHeader {
  public readonly setSpecs: readonly SetSpec[];

  constructor(
    public readonly identifier: RecordIdentifier,
    public readonly datestamp: UTCdatetime,
    public readonly isDeleted: boolean = false,
    setSpecs: readonly SetSpec[] = [],
  ) {
    // Headers built from parsed input must still hold SetSpec values.
    for (const spec of setSpecs) {
      if (!(spec instanceof SetSpec)) {
        throw new InvariantViolation("record header set specs must be SetSpec values");
      }
    }
    this.setSpecs = Object.freeze([...setSpecs]);
  }

  /** True when one of the header's set specs equals `spec`. */
  belongsToSet(spec: SetSpec): boolean {
    return this.setSpecs.some((own) => own.equals(spec));
  }

  /** True when the header is in `spec` or in one of its subsets. */
  belongsToSetHierarchy(spec: SetSpec): boolean {
    return this.setSpecs.some((own) => own.isWithin(spec));
  }
}
