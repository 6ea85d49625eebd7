import { ValidationError } from "../../core/errors.js";

/** How the repository keeps track of deletions (OAI-PMH 2.0 section 2.5.1). */
export const DeletedRecord = {
  NO: "no",
  TRANSIENT: "transient",
  PERSISTENT: "persistent",
} as const;
export type DeletedRecord = (typeof DeletedRecord)[keyof typeof DeletedRecord];

const ALLOWED: readonly string[] = Object.values(DeletedRecord);

export function isDeletedRecord(value: string): value is DeletedRecord {
  return ALLOWED.includes(value);
}

export function parseDeletedRecord(raw: string): DeletedRecord {
  if (!isDeletedRecord(raw)) {
    throw new ValidationError(
      "InvalidFormat",
      "deletedRecord",
      raw,
      `allowed values are ${ALLOWED.join(", ")}`,
    );
  }
  return raw;
}
