import { ProtocolError } from "../core/errors.js";
import { OaiErrorCode } from "../core/types.js";

// Errors raised by more than one verb handler.

export function badResumptionToken(token: string): ProtocolError {
  return new ProtocolError(
    OaiErrorCode.BAD_RESUMPTION_TOKEN,
    `The value "${token}" of the resumptionToken argument is invalid or expired`,
  );
}

export function cannotDisseminateFormat(prefix: string): ProtocolError {
  return new ProtocolError(
    OaiErrorCode.CANNOT_DISSEMINATE_FORMAT,
    `The metadata format "${prefix}" is not supported by this repository`,
  );
}

export function idDoesNotExist(identifier: string): ProtocolError {
  return new ProtocolError(
    OaiErrorCode.ID_DOES_NOT_EXIST,
    `The identifier "${identifier}" does not exist in this repository`,
  );
}

export function noSetHierarchy(): ProtocolError {
  return new ProtocolError(
    OaiErrorCode.NO_SET_HIERARCHY,
    "This repository does not support sets",
  );
}
