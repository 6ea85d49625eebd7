// ---------------------------------------------------------------------------
// Protocol-level validation of a parsed OAI-PMH request.
// ---------------------------------------------------------------------------

import {
  ALLOWED_ARGUMENTS,
  OaiArgument,
  OaiErrorCode,
  isOaiArgument,
  isOaiVerb,
} from "../core/types.js";
import type { RequestDTO, ValidationResult } from "../core/types.js";
import { ErrorAccumulator } from "./error-accumulator.js";
import type { ParsedQuery } from "./parsed-query.js";

type Check = (query: ParsedQuery, errors: ErrorAccumulator) => void;

// ── Checks ──────────────────────────────────────────────────────────────────

const verbIsPresent: Check = (query, errors) => {
  if (!query.has(OaiArgument.VERB)) {
    errors.add(OaiErrorCode.BAD_VERB, "The verb argument is missing in the request");
  }
};

const verbIsNotRepeated: Check = (query, errors) => {
  if (query.count(OaiArgument.VERB) > 1) {
    errors.add(OaiErrorCode.BAD_VERB, "The verb argument is repeated in the request");
  }
};

const verbIsSupported: Check = (query, errors) => {
  const verb = query.getFirst(OaiArgument.VERB);
  if (verb !== null && !isOaiVerb(verb)) {
    errors.add(
      OaiErrorCode.BAD_VERB,
      `The value "${verb}" of the verb argument is not supported by the OAI-PMH protocol`,
    );
  }
};

const argumentsAreLegal: Check = (query, errors) => {
  for (const key of query.keys()) {
    if (!isOaiArgument(key)) {
      errors.add(OaiErrorCode.BAD_ARGUMENT, `Illegal argument "${key}" in the request`);
    }
  }
};

const argumentsAreNotRepeated: Check = (query, errors) => {
  for (const argument of ALLOWED_ARGUMENTS) {
    if (argument === OaiArgument.VERB) continue;
    if (query.count(argument) > 1) {
      errors.add(
        OaiErrorCode.BAD_ARGUMENT,
        `Argument "${argument}" is repeated in the request`,
      );
    }
  }
};

/** Checks in the order they run. Every check runs on every request. */
export const REQUEST_CHECKS: readonly Check[] = [
  verbIsPresent,
  verbIsNotRepeated,
  verbIsSupported,
  argumentsAreLegal,
  argumentsAreNotRepeated,
];

// ── Validator ───────────────────────────────────────────────────────────────

/**
 * Validates a parsed query against the OAI-PMH verb and argument rules.
 *
 * All checks run to completion and every violation is collected, so a
 * rejected request reports all of its problems at once.
 */
export class RequestValidator {
  validate(query: ParsedQuery): ValidationResult {
    const errors = new ErrorAccumulator();
    for (const check of REQUEST_CHECKS) check(query, errors);

    if (!errors.isEmpty()) {
      return { ok: false, report: errors.toReport() };
    }

    const verb = query.getFirst(OaiArgument.VERB);
    // Unreachable: the checks above reject a missing or unknown verb.
    if (verb === null || !isOaiVerb(verb)) {
      throw new Error("validated request has no supported verb");
    }

    const request: RequestDTO = Object.freeze({
      verb,
      identifier: query.getFirst(OaiArgument.IDENTIFIER),
      metadataPrefix: query.getFirst(OaiArgument.METADATA_PREFIX),
      from: query.getFirst(OaiArgument.FROM),
      until: query.getFirst(OaiArgument.UNTIL),
      set: query.getFirst(OaiArgument.SET),
      resumptionToken: query.getFirst(OaiArgument.RESUMPTION_TOKEN),
    });
    return { ok: true, request };
  }
}
