// ---------------------------------------------------------------------------
// Verb-specific argument rules (OAI-PMH 2.0 section 4).
// ---------------------------------------------------------------------------

import { ValidationError } from "../core/errors.js";
import { OaiArgument, OaiErrorCode, OaiVerb } from "../core/types.js";
import type { ErrorReport, RequestDTO } from "../core/types.js";
import { Granularity } from "../domain/value-objects/granularity.js";
import { SetSpec } from "../domain/value-objects/set-spec.js";
import { UTCdatetime, detectGranularity } from "../domain/value-objects/utc-datetime.js";
import { ErrorAccumulator } from "../protocol/error-accumulator.js";

/** Every argument except the verb itself. */
export type RequestArgument = Exclude<OaiArgument, "verb">;

export interface ArgumentRule {
  readonly required: readonly RequestArgument[];
  readonly optional: readonly RequestArgument[];
  /** Argument that must appear alone when present. */
  readonly exclusive: RequestArgument | null;
}

const HARVEST_RULE: ArgumentRule = {
  required: [OaiArgument.METADATA_PREFIX],
  optional: [OaiArgument.FROM, OaiArgument.UNTIL, OaiArgument.SET],
  exclusive: OaiArgument.RESUMPTION_TOKEN,
};

export const ARGUMENT_RULES: Readonly<Record<OaiVerb, ArgumentRule>> = {
  [OaiVerb.IDENTIFY]: { required: [], optional: [], exclusive: null },
  [OaiVerb.LIST_METADATA_FORMATS]: {
    required: [],
    optional: [OaiArgument.IDENTIFIER],
    exclusive: null,
  },
  [OaiVerb.LIST_SETS]: {
    required: [],
    optional: [],
    exclusive: OaiArgument.RESUMPTION_TOKEN,
  },
  [OaiVerb.GET_RECORD]: {
    required: [OaiArgument.IDENTIFIER, OaiArgument.METADATA_PREFIX],
    optional: [],
    exclusive: null,
  },
  [OaiVerb.LIST_IDENTIFIERS]: HARVEST_RULE,
  [OaiVerb.LIST_RECORDS]: HARVEST_RULE,
};

const REQUEST_ARGUMENTS: readonly RequestArgument[] = [
  OaiArgument.IDENTIFIER,
  OaiArgument.METADATA_PREFIX,
  OaiArgument.FROM,
  OaiArgument.UNTIL,
  OaiArgument.SET,
  OaiArgument.RESUMPTION_TOKEN,
];

/** Non-null arguments of `request` other than the verb, in canonical order. */
export function suppliedArguments(request: RequestDTO): RequestArgument[] {
  return REQUEST_ARGUMENTS.filter((arg) => request[arg] !== null);
}

/**
 * Parse a `from`/`until` value, adding a `badArgument` and returning `null`
 * when it is not a datestamp the repository can answer.
 */
function checkDatestamp(
  argument: "from" | "until",
  raw: string,
  repositoryGranularity: Granularity,
  errors: ErrorAccumulator,
): UTCdatetime | null {
  const granularity = detectGranularity(raw);
  let datestamp: UTCdatetime | null = null;
  if (granularity !== null) {
    try {
      datestamp = new UTCdatetime(raw, granularity);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
    }
  }

  if (datestamp === null) {
    errors.add(
      OaiErrorCode.BAD_ARGUMENT,
      `The value "${raw}" of the ${argument} argument is not a valid datestamp`,
    );
    return null;
  }

  if (
    datestamp.granularity === Granularity.DATE_TIME_SECOND &&
    repositoryGranularity === Granularity.DATE
  ) {
    errors.add(
      OaiErrorCode.BAD_ARGUMENT,
      `The value "${raw}" of the ${argument} argument is finer than the repository granularity ${repositoryGranularity}`,
    );
    return null;
  }

  return datestamp;
}

/**
 * Check `request` against its verb's argument rule. Every violation is
 * reported as `badArgument`; an empty report means the request may be
 * dispatched.
 */
export function checkArguments(
  request: RequestDTO,
  repositoryGranularity: Granularity,
): ErrorReport {
  const errors = new ErrorAccumulator();
  const rule = ARGUMENT_RULES[request.verb];
  const supplied = suppliedArguments(request);

  if (rule.exclusive !== null && request[rule.exclusive] !== null) {
    for (const arg of supplied) {
      if (arg === rule.exclusive) continue;
      errors.add(
        OaiErrorCode.BAD_ARGUMENT,
        `The argument "${arg}" cannot be combined with the exclusive argument "${rule.exclusive}"`,
      );
    }
    return errors.toReport();
  }

  const allowed = new Set<RequestArgument>([...rule.required, ...rule.optional]);
  if (rule.exclusive !== null) allowed.add(rule.exclusive);

  for (const arg of supplied) {
    if (!allowed.has(arg)) {
      errors.add(
        OaiErrorCode.BAD_ARGUMENT,
        `The argument "${arg}" is not allowed for the verb ${request.verb}`,
      );
    }
  }

  for (const arg of rule.required) {
    if (request[arg] === null) {
      errors.add(
        OaiErrorCode.BAD_ARGUMENT,
        `The required argument "${arg}" is missing for the verb ${request.verb}`,
      );
    }
  }

  if (allowed.has(OaiArgument.IDENTIFIER) && request.identifier?.trim() === "") {
    errors.add(OaiErrorCode.BAD_ARGUMENT, "The identifier argument must not be empty");
  }

  if (allowed.has(OaiArgument.SET) && request.set !== null) {
    try {
      new SetSpec(request.set);
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err;
      errors.add(
        OaiErrorCode.BAD_ARGUMENT,
        `The value "${request.set}" of the set argument is not a valid setSpec`,
      );
    }
  }

  if (allowed.has(OaiArgument.FROM)) {
    const from =
      request.from === null
        ? null
        : checkDatestamp("from", request.from, repositoryGranularity, errors);
    const until =
      request.until === null
        ? null
        : checkDatestamp("until", request.until, repositoryGranularity, errors);

    if (from && until) {
      if (from.granularity !== until.granularity) {
        errors.add(
          OaiErrorCode.BAD_ARGUMENT,
          "The from and until arguments must have the same granularity",
        );
      } else if (from.compare(until) > 0) {
        errors.add(
          OaiErrorCode.BAD_ARGUMENT,
          "The from argument must be less than or equal to the until argument",
        );
      }
    }
  }

  return errors.toReport();
}
