// ---------------------------------------------------------------------------
// Core types for the OAI-PMH repository.
// Protocol vocabularies, request/response shapes and config types.
// ---------------------------------------------------------------------------

// ── Protocol vocabularies ───────────────────────────────────────────────────

export const OaiVerb = {
  IDENTIFY: "Identify",
  GET_RECORD: "GetRecord",
  LIST_IDENTIFIERS: "ListIdentifiers",
  LIST_METADATA_FORMATS: "ListMetadataFormats",
  LIST_RECORDS: "ListRecords",
  LIST_SETS: "ListSets",
} as const;
export type OaiVerb = (typeof OaiVerb)[keyof typeof OaiVerb];

export const ALLOWED_VERBS: readonly OaiVerb[] = Object.values(OaiVerb);

export const OaiArgument = {
  VERB: "verb",
  IDENTIFIER: "identifier",
  METADATA_PREFIX: "metadataPrefix",
  FROM: "from",
  UNTIL: "until",
  SET: "set",
  RESUMPTION_TOKEN: "resumptionToken",
} as const;
export type OaiArgument = (typeof OaiArgument)[keyof typeof OaiArgument];

export const ALLOWED_ARGUMENTS: readonly OaiArgument[] = Object.values(OaiArgument);

/** The eight error codes defined by OAI-PMH 2.0 section 3.6. */
export const OaiErrorCode = {
  BAD_ARGUMENT: "badArgument",
  BAD_RESUMPTION_TOKEN: "badResumptionToken",
  BAD_VERB: "badVerb",
  CANNOT_DISSEMINATE_FORMAT: "cannotDisseminateFormat",
  ID_DOES_NOT_EXIST: "idDoesNotExist",
  NO_RECORDS_MATCH: "noRecordsMatch",
  NO_METADATA_FORMATS: "noMetadataFormats",
  NO_SET_HIERARCHY: "noSetHierarchy",
} as const;
export type OaiErrorCode = (typeof OaiErrorCode)[keyof typeof OaiErrorCode];

const VERB_NAMES: readonly string[] = ALLOWED_VERBS;
const ARGUMENT_NAMES: readonly string[] = ALLOWED_ARGUMENTS;

export function isOaiVerb(value: string): value is OaiVerb {
  return VERB_NAMES.includes(value);
}

export function isOaiArgument(value: string): value is OaiArgument {
  return ARGUMENT_NAMES.includes(value);
}

// ── Requests ────────────────────────────────────────────────────────────────

/**
 * A request that passed protocol-level validation.
 * Every argument holds its first occurrence in the query, or `null`.
 */
export interface RequestDTO {
  readonly verb: OaiVerb;
  readonly identifier: string | null;
  readonly metadataPrefix: string | null;
  readonly from: string | null;
  readonly until: string | null;
  readonly set: string | null;
  readonly resumptionToken: string | null;
}

// ── Error reports ───────────────────────────────────────────────────────────

export interface ErrorReportEntry {
  readonly code: OaiErrorCode;
  readonly messages: readonly string[];
}

/** Every protocol violation of one request, grouped by code in first-seen order. */
export interface ErrorReport {
  readonly entries: readonly ErrorReportEntry[];
}

export type ValidationResult =
  | { readonly ok: true; readonly request: RequestDTO }
  | { readonly ok: false; readonly report: ErrorReport };

// ── Response bodies ─────────────────────────────────────────────────────────

/**
 * A verb response body as a fast-xml-parser builder tree: element names map
 * to child trees, strings, or arrays of either; attributes use the `@_`
 * prefix and text content sits under `#text`.
 */
export type XmlNode = { [name: string]: XmlValue };
export type XmlValue = string | XmlNode | XmlValue[];

export interface VerbBody {
  /** Element name of the verb container, e.g. `ListRecords`. */
  readonly element: OaiVerb;
  readonly content: XmlNode;
}

// ── Config types ────────────────────────────────────────────────────────────

export interface AppConfig {
  env: "development" | "staging" | "production";
  port: number;
  logLevel: string;
  repositoryFile: string;
  /** Overrides the base URL declared in the repository file. */
  baseUrl: string | null;
}

export interface LoggingConfig {
  level: string;
  env: AppConfig["env"];
  prettyPrint: boolean;
  redactSecrets: boolean;
}
