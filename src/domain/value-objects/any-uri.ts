// ---------------------------------------------------------------------------
// XML Schema anyURI value object.
// ---------------------------------------------------------------------------

import { ValidationError } from "../../core/errors.js";
import { LexicalValue } from "./lexical-value.js";

// ── RFC 3986 URI-reference grammar ──────────────────────────────────────────

const PCT_ENCODED = "%[0-9A-Fa-f]{2}";
const UNRESERVED = "A-Za-z0-9\\-._~";
const SUB_DELIMS = "!$&'()*+,;=";

const PCHAR = `(?:[${UNRESERVED}${SUB_DELIMS}:@]|${PCT_ENCODED})`;
const SEGMENT = `${PCHAR}*`;
const SEGMENT_NZ = `${PCHAR}+`;
const SEGMENT_NZ_NC = `(?:[${UNRESERVED}${SUB_DELIMS}@]|${PCT_ENCODED})+`;
const QUERY = `(?:${PCHAR}|[/?])*`;

const USERINFO = `(?:[${UNRESERVED}${SUB_DELIMS}:]|${PCT_ENCODED})*`;
const IP_LITERAL = `\\[(?:[0-9A-Fa-f:.]+|[vV][0-9A-Fa-f]+\\.[${UNRESERVED}${SUB_DELIMS}:]+)\\]`;
const REG_NAME = `(?:[${UNRESERVED}${SUB_DELIMS}]|${PCT_ENCODED})*`;
const AUTHORITY = `(?:${USERINFO}@)?(?:${IP_LITERAL}|${REG_NAME})(?::[0-9]*)?`;

const PATH_ABEMPTY = `(?:/${SEGMENT})*`;
const PATH_ABSOLUTE = `/(?:${SEGMENT_NZ}(?:/${SEGMENT})*)?`;
const PATH_ROOTLESS = `${SEGMENT_NZ}(?:/${SEGMENT})*`;
const PATH_NOSCHEME = `${SEGMENT_NZ_NC}(?:/${SEGMENT})*`;

const TAIL = `(?:\\?${QUERY})?(?:#${QUERY})?`;
const ABSOLUTE = `[A-Za-z][A-Za-z0-9+\\-.]*:(?://${AUTHORITY}${PATH_ABEMPTY}|${PATH_ABSOLUTE}|${PATH_ROOTLESS}|)${TAIL}`;
const RELATIVE = `(?://${AUTHORITY}${PATH_ABEMPTY}|${PATH_ABSOLUTE}|${PATH_NOSCHEME}|)${TAIL}`;

const URI_REFERENCE = new RegExp(`^(?:${ABSOLUTE}|${RELATIVE})$`);

// ── Helpers ─────────────────────────────────────────────────────────────────

const encoder = new TextEncoder();

/** Apply the anyURI `collapse` whitespace facet. */
export function collapseWhitespace(raw: string): string {
  return raw.replace(/[\t\n\r ]+/g, " ").trim();
}

/**
 * Percent-escape spaces and non-ASCII characters, the way schema processors
 * map an anyURI literal onto a URI before parsing it.
 */
export function escapeForUriParsing(value: string): string {
  return value.replace(/[ \u{80}-\u{10FFFF}]/gu, (ch) =>
    Array.from(
      encoder.encode(ch),
      (byte) => `%${byte.toString(16).toUpperCase().padStart(2, "0")}`,
    ).join(""),
  );
}

/** Does `raw` belong to the lexical space of `xs:anyURI`? */
export function isAnyUri(raw: string): boolean {
  return URI_REFERENCE.test(escapeForUriParsing(collapseWhitespace(raw)));
}

// ── Value object ────────────────────────────────────────────────────────────

/**
 * A URI as accepted by the XML Schema `anyURI` type: an absolute or
 * relative URI reference, where spaces and non-ASCII characters stand for
 * their percent-escaped UTF-8 bytes. The original literal is kept as given.
 */
export class AnyUri extends LexicalValue {
  constructor(uri: string) {
    if (!isAnyUri(uri)) {
      throw new ValidationError(
        "InvalidFormat",
        "anyURI",
        uri,
        "not a valid URI reference",
      );
    }
    super(uri);
  }
}
