import { LexicalValue, assertPattern } from "./lexical-value.js";

/**
 * Characters allowed in a metadataPrefix: the URI "unreserved" set of
 * RFC 2396, as required by OAI-PMH 2.0 section 3.4.
 */
export const METADATA_PREFIX_PATTERN = /^[A-Za-z0-9\-_.!~*'()]+$/;

/** Short name of a metadata format, e.g. `oai_dc`. */
export class MetadataPrefix extends LexicalValue {
  constructor(prefix: string) {
    assertPattern(METADATA_PREFIX_PATTERN, "metadata prefix", prefix);
    super(prefix);
  }
}
