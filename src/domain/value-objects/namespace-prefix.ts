import { LexicalValue, assertPattern } from "./lexical-value.js";

/** XML namespace prefix (an NCName restricted to ASCII). */
export const NAMESPACE_PREFIX_PATTERN = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

export class NamespacePrefix extends LexicalValue {
  constructor(prefix: string) {
    assertPattern(NAMESPACE_PREFIX_PATTERN, "namespace prefix", prefix);
    super(prefix);
  }
}
