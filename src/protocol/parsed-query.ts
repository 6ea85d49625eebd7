// ---------------------------------------------------------------------------
// Tokenizer for OAI-PMH query strings.
// ---------------------------------------------------------------------------

import { ProtocolError } from "../core/errors.js";
import { OaiErrorCode } from "../core/types.js";

/** Longest raw query string accepted before any parsing. */
export const MAX_QUERY_LENGTH = 1000;

export interface QueryPair {
  readonly key: string;
  readonly value: string;
}

/**
 * Decode a form-urlencoded component: `+` is a space and `%HH` sequences
 * are UTF-8 bytes. A component with malformed escapes is kept as written.
 */
export function decodeComponent(raw: string): string {
  const spaced = raw.replace(/\+/g, " ");
  try {
    return decodeURIComponent(spaced);
  } catch (err) {
    if (err instanceof URIError) return spaced;
    throw err;
  }
}

/**
 * A query string split into key/value pairs. Every pair is kept, in the
 * order given, including repeated keys.
 */
export class ParsedQuery {
  private readonly pairList: readonly QueryPair[];

  /**
   * @throws ProtocolError `badArgument` when the query is longer than
   *   {@link MAX_QUERY_LENGTH} characters.
   */
  constructor(queryString: string) {
    if (queryString.length > MAX_QUERY_LENGTH) {
      throw new ProtocolError(OaiErrorCode.BAD_ARGUMENT, "Request is too long");
    }

    const pairs: QueryPair[] = [];
    for (const token of queryString.split("&")) {
      if (token.trim() === "") continue;

      const eq = token.indexOf("=");
      const rawKey = eq === -1 ? token : token.slice(0, eq);
      const rawValue = eq === -1 ? "" : token.slice(eq + 1);
      pairs.push({
        key: decodeComponent(rawKey.trim()),
        value: decodeComponent(rawValue.trim()),
      });
    }
    this.pairList = Object.freeze(pairs);
  }

  /** Every value given for `key`, in order. */
  getValues(key: string): string[] {
    return this.pairList.filter((p) => p.key === key).map((p) => p.value);
  }

  /** First value given for `key`, or `null` if the key is absent. */
  getFirst(key: string): string | null {
    return this.pairList.find((p) => p.key === key)?.value ?? null;
  }

  /** Keys in order of appearance, repeats included. */
  keys(): string[] {
    return this.pairList.map((p) => p.key);
  }

  has(key: string): boolean {
    return this.pairList.some((p) => p.key === key);
  }

  count(key: string): number {
    return this.pairList.filter((p) => p.key === key).length;
  }

  pairs(): QueryPair[] {
    return [...this.pairList];
  }
}
