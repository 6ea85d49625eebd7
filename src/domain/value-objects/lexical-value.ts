// ---------------------------------------------------------------------------
// Base class for single-string value objects.
// ---------------------------------------------------------------------------

import { ValidationError } from "../../core/errors.js";

/**
 * A validated, immutable string. Two lexical values are equal when they are
 * of the same class and wrap the same string.
 */
export abstract class LexicalValue {
  public readonly value: string;

  protected constructor(value: string) {
    this.value = value;
  }

  equals(other: this): boolean {
    if (this === other) return true;
    return other.constructor === this.constructor && other.value === this.value;
  }

  toString(): string {
    return this.value;
  }

  toJSON(): string {
    return this.value;
  }
}

/** Throw an `InvalidFormat` error unless `raw` matches `pattern` in full. */
export function assertPattern(pattern: RegExp, field: string, raw: string): void {
  if (!pattern.test(raw)) {
    throw new ValidationError(
      "InvalidFormat",
      field,
      raw,
      `does not match ${pattern.source}`,
    );
  }
}

/** Throw an `InvalidFormat` error when `raw` is empty or only whitespace. */
export function assertNotBlank(field: string, raw: string): void {
  if (raw.trim() === "") {
    throw new ValidationError("InvalidFormat", field, raw, "must not be empty");
  }
}
