// ---------------------------------------------------------------------------
// Error hierarchy for the OAI-PMH repository.
// ---------------------------------------------------------------------------

import type { OaiErrorCode } from "./types.js";

// ── Base error ──────────────────────────────────────────────────────────────

/**
 * Root of all repository errors.
 */
export class OaiPmhError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "OaiPmhError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ── Domain errors ───────────────────────────────────────────────────────────

export type ValidationErrorKind = "InvalidFormat" | "EmptyCollection" | "DuplicateEntry";

/** A value object or collection rejected its input at construction. */
export class ValidationError extends OaiPmhError {
  public readonly kind: ValidationErrorKind;
  public readonly field: string;
  public readonly value: string;

  constructor(
    kind: ValidationErrorKind,
    field: string,
    value: string,
    reason: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid ${field} "${value}": ${reason}`, options);
    this.name = "ValidationError";
    this.kind = kind;
    this.field = field;
    this.value = value;
  }
}

/** An entity was built with fields that contradict each other. */
export class InvariantViolation extends OaiPmhError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InvariantViolation";
  }
}

// ── Protocol errors ─────────────────────────────────────────────────────────

/**
 * A single OAI-PMH protocol error. Rendered as one `<error>` element.
 */
export class ProtocolError extends OaiPmhError {
  public readonly code: OaiErrorCode;

  constructor(code: OaiErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ProtocolError";
    this.code = code;
  }
}

// ── Infrastructure errors ───────────────────────────────────────────────────

/** A required configuration value is missing or invalid. */
export class ConfigurationError extends OaiPmhError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
  }
}
