import { ValidationError } from "../../core/errors.js";

/** Datestamp precision supported by OAI-PMH 2.0 (section 3.3). */
export const Granularity = {
  DATE: "YYYY-MM-DD",
  DATE_TIME_SECOND: "YYYY-MM-DDThh:mm:ssZ",
} as const;
export type Granularity = (typeof Granularity)[keyof typeof Granularity];

const ALLOWED: readonly string[] = Object.values(Granularity);

export function isGranularity(value: string): value is Granularity {
  return ALLOWED.includes(value);
}

/** Parse a granularity literal, e.g. from repository configuration. */
export function parseGranularity(raw: string): Granularity {
  if (!isGranularity(raw)) {
    throw new ValidationError(
      "InvalidFormat",
      "granularity",
      raw,
      `allowed values are ${ALLOWED.join(", ")}`,
    );
  }
  return raw;
}
