// ---------------------------------------------------------------------------
// UTC datestamp with OAI-PMH granularity.
// ---------------------------------------------------------------------------

import { ValidationError } from "../../core/errors.js";
import { Granularity } from "./granularity.js";
import { LexicalValue } from "./lexical-value.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_PATTERN = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})Z$/;

/**
 * Build the instant for the given components, or `null` when the components
 * do not name a real calendar date and time (e.g. February 30th).
 */
function toInstant(parts: number[]): Date | null {
  const [year, month, day, hour = 0, minute = 0, second = 0] = parts;
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  const roundTrips =
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day &&
    date.getUTCHours() === hour &&
    date.getUTCMinutes() === minute &&
    date.getUTCSeconds() === second;

  return roundTrips ? date : null;
}

/** Granularity a datestamp literal is written in, or `null` if neither. */
export function detectGranularity(raw: string): Granularity | null {
  if (DATE_PATTERN.test(raw)) return Granularity.DATE;
  if (DATE_TIME_PATTERN.test(raw)) return Granularity.DATE_TIME_SECOND;
  return null;
}

/**
 * A datestamp in UTC written at a declared granularity:
 * `YYYY-MM-DD` or `YYYY-MM-DDThh:mm:ssZ`.
 *
 * Equal only to a datestamp of the same granularity naming the same instant.
 */
export class UTCdatetime extends LexicalValue {
  public readonly granularity: Granularity;
  private readonly instant: Date;

  constructor(dateTime: string, granularity: Granularity) {
    const pattern =
      granularity === Granularity.DATE ? DATE_PATTERN : DATE_TIME_PATTERN;
    const match = pattern.exec(dateTime);
    if (!match) {
      throw new ValidationError(
        "InvalidFormat",
        "datestamp",
        dateTime,
        `does not match granularity ${granularity}`,
      );
    }

    const instant = toInstant(match.slice(1).map(Number));
    if (!instant) {
      throw new ValidationError(
        "InvalidFormat",
        "datestamp",
        dateTime,
        "not a valid calendar date/time",
      );
    }

    super(dateTime);
    this.granularity = granularity;
    this.instant = instant;
  }

  /** Parse a literal at whichever granularity it is written in. */
  static parse(raw: string): UTCdatetime {
    return new UTCdatetime(raw, detectGranularity(raw) ?? Granularity.DATE_TIME_SECOND);
  }

  override equals(other: this): boolean {
    return this.granularity === other.granularity && super.equals(other);
  }

  toDate(): Date {
    return new Date(this.instant.getTime());
  }

  /**
   * Last second covered by this datestamp: the instant itself at seconds
   * granularity, or 23:59:59 of the day at day granularity.
   */
  endOfPeriod(): Date {
    if (this.granularity === Granularity.DATE_TIME_SECOND) return this.toDate();
    return new Date(this.instant.getTime() + 86_399_000);
  }

  /** Negative, zero or positive as `this` is before, at or after `other`. */
  compare(other: UTCdatetime): number {
    return this.instant.getTime() - other.instant.getTime();
  }

  /** Format an instant at the given granularity. */
  static format(date: Date, granularity: Granularity): string {
    const iso = date.toISOString();
    return granularity === Granularity.DATE
      ? iso.slice(0, 10)
      : `${iso.slice(0, 19)}Z`;
  }
}
