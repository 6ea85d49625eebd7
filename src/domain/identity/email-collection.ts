import { ValidationError } from "../../core/errors.js";
import type { Email } from "./email.js";

/**
 * The repository's administrator addresses. At least one, no repeats;
 * compared without regard to order.
 */
export class EmailCollection implements Iterable<Email> {
  private readonly emails: readonly Email[];

  constructor(...emails: Email[]) {
    if (emails.length === 0) {
      throw new ValidationError(
        "EmptyCollection",
        "adminEmail",
        "",
        "at least one administrator e-mail is required",
      );
    }

    const seen = new Set<string>();
    for (const email of emails) {
      if (seen.has(email.value)) {
        throw new ValidationError(
          "DuplicateEntry",
          "adminEmail",
          email.value,
          "listed more than once",
        );
      }
      seen.add(email.value);
    }

    this.emails = Object.freeze([...emails]);
  }

  [Symbol.iterator](): Iterator<Email> {
    return this.emails[Symbol.iterator]();
  }

  get count(): number {
    return this.emails.length;
  }

  toArray(): Email[] {
    return [...this.emails];
  }

  equals(other: EmailCollection): boolean {
    if (this.count !== other.count) return false;
    const mine = this.emails.map((e) => e.value).sort();
    const theirs = other.emails.map((e) => e.value).sort();
    return mine.every((value, i) => value === theirs[i]);
  }
}
