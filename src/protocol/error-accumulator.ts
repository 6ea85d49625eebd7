import type { ErrorReport, OaiErrorCode } from "../core/types.js";

/**
 * Collects protocol errors by code. Codes keep the order in which they were
 * first added; each code keeps its messages in order.
 */
export class ErrorAccumulator {
  private readonly byCode = new Map<OaiErrorCode, string[]>();

  add(code: OaiErrorCode, message: string): this {
    const messages = this.byCode.get(code);
    if (messages) {
      messages.push(message);
    } else {
      this.byCode.set(code, [message]);
    }
    return this;
  }

  merge(other: ErrorAccumulator | ErrorReport): this {
    const entries =
      other instanceof ErrorAccumulator ? other.toReport().entries : other.entries;
    for (const entry of entries) {
      for (const message of entry.messages) this.add(entry.code, message);
    }
    return this;
  }

  isEmpty(): boolean {
    return this.byCode.size === 0;
  }

  codes(): OaiErrorCode[] {
    return [...this.byCode.keys()];
  }

  messages(code: OaiErrorCode): string[] {
    return [...(this.byCode.get(code) ?? [])];
  }

  /** Frozen snapshot of everything collected so far. */
  toReport(): ErrorReport {
    const entries = [...this.byCode].map(([code, messages]) =>
      Object.freeze({ code, messages: Object.freeze([...messages]) }),
    );
    return Object.freeze({ entries: Object.freeze(entries) });
  }
}

/** Report holding a single error. */
export function singleErrorReport(code: OaiErrorCode, message: string): ErrorReport {
  return new ErrorAccumulator().add(code, message).toReport();
}
