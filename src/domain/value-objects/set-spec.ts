import { LexicalValue, assertNotBlank, assertPattern } from "./lexical-value.js";

/** Colon-separated hierarchy of unreserved-character segments. */
export const SET_SPEC_PATTERN = /^[A-Za-z0-9\-_.]+(?::[A-Za-z0-9\-_.]+)*$/;

/**
 * Identifies a set, e.g. `math:algebra`. Each colon adds a level to the
 * set hierarchy.
 */
export class SetSpec extends LexicalValue {
  constructor(setSpec: string) {
    assertNotBlank("set spec", setSpec);
    assertPattern(SET_SPEC_PATTERN, "set spec", setSpec);
    super(setSpec);
  }

  get segments(): string[] {
    return this.value.split(":");
  }

  /** True when `this` is `ancestor` itself or lies below it in the hierarchy. */
  isWithin(ancestor: SetSpec): boolean {
    return this.value === ancestor.value || this.value.startsWith(`${ancestor.value}:`);
  }
}
