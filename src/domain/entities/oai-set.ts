import type { SetSpec } from "../value-objects/set-spec.js";

/** A set of items, identified by its set spec. */
export class OaiSet {
  public readonly description: string | null;

  constructor(
    public readonly spec: SetSpec,
    public readonly name: string,
    description: string | null = null,
  ) {
    this.description = description === "" ? null : description;
  }

  equals(other: OaiSet): boolean {
    return this.spec.equals(other.spec);
  }
}
