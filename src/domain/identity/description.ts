// ---------------------------------------------------------------------------
// Identify <description> containers.
// ---------------------------------------------------------------------------

import { ValidationError } from "../../core/errors.js";
import { rootNamespace } from "../metadata/container-format.js";
import type { ContainerFormat } from "../metadata/container-format.js";
import type { MetadataNamespaceCollection } from "../metadata/metadata-namespace-collection.js";
import type { AnyUri } from "../value-objects/any-uri.js";
import type { MetadataRootTag } from "../value-objects/metadata-root-tag.js";

/** Structure of a description: like a metadata format, but without a prefix. */
export class DescriptionFormat implements ContainerFormat {
  constructor(
    public readonly namespaces: MetadataNamespaceCollection,
    public readonly schema: AnyUri,
    public readonly rootTag: MetadataRootTag,
  ) {}

  get metadataNamespace(): AnyUri {
    return rootNamespace(this.rootTag, this.namespaces);
  }

  equals(other: DescriptionFormat): boolean {
    return (
      this.namespaces.equals(other.namespaces) &&
      this.schema.equals(other.schema) &&
      this.rootTag.equals(other.rootTag)
    );
  }
}

/** Child element name to one value or a list of values. */
export type DescriptionData = Readonly<Record<string, string | readonly string[]>>;

const ELEMENT_NAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;

/**
 * One `<description>` of the repository, e.g. an `oai-identifier` block.
 * Equal to another description when the formats are equal and the data
 * holds the same entries in the same order.
 */
export class Description {
  private readonly data: DescriptionData;

  constructor(
    public readonly format: DescriptionFormat,
    data: DescriptionData,
  ) {
    const copy: Record<string, string | readonly string[]> = {};
    for (const [element, value] of Object.entries(data)) {
      if (!ELEMENT_NAME.test(element)) {
        throw new ValidationError(
          "InvalidFormat",
          "description element",
          element,
          `does not match ${ELEMENT_NAME.source}`,
        );
      }
      copy[element] = typeof value === "string" ? value : Object.freeze([...value]);
    }
    this.data = Object.freeze(copy);
  }

  getData(): DescriptionData {
    return this.data;
  }

  equals(other: Description): boolean {
    if (!this.format.equals(other.format)) return false;
    const mine = Object.entries(this.data);
    const theirs = Object.entries(other.data);
    if (mine.length !== theirs.length) return false;
    return mine.every(([element, value], i) => {
      const entry = theirs[i];
      return entry !== undefined && entry[0] === element && sameValue(value, entry[1]);
    });
  }
}

function sameValue(a: string | readonly string[], b: string | readonly string[]): boolean {
  if (typeof a === "string" || typeof b === "string") return a === b;
  return a.length === b.length && a.every((item, i) => item === b[i]);
}

/** The repository's descriptions, in the order Identify reports them. May be empty. */
export class DescriptionCollection implements Iterable<Description> {
  private readonly descriptions: readonly Description[];

  constructor(...descriptions: Description[]) {
    this.descriptions = Object.freeze([...descriptions]);
  }

  [Symbol.iterator](): Iterator<Description> {
    return this.descriptions[Symbol.iterator]();
  }

  get count(): number {
    return this.descriptions.length;
  }

  toArray(): Description[] {
    return [...this.descriptions];
  }

  /** Order matters: the same descriptions in another order are a different collection. */
  equals(other: DescriptionCollection): boolean {
    if (this.count !== other.count) return false;
    return this.descriptions.every((description, i) => {
      const counterpart = other.descriptions[i];
      return counterpart !== undefined && description.equals(counterpart);
    });
  }
}
