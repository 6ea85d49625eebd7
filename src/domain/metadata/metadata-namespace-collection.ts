// ---------------------------------------------------------------------------
// Ordered, non-empty set of namespace declarations.
// ---------------------------------------------------------------------------

import { ValidationError } from "../../core/errors.js";
import type { MetadataNamespace } from "./metadata-namespace.js";

/**
 * The namespaces a metadata format declares. Holds at least one entry, and
 * no two entries share a prefix or a URI. Iterates in insertion order.
 *
 * Equality ignores order: two collections are equal when they hold the same
 * (prefix, uri) pairs.
 */
export class MetadataNamespaceCollection implements Iterable<MetadataNamespace> {
  private readonly namespaces: readonly MetadataNamespace[];

  constructor(...namespaces: MetadataNamespace[]) {
    if (namespaces.length === 0) {
      throw new ValidationError(
        "EmptyCollection",
        "namespaces",
        "",
        "at least one namespace must be provided",
      );
    }

    assertUnique(namespaces.map((ns) => ns.prefix.value), "prefix");
    assertUnique(namespaces.map((ns) => ns.uri.value), "uri");

    this.namespaces = Object.freeze([...namespaces]);
  }

  [Symbol.iterator](): Iterator<MetadataNamespace> {
    return this.namespaces[Symbol.iterator]();
  }

  get count(): number {
    return this.namespaces.length;
  }

  toArray(): MetadataNamespace[] {
    return [...this.namespaces];
  }

  /** Namespace declared under `prefix`, if any. */
  findByPrefix(prefix: string): MetadataNamespace | undefined {
    return this.namespaces.find((ns) => ns.prefix.value === prefix);
  }

  equals(other: MetadataNamespaceCollection): boolean {
    if (this === other) return true;
    if (this.count !== other.count) return false;
    // Prefixes are unique, so matching every entry by prefix is set equality.
    return this.namespaces.every((ns) => {
      const match = other.findByPrefix(ns.prefix.value);
      return match !== undefined && match.uri.equals(ns.uri);
    });
  }

  toString(): string {
    return this.namespaces.map((ns) => ns.toString()).join(" ");
  }
}

function assertUnique(values: string[], field: "prefix" | "uri"): void {
  const seen = new Set<string>();
  for (const value of values) {
    if (seen.has(value)) {
      throw new ValidationError(
        "DuplicateEntry",
        field,
        value,
        `namespace ${field} declared more than once`,
      );
    }
    seen.add(value);
  }
}
