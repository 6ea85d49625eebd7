import type { AnyUri } from "../value-objects/any-uri.js";
import type { NamespacePrefix } from "../value-objects/namespace-prefix.js";

/** A namespace declaration used by a metadata format: `xmlns:prefix="uri"`. */
export class MetadataNamespace {
  constructor(
    public readonly prefix: NamespacePrefix,
    public readonly uri: AnyUri,
  ) {}

  equals(other: MetadataNamespace): boolean {
    return this.prefix.equals(other.prefix) && this.uri.equals(other.uri);
  }

  toString(): string {
    return `xmlns:${this.prefix.value}="${this.uri.value}"`;
  }
}
