import type { AnyUri } from "../value-objects/any-uri.js";
import type { MetadataPrefix } from "../value-objects/metadata-prefix.js";
import type { MetadataRootTag } from "../value-objects/metadata-root-tag.js";
import { rootNamespace } from "./container-format.js";
import type { ContainerFormat } from "./container-format.js";
import type { MetadataNamespaceCollection } from "./metadata-namespace-collection.js";

/**
 * A metadata format the repository can disseminate. Looked up by its
 * prefix; equal to another format only when all four parts are equal.
 */
export class MetadataFormat implements ContainerFormat {
  constructor(
    public readonly metadataPrefix: MetadataPrefix,
    public readonly namespaces: MetadataNamespaceCollection,
    public readonly schema: AnyUri,
    public readonly rootTag: MetadataRootTag,
  ) {}

  get metadataNamespace(): AnyUri {
    return rootNamespace(this.rootTag, this.namespaces);
  }

  equals(other: MetadataFormat): boolean {
    return (
      this.metadataPrefix.equals(other.metadataPrefix) &&
      this.namespaces.equals(other.namespaces) &&
      this.schema.equals(other.schema) &&
      this.rootTag.equals(other.rootTag)
    );
  }
}
