import type { AnyUri } from "../value-objects/any-uri.js";
import type { MetadataRootTag } from "../value-objects/metadata-root-tag.js";
import type { MetadataNamespaceCollection } from "./metadata-namespace-collection.js";

/**
 * Shape shared by every XML container the repository emits under its own
 * root tag: record metadata and Identify descriptions.
 */
export interface ContainerFormat {
  readonly namespaces: MetadataNamespaceCollection;
  readonly schema: AnyUri;
  readonly rootTag: MetadataRootTag;
  /** Namespace URI the root tag lives in. */
  readonly metadataNamespace: AnyUri;
}

/**
 * The namespace bound to the root tag's prefix, or the first declared
 * namespace for an unqualified root tag.
 */
export function rootNamespace(
  rootTag: MetadataRootTag,
  namespaces: MetadataNamespaceCollection,
): AnyUri {
  const prefix = rootTag.prefix;
  const bound = prefix === null ? undefined : namespaces.findByPrefix(prefix);
  return (bound ?? namespaces.toArray()[0]).uri;
}
