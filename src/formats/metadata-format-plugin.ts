import type { XmlNode } from "../core/types.js";
import type { ContainerFormat } from "../domain/metadata/container-format.js";
import type { MetadataFormat } from "../domain/metadata/metadata-format.js";
import type { MetadataPayload } from "../domain/entities/oai-record.js";

/**
 * A metadata format the repository can disseminate, plus the mapping from
 * a record's payload to that format's XML.
 */
export interface MetadataFormatPlugin {
  readonly format: MetadataFormat;

  /** Build the `<metadata>` child element for `payload`. */
  render(payload: MetadataPayload): XmlNode;
}

/** Attributes declaring every namespace of the format plus its schema location. */
export function namespaceAttributes(format: ContainerFormat): XmlNode {
  const attributes: XmlNode = {};
  for (const ns of format.namespaces) {
    attributes[`@_xmlns:${ns.prefix.value}`] = ns.uri.value;
  }
  attributes["@_xmlns:xsi"] = "http://www.w3.org/2001/XMLSchema-instance";
  attributes["@_xsi:schemaLocation"] = `${format.metadataNamespace.value} ${format.schema.value}`;
  return attributes;
}
