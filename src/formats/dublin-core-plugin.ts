// ---------------------------------------------------------------------------
// Simple Dublin Core (oai_dc), the format every repository must support.
// ---------------------------------------------------------------------------

import type { XmlNode, XmlValue } from "../core/types.js";
import type { MetadataPayload } from "../domain/entities/oai-record.js";
import { MetadataFormat } from "../domain/metadata/metadata-format.js";
import { MetadataNamespace } from "../domain/metadata/metadata-namespace.js";
import { MetadataNamespaceCollection } from "../domain/metadata/metadata-namespace-collection.js";
import { AnyUri } from "../domain/value-objects/any-uri.js";
import { MetadataPrefix } from "../domain/value-objects/metadata-prefix.js";
import { MetadataRootTag } from "../domain/value-objects/metadata-root-tag.js";
import { NamespacePrefix } from "../domain/value-objects/namespace-prefix.js";
import { namespaceAttributes, type MetadataFormatPlugin } from "./metadata-format-plugin.js";

export const OAI_DC_NAMESPACE = "http://www.openarchives.org/OAI/2.0/oai_dc/";
export const DC_ELEMENTS_NAMESPACE = "http://purl.org/dc/elements/1.1/";
export const OAI_DC_SCHEMA = "http://www.openarchives.org/OAI/2.0/oai_dc.xsd";

/** The fifteen DCMES 1.1 elements, in schema order. */
export const DC_ELEMENTS = [
  "title",
  "creator",
  "subject",
  "description",
  "publisher",
  "contributor",
  "date",
  "type",
  "format",
  "identifier",
  "source",
  "language",
  "relation",
  "coverage",
  "rights",
] as const;

export function createDublinCoreFormat(): MetadataFormat {
  return new MetadataFormat(
    new MetadataPrefix("oai_dc"),
    new MetadataNamespaceCollection(
      new MetadataNamespace(new NamespacePrefix("oai_dc"), new AnyUri(OAI_DC_NAMESPACE)),
      new MetadataNamespace(new NamespacePrefix("dc"), new AnyUri(DC_ELEMENTS_NAMESPACE)),
    ),
    new AnyUri(OAI_DC_SCHEMA),
    new MetadataRootTag("oai_dc:dc"),
  );
}

/**
 * Maps payload keys named after DC elements onto `dc:*` elements. Each
 * non-empty value becomes one element; other keys are ignored.
 */
export class DublinCorePlugin implements MetadataFormatPlugin {
  readonly format: MetadataFormat = createDublinCoreFormat();

  render(payload: MetadataPayload): XmlNode {
    const root: XmlNode = namespaceAttributes(this.format);

    for (const element of DC_ELEMENTS) {
      const raw = payload[element];
      if (raw === undefined) continue;

      const values = (typeof raw === "string" ? [raw] : [...raw]).filter(
        (v) => v.trim() !== "",
      );
      if (values.length === 0) continue;

      const node: XmlValue = values.length === 1 ? values[0] : values;
      root[`dc:${element}`] = node;
    }

    return { [this.format.rootTag.value]: root };
  }
}
