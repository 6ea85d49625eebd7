import type { XmlNode } from "../core/types.js";
import type { OaiRecord } from "../domain/entities/oai-record.js";
import type { RecordHeader } from "../domain/entities/record-header.js";
import type { MetadataFormatPlugin } from "../formats/metadata-format-plugin.js";

export function headerNode(header: RecordHeader): XmlNode {
  const node: XmlNode = {};
  if (header.isDeleted) node["@_status"] = "deleted";
  node.identifier = header.identifier.value;
  node.datestamp = header.datestamp.value;
  if (header.setSpecs.length > 0) {
    node.setSpec = header.setSpecs.map((spec) => spec.value);
  }
  return node;
}

/** `<record>` element; deleted records carry a header only. */
export function recordNode(record: OaiRecord, plugin: MetadataFormatPlugin): XmlNode {
  const node: XmlNode = { header: headerNode(record.header) };
  const payload = record.getMetadata();
  if (!record.isDeleted && payload !== null) {
    node.metadata = plugin.render(payload);
  }
  return node;
}
