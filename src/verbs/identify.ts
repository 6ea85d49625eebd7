import { OaiVerb } from "../core/types.js";
import type { VerbBody, XmlNode } from "../core/types.js";
import type { Description } from "../domain/identity/description.js";
import { namespaceAttributes } from "../formats/metadata-format-plugin.js";
import type { RepositoryContext, VerbHandler } from "./verb-handler.js";

/**
 * Content of one `<description>`. Children share the root tag's prefix; an
 * unqualified root declares its namespace as the default one.
 */
export function descriptionNode(description: Description): XmlNode {
  const { rootTag } = description.format;
  const qualify = rootTag.prefix === null ? "" : `${rootTag.prefix}:`;

  const root: XmlNode = namespaceAttributes(description.format);
  if (rootTag.prefix === null) {
    root["@_xmlns"] = description.format.metadataNamespace.value;
  }
  for (const [element, value] of Object.entries(description.getData())) {
    root[`${qualify}${element}`] = typeof value === "string" ? value : [...value];
  }
  return { [rootTag.value]: root };
}

export class IdentifyHandler implements VerbHandler {
  readonly verb = OaiVerb.IDENTIFY;

  constructor(private readonly ctx: RepositoryContext) {}

  handle(): VerbBody {
    const identity = this.ctx.identity;
    const content: XmlNode = {
      repositoryName: identity.repositoryName.value,
      baseURL: identity.baseURL.value,
      protocolVersion: identity.protocolVersion.value,
      adminEmail: identity.adminEmails.toArray().map((email) => email.value),
      earliestDatestamp: identity.earliestDatestamp.value,
      deletedRecord: identity.deletedRecord,
      granularity: identity.granularity,
    };
    if (identity.descriptions.count > 0) {
      content["description"] = identity.descriptions.toArray().map(descriptionNode);
    }
    return { element: this.verb, content };
  }
}
