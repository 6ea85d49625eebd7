import { OaiVerb } from "../core/types.js";
import type { RequestDTO, VerbBody, XmlNode } from "../core/types.js";
import { DublinCorePlugin } from "../formats/dublin-core-plugin.js";
import { badResumptionToken, noSetHierarchy } from "./protocol-errors.js";
import type { RepositoryContext, VerbHandler } from "./verb-handler.js";

export class ListSetsHandler implements VerbHandler {
  readonly verb = OaiVerb.LIST_SETS;
  // Set descriptions are always written as oai_dc.
  private readonly descriptions = new DublinCorePlugin();

  constructor(private readonly ctx: RepositoryContext) {}

  handle(request: RequestDTO): VerbBody {
    if (request.resumptionToken !== null) {
      throw badResumptionToken(request.resumptionToken);
    }
    if (!this.ctx.store.hasSets()) throw noSetHierarchy();

    const sets = this.ctx.store.listSets().map((set) => {
      const node: XmlNode = { setSpec: set.spec.value, setName: set.name };
      if (set.description !== null) {
        node.setDescription = this.descriptions.render({ description: set.description });
      }
      return node;
    });

    return { element: this.verb, content: { set: sets } };
  }
}
