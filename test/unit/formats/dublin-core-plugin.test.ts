import { describe, it, expect } from "vitest";

import { DC_ELEMENTS, DublinCorePlugin } from "../../../src/formats/dublin-core-plugin.js";

describe("DublinCorePlugin", () => {
  const plugin = new DublinCorePlugin();

  it("describes the oai_dc format", () => {
    expect(plugin.format.metadataPrefix.value).toBe("oai_dc");
    expect(plugin.format.schema.value).toBe("http://www.openarchives.org/OAI/2.0/oai_dc.xsd");
    expect(plugin.format.metadataNamespace.value).toBe("http://www.openarchives.org/OAI/2.0/oai_dc/");
    expect(plugin.format.rootTag.value).toBe("oai_dc:dc");
  });

  it("knows the fifteen DCMES elements", () => {
    expect(DC_ELEMENTS).toHaveLength(15);
    expect(DC_ELEMENTS[0]).toBe("title");
    expect(DC_ELEMENTS[14]).toBe("rights");
  });

  it("emits elements in schema order whatever the payload order", () => {
    const node = plugin.render({ rights: "CC0", creator: ["A", "B"], title: "T" });
    const root = node["oai_dc:dc"];
    expect(typeof root === "object" && !Array.isArray(root) ? Object.keys(root) : []).toEqual([
      "@_xmlns:oai_dc",
      "@_xmlns:dc",
      "@_xmlns:xsi",
      "@_xsi:schemaLocation",
      "dc:title",
      "dc:creator",
      "dc:rights",
    ]);
  });

  it("drops blank values and unknown keys", () => {
    const node = plugin.render({
      title: "T",
      subject: "  ",
      description: [],
      creator: ["A", " "],
      shelfmark: "X-1",
    });
    expect(node).toEqual({
      "oai_dc:dc": {
        "@_xmlns:oai_dc": "http://www.openarchives.org/OAI/2.0/oai_dc/",
        "@_xmlns:dc": "http://purl.org/dc/elements/1.1/",
        "@_xmlns:xsi": "http://www.w3.org/2001/XMLSchema-instance",
        "@_xsi:schemaLocation":
          "http://www.openarchives.org/OAI/2.0/oai_dc/ http://www.openarchives.org/OAI/2.0/oai_dc.xsd",
        "dc:title": "T",
        "dc:creator": "A",
      },
    });
  });
});
