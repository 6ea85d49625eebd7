import { describe, it, expect } from "vitest";

import { ValidationError } from "../../../src/core/errors.js";
import { MetadataFormat } from "../../../src/domain/metadata/metadata-format.js";
import { MetadataNamespaceCollection } from "../../../src/domain/metadata/metadata-namespace-collection.js";
import { MetadataNamespace } from "../../../src/domain/metadata/metadata-namespace.js";
import { AnyUri } from "../../../src/domain/value-objects/any-uri.js";
import { MetadataPrefix } from "../../../src/domain/value-objects/metadata-prefix.js";
import { MetadataRootTag } from "../../../src/domain/value-objects/metadata-root-tag.js";
import { NamespacePrefix } from "../../../src/domain/value-objects/namespace-prefix.js";

function ns(prefix: string, uri: string): MetadataNamespace {
  return new MetadataNamespace(new NamespacePrefix(prefix), new AnyUri(uri));
}

const OAI_DC = ns("oai_dc", "http://www.openarchives.org/OAI/2.0/oai_dc/");
const DC = ns("dc", "http://purl.org/dc/elements/1.1/");

function thrown(fn: () => unknown): ValidationError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ValidationError) return err;
    throw err;
  }
  throw new Error("expected a ValidationError");
}

describe("MetadataNamespace", () => {
  it("renders as a namespace declaration", () => {
    expect(DC.toString()).toBe('xmlns:dc="http://purl.org/dc/elements/1.1/"');
  });

  it("compares prefix and uri", () => {
    expect(DC.equals(ns("dc", "http://purl.org/dc/elements/1.1/"))).toBe(true);
    expect(DC.equals(ns("dc", "http://purl.org/dc/terms/"))).toBe(false);
  });
});

describe("MetadataNamespaceCollection", () => {
  it("fails with EmptyCollection when empty", () => {
    const err = thrown(() => new MetadataNamespaceCollection());
    expect(err.kind).toBe("EmptyCollection");
    expect(err.field).toBe("namespaces");
  });

  it("rejects a repeated prefix, naming it", () => {
    const err = thrown(
      () => new MetadataNamespaceCollection(DC, ns("dc", "http://purl.org/dc/terms/")),
    );
    expect(err.kind).toBe("DuplicateEntry");
    expect(err.field).toBe("prefix");
    expect(err.value).toBe("dc");
  });

  it("rejects a repeated uri, naming it", () => {
    const err = thrown(
      () => new MetadataNamespaceCollection(DC, ns("dc2", "http://purl.org/dc/elements/1.1/")),
    );
    expect(err.kind).toBe("DuplicateEntry");
    expect(err.field).toBe("uri");
    expect(err.value).toBe("http://purl.org/dc/elements/1.1/");
  });

  it("iterates in insertion order", () => {
    const collection = new MetadataNamespaceCollection(OAI_DC, DC);
    expect([...collection].map((n) => n.prefix.value)).toEqual(["oai_dc", "dc"]);
    expect(collection.count).toBe(2);
    expect(collection.findByPrefix("dc")).toBe(DC);
    expect(collection.findByPrefix("marc")).toBeUndefined();
  });

  it("compares as a set of (prefix, uri) pairs", () => {
    const a = new MetadataNamespaceCollection(OAI_DC, DC);
    const b = new MetadataNamespaceCollection(DC, OAI_DC);
    const c = new MetadataNamespaceCollection(OAI_DC, DC);
    expect(a.equals(a)).toBe(true);
    expect(a.equals(b) && b.equals(a)).toBe(true);
    expect(b.equals(c) && a.equals(c)).toBe(true);
    expect(a.equals(new MetadataNamespaceCollection(OAI_DC))).toBe(false);
    expect(
      a.equals(new MetadataNamespaceCollection(OAI_DC, ns("dc", "http://purl.org/dc/terms/"))),
    ).toBe(false);
  });
});

describe("MetadataFormat", () => {
  function oaiDc(schema = "http://www.openarchives.org/OAI/2.0/oai_dc.xsd"): MetadataFormat {
    return new MetadataFormat(
      new MetadataPrefix("oai_dc"),
      new MetadataNamespaceCollection(OAI_DC, DC),
      new AnyUri(schema),
      new MetadataRootTag("oai_dc:dc"),
    );
  }

  it("takes its namespace from the root tag prefix", () => {
    expect(oaiDc().metadataNamespace.value).toBe("http://www.openarchives.org/OAI/2.0/oai_dc/");
  });

  it("falls back to the first namespace for an unqualified root tag", () => {
    const format = new MetadataFormat(
      new MetadataPrefix("simple"),
      new MetadataNamespaceCollection(DC),
      new AnyUri("http://repo.test/simple.xsd"),
      new MetadataRootTag("record"),
    );
    expect(format.metadataNamespace.value).toBe("http://purl.org/dc/elements/1.1/");
  });

  it("is equal only when all four parts are equal", () => {
    expect(oaiDc().equals(oaiDc())).toBe(true);
    expect(oaiDc().equals(oaiDc("http://repo.test/other.xsd"))).toBe(false);
  });
});
