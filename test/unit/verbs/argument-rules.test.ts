// ---------------------------------------------------------------------------
// Tests for the per-verb argument rules
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import type { OaiVerb, RequestDTO } from "../../../src/core/types.js";
import { Granularity } from "../../../src/domain/value-objects/granularity.js";
import { ARGUMENT_RULES, checkArguments, suppliedArguments } from "../../../src/verbs/argument-rules.js";

function req(verb: OaiVerb, args: Partial<Omit<RequestDTO, "verb">> = {}): RequestDTO {
  return {
    verb,
    identifier: null,
    metadataPrefix: null,
    from: null,
    until: null,
    set: null,
    resumptionToken: null,
    ...args,
  };
}

function messages(request: RequestDTO, granularity: Granularity = Granularity.DATE_TIME_SECOND): string[] {
  return checkArguments(request, granularity).entries.flatMap((e) => e.messages);
}

describe("ARGUMENT_RULES", () => {
  it("covers every verb", () => {
    expect(Object.keys(ARGUMENT_RULES).sort()).toEqual([
      "GetRecord",
      "Identify",
      "ListIdentifiers",
      "ListMetadataFormats",
      "ListRecords",
      "ListSets",
    ]);
  });

  it("never names the verb as an argument", () => {
    for (const rule of Object.values(ARGUMENT_RULES)) {
      expect([...rule.required, ...rule.optional]).not.toContain("verb");
      expect(rule.exclusive).not.toBe("verb");
    }
  });
});

describe("suppliedArguments", () => {
  it("lists non-null arguments in canonical order", () => {
    expect(suppliedArguments(req("ListRecords", { set: "a", metadataPrefix: "oai_dc" }))).toEqual([
      "metadataPrefix",
      "set",
    ]);
  });
});

describe("checkArguments", () => {
  it("accepts Identify alone", () => {
    expect(checkArguments(req("Identify"), Granularity.DATE)).toEqual({ entries: [] });
  });

  it("rejects arguments a verb does not take", () => {
    expect(checkArguments(req("Identify", { identifier: "x" }), Granularity.DATE)).toEqual({
      entries: [
        {
          code: "badArgument",
          messages: ['The argument "identifier" is not allowed for the verb Identify'],
        },
      ],
    });
    expect(messages(req("ListSets", { set: "math" }))).toEqual([
      'The argument "set" is not allowed for the verb ListSets',
    ]);
  });

  it("reports every missing required argument", () => {
    expect(messages(req("GetRecord"))).toEqual([
      'The required argument "identifier" is missing for the verb GetRecord',
      'The required argument "metadataPrefix" is missing for the verb GetRecord',
    ]);
    expect(messages(req("ListIdentifiers"))).toEqual([
      'The required argument "metadataPrefix" is missing for the verb ListIdentifiers',
    ]);
  });

  it("lets resumptionToken stand alone", () => {
    expect(messages(req("ListRecords", { resumptionToken: "abc" }))).toEqual([]);
    expect(messages(req("ListSets", { resumptionToken: "abc" }))).toEqual([]);
  });

  it("refuses anything next to resumptionToken", () => {
    expect(
      messages(req("ListRecords", { resumptionToken: "abc", metadataPrefix: "oai_dc", set: "math" })),
    ).toEqual([
      'The argument "metadataPrefix" cannot be combined with the exclusive argument "resumptionToken"',
      'The argument "set" cannot be combined with the exclusive argument "resumptionToken"',
    ]);
  });

  it("rejects resumptionToken for verbs without paging", () => {
    expect(messages(req("Identify", { resumptionToken: "abc" }))).toEqual([
      'The argument "resumptionToken" is not allowed for the verb Identify',
    ]);
  });

  it("rejects an empty identifier", () => {
    expect(messages(req("ListMetadataFormats", { identifier: "" }))).toEqual([
      "The identifier argument must not be empty",
    ]);
  });

  it("rejects a malformed set spec", () => {
    expect(messages(req("ListRecords", { metadataPrefix: "oai_dc", set: "math::x" }))).toEqual([
      'The value "math::x" of the set argument is not a valid setSpec',
    ]);
  });

  describe("from and until", () => {
    const harvest = (from: string | null, until: string | null) =>
      req("ListRecords", { metadataPrefix: "oai_dc", from, until });

    it("accepts either granularity on a seconds repository", () => {
      expect(messages(harvest("2021-01-01", "2021-02-01"))).toEqual([]);
      expect(messages(harvest("2021-01-01T00:00:00Z", "2021-02-01T00:00:00Z"))).toEqual([]);
      expect(messages(harvest("2021-01-01", null))).toEqual([]);
    });

    it("rejects datestamps that do not parse", () => {
      expect(messages(harvest("2021-13-01", "yesterday"))).toEqual([
        'The value "2021-13-01" of the from argument is not a valid datestamp',
        'The value "yesterday" of the until argument is not a valid datestamp',
      ]);
    });

    it("rejects seconds on a day-granularity repository", () => {
      expect(messages(harvest("2021-01-01T00:00:00Z", null), Granularity.DATE)).toEqual([
        'The value "2021-01-01T00:00:00Z" of the from argument is finer than the repository granularity YYYY-MM-DD',
      ]);
    });

    it("rejects mixed granularities", () => {
      expect(messages(harvest("2021-01-01", "2021-02-01T00:00:00Z"))).toEqual([
        "The from and until arguments must have the same granularity",
      ]);
    });

    it("rejects from after until", () => {
      expect(messages(harvest("2021-02-01", "2021-01-01"))).toEqual([
        "The from argument must be less than or equal to the until argument",
      ]);
      expect(messages(harvest("2021-01-01", "2021-01-01"))).toEqual([]);
    });
  });
});
