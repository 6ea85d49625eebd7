// ---------------------------------------------------------------------------
// Tests for protocol-level request validation
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import type { ValidationResult } from "../../../src/core/types.js";
import { ParsedQuery } from "../../../src/protocol/parsed-query.js";
import { REQUEST_CHECKS, RequestValidator } from "../../../src/protocol/request-validator.js";

function validate(raw: string): ValidationResult {
  return new RequestValidator().validate(new ParsedQuery(raw));
}

describe("RequestValidator", () => {
  it("runs five checks", () => {
    expect(REQUEST_CHECKS).toHaveLength(5);
  });

  it("accepts a well-formed request and keeps first occurrences", () => {
    const result = validate("verb=ListRecords&metadataPrefix=oai_dc");
    expect(result).toEqual({
      ok: true,
      request: {
        verb: "ListRecords",
        identifier: null,
        metadataPrefix: "oai_dc",
        from: null,
        until: null,
        set: null,
        resumptionToken: null,
      },
    });
    if (result.ok) expect(Object.isFrozen(result.request)).toBe(true);
  });

  it("reports a missing verb", () => {
    expect(validate("")).toEqual({
      ok: false,
      report: {
        entries: [{ code: "badVerb", messages: ["The verb argument is missing in the request"] }],
      },
    });
  });

  it("reports a repeated verb", () => {
    expect(validate("verb=ListRecords&verb=GetRecord")).toEqual({
      ok: false,
      report: {
        entries: [{ code: "badVerb", messages: ["The verb argument is repeated in the request"] }],
      },
    });
  });

  it("reports an unsupported verb and an illegal argument together", () => {
    expect(validate("verb=Foo&bogus=1")).toEqual({
      ok: false,
      report: {
        entries: [
          {
            code: "badVerb",
            messages: ['The value "Foo" of the verb argument is not supported by the OAI-PMH protocol'],
          },
          { code: "badArgument", messages: ['Illegal argument "bogus" in the request'] },
        ],
      },
    });
  });

  it("treats an empty verb as unsupported", () => {
    const result = validate("verb=");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.report.entries).toEqual([
        {
          code: "badVerb",
          messages: ['The value "" of the verb argument is not supported by the OAI-PMH protocol'],
        },
      ]);
    }
  });

  it("reports every repeated argument", () => {
    const result = validate("verb=ListRecords&set=a&set=b&from=2020-01-01&from=2021-01-01");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.report.entries).toEqual([
        {
          code: "badArgument",
          messages: [
            'Argument "from" is repeated in the request',
            'Argument "set" is repeated in the request',
          ],
        },
      ]);
    }
  });

  it("is case-sensitive for verbs and argument names", () => {
    const result = validate("verb=identify&MetadataPrefix=oai_dc");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.report.entries.map((e) => e.code)).toEqual(["badVerb", "badArgument"]);
    }
  });
});
