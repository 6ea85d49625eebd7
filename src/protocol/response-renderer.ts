// ---------------------------------------------------------------------------
// OAI-PMH response envelope, built with fast-xml-parser's XMLBuilder.
// ---------------------------------------------------------------------------

import { XMLBuilder } from "fast-xml-parser";
import { OaiErrorCode } from "../core/types.js";
import type { ErrorReport, RequestDTO, VerbBody, XmlNode } from "../core/types.js";
import { Granularity } from "../domain/value-objects/granularity.js";
import { UTCdatetime } from "../domain/value-objects/utc-datetime.js";
import { suppliedArguments } from "../verbs/argument-rules.js";

export const OAI_PMH_NAMESPACE = "http://www.openarchives.org/OAI/2.0/";
export const OAI_PMH_SCHEMA = "http://www.openarchives.org/OAI/2.0/OAI-PMH.xsd";

export interface RenderContext {
  baseURL: string;
  responseDate: Date;
}

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  suppressBooleanAttributes: false,
  format: true,
  indentBy: "  ",
});

/** `<request>` echo: base URL as text, request arguments as attributes. */
function requestNode(baseURL: string, request: RequestDTO | null): XmlNode {
  const node: XmlNode = {};
  if (request) {
    node["@_verb"] = request.verb;
    for (const arg of suppliedArguments(request)) {
      node[`@_${arg}`] = request[arg] ?? "";
    }
  }
  node["#text"] = baseURL;
  return node;
}

function envelope(ctx: RenderContext, request: RequestDTO | null, body: XmlNode): string {
  const document: XmlNode = {
    "?xml": { "@_version": "1.0", "@_encoding": "UTF-8" },
    "OAI-PMH": {
      "@_xmlns": OAI_PMH_NAMESPACE,
      "@_xmlns:xsi": "http://www.w3.org/2001/XMLSchema-instance",
      "@_xsi:schemaLocation": `${OAI_PMH_NAMESPACE} ${OAI_PMH_SCHEMA}`,
      responseDate: UTCdatetime.format(ctx.responseDate, Granularity.DATE_TIME_SECOND),
      request: requestNode(ctx.baseURL, request),
      ...body,
    },
  };
  return builder.build(document);
}

export function renderResponse(
  ctx: RenderContext,
  request: RequestDTO,
  body: VerbBody,
): string {
  return envelope(ctx, request, { [body.element]: body.content });
}

/**
 * One `<error>` per message, grouped by code. Request arguments are echoed
 * only when the request itself was well formed.
 */
export function renderErrors(
  ctx: RenderContext,
  request: RequestDTO | null,
  report: ErrorReport,
): string {
  const malformed = report.entries.some(
    (entry) =>
      entry.code === OaiErrorCode.BAD_VERB || entry.code === OaiErrorCode.BAD_ARGUMENT,
  );
  const errors: XmlNode[] = report.entries.flatMap((entry) =>
    entry.messages.map((message) => ({ "@_code": entry.code, "#text": message })),
  );
  return envelope(ctx, malformed ? null : request, { error: errors });
}
