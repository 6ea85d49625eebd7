// ---------------------------------------------------------------------------
// Shared test repository: identity, sets, records and the wired pipeline.
// ---------------------------------------------------------------------------

import { XMLParser } from "fast-xml-parser";
import pino from "pino";

import { OaiRecord } from "../../src/domain/entities/oai-record.js";
import { OaiSet } from "../../src/domain/entities/oai-set.js";
import { RecordHeader } from "../../src/domain/entities/record-header.js";
import { BaseURL } from "../../src/domain/identity/base-url.js";
import { DeletedRecord } from "../../src/domain/identity/deleted-record.js";
import { Description, DescriptionCollection, DescriptionFormat } from "../../src/domain/identity/description.js";
import { EmailCollection } from "../../src/domain/identity/email-collection.js";
import { Email } from "../../src/domain/identity/email.js";
import { ProtocolVersion } from "../../src/domain/identity/protocol-version.js";
import { RepositoryIdentity } from "../../src/domain/identity/repository-identity.js";
import { RepositoryName } from "../../src/domain/identity/repository-name.js";
import { MetadataNamespaceCollection } from "../../src/domain/metadata/metadata-namespace-collection.js";
import { MetadataNamespace } from "../../src/domain/metadata/metadata-namespace.js";
import { AnyUri } from "../../src/domain/value-objects/any-uri.js";
import { Granularity } from "../../src/domain/value-objects/granularity.js";
import { MetadataRootTag } from "../../src/domain/value-objects/metadata-root-tag.js";
import { NamespacePrefix } from "../../src/domain/value-objects/namespace-prefix.js";
import { RecordIdentifier } from "../../src/domain/value-objects/record-identifier.js";
import { SetSpec } from "../../src/domain/value-objects/set-spec.js";
import { UTCdatetime } from "../../src/domain/value-objects/utc-datetime.js";
import { MetadataFormatRegistry } from "../../src/formats/format-registry.js";
import type { Logger } from "../../src/logging/logger.js";
import { OaiService } from "../../src/protocol/oai-service.js";
import { InMemoryRecordStore } from "../../src/store/in-memory-record-store.js";
import { RequestHandler } from "../../src/verbs/request-handler.js";
import type { RepositoryContext } from "../../src/verbs/verb-handler.js";

export const BASE_URL = "http://repo.test/oai";
export const RESPONSE_DATE = new Date("2024-05-01T10:00:00Z");

export const OAI_IDENTIFIER_NAMESPACE = "http://www.openarchives.org/OAI/2.0/oai-identifier";

/** An unqualified `oai-identifier` description for repo.test. */
export function oaiIdentifierDescription(
  data: Record<string, string | string[]> = {
    scheme: "oai",
    repositoryIdentifier: "repo.test",
    delimiter: ":",
  },
): Description {
  const format = new DescriptionFormat(
    new MetadataNamespaceCollection(
      new MetadataNamespace(
        new NamespacePrefix("oai-identifier"),
        new AnyUri(OAI_IDENTIFIER_NAMESPACE),
      ),
    ),
    new AnyUri(`${OAI_IDENTIFIER_NAMESPACE}.xsd`),
    new MetadataRootTag("oai-identifier"),
  );
  return new Description(format, data);
}

export function testIdentity(
  granularity: Granularity = Granularity.DATE_TIME_SECOND,
  descriptions: Description[] = [],
): RepositoryIdentity {
  return new RepositoryIdentity({
    repositoryName: new RepositoryName("Test Repository"),
    baseURL: new BaseURL(BASE_URL),
    protocolVersion: new ProtocolVersion(),
    adminEmails: new EmailCollection(new Email("admin@repo.test")),
    earliestDatestamp:
      granularity === Granularity.DATE
        ? new UTCdatetime("2020-01-01", granularity)
        : new UTCdatetime("2020-01-01T00:00:00Z", granularity),
    deletedRecord: DeletedRecord.PERSISTENT,
    granularity,
    descriptions: new DescriptionCollection(...descriptions),
  });
}

export function record(
  id: string,
  datestamp: string,
  sets: string[],
  metadata: Record<string, string | string[]> | null,
  deleted = false,
): OaiRecord {
  const header = new RecordHeader(
    new RecordIdentifier(id),
    UTCdatetime.parse(datestamp),
    deleted,
    sets.map((s) => new SetSpec(s)),
  );
  return new OaiRecord(header, metadata);
}

/**
 * Four records: three live ones in math, math:algebra and physics, and a
 * deleted one in physics.
 */
export function testRecords(): OaiRecord[] {
  return [
    record("oai:repo.test:3", "2021-03-15T12:30:00Z", ["physics"], {
      title: "Waves",
      subject: "optics",
    }),
    record("oai:repo.test:1", "2021-01-10T10:00:00Z", ["math"], {
      title: "Groups",
      creator: ["Ada", "Bo"],
    }),
    record("oai:repo.test:2", "2021-02-01T00:00:00Z", ["math:algebra"], { title: "Rings" }),
    record("oai:repo.test:4", "2021-04-01T00:00:00Z", ["physics"], null, true),
  ];
}

export function testSets(): OaiSet[] {
  return [
    new OaiSet(new SetSpec("math"), "Mathematics", "Math papers"),
    new OaiSet(new SetSpec("math:algebra"), "Algebra"),
    new OaiSet(new SetSpec("physics"), "Physics"),
  ];
}

export interface ContextOptions {
  sets?: OaiSet[];
  records?: OaiRecord[];
  formats?: string[];
  granularity?: Granularity;
  descriptions?: Description[];
}

export function testContext(options: ContextOptions = {}): RepositoryContext {
  return {
    identity: testIdentity(options.granularity, options.descriptions),
    formats: MetadataFormatRegistry.fromPrefixes(options.formats ?? ["oai_dc"]),
    store: new InMemoryRecordStore(
      options.records ?? testRecords(),
      options.sets ?? testSets(),
    ),
  };
}

export const silentLogger: Logger = pino({ level: "silent" });

export function testService(options: ContextOptions = {}): OaiService {
  const ctx = testContext(options);
  return new OaiService({
    identity: ctx.identity,
    handler: new RequestHandler(ctx),
    logger: silentLogger,
    clock: () => RESPONSE_DATE,
  });
}

// ── XML inspection ─────────────────────────────────────────────────────────

const ALWAYS_ARRAY = new Set(["error", "record", "set", "metadataFormat", "adminEmail", "setSpec"]);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  ignoreDeclaration: true,
  parseTagValue: false,
  isArray: (name, jpath) =>
    ALWAYS_ARRAY.has(name) ||
    name.startsWith("dc:") ||
    jpath === "OAI-PMH.ListIdentifiers.header",
});

/** Parse a response document into a plain object tree. */
export function parseXml(xml: string): Record<string, unknown> {
  const parsed: unknown = parser.parse(xml);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error("response is not an XML document");
  }
  return Object.fromEntries(Object.entries(parsed));
}
