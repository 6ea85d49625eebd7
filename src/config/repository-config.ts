// ---------------------------------------------------------------------------
// Repository file loader.
// Reads the repository YAML, validates it with Zod, and builds the domain
// objects the verb handlers serve.
// ---------------------------------------------------------------------------

import fs from "node:fs";
import { z } from "zod";
import { parse } from "yaml";
import { ConfigurationError, OaiPmhError } from "../core/errors.js";
import { OaiRecord } from "../domain/entities/oai-record.js";
import { OaiSet } from "../domain/entities/oai-set.js";
import { RecordHeader } from "../domain/entities/record-header.js";
import { BaseURL } from "../domain/identity/base-url.js";
import { parseDeletedRecord } from "../domain/identity/deleted-record.js";
import { Description, DescriptionCollection, DescriptionFormat } from "../domain/identity/description.js";
import { EmailCollection } from "../domain/identity/email-collection.js";
import { Email } from "../domain/identity/email.js";
import { ProtocolVersion } from "../domain/identity/protocol-version.js";
import { RepositoryIdentity } from "../domain/identity/repository-identity.js";
import { RepositoryName } from "../domain/identity/repository-name.js";
import { MetadataNamespaceCollection } from "../domain/metadata/metadata-namespace-collection.js";
import { MetadataNamespace } from "../domain/metadata/metadata-namespace.js";
import { AnyUri } from "../domain/value-objects/any-uri.js";
import { parseGranularity } from "../domain/value-objects/granularity.js";
import { MetadataRootTag } from "../domain/value-objects/metadata-root-tag.js";
import { NamespacePrefix } from "../domain/value-objects/namespace-prefix.js";
import { RecordIdentifier } from "../domain/value-objects/record-identifier.js";
import { SetSpec } from "../domain/value-objects/set-spec.js";
import { UTCdatetime } from "../domain/value-objects/utc-datetime.js";
import { MetadataFormatRegistry } from "../formats/format-registry.js";
import { InMemoryRecordStore } from "../store/in-memory-record-store.js";
import type { RecordStore } from "../store/record-store.js";

// ── Zod schemas ─────────────────────────────────────────────────────────────

const DataValueSchema = z.union([z.string(), z.array(z.string())]);

export const DescriptionSchema = z.object({
  rootTag: z.string().min(1),
  schema: z.string().min(1),
  namespaces: z.array(z.object({ prefix: z.string().min(1), uri: z.string().min(1) })).min(1),
  data: z.record(DataValueSchema),
});

export const IdentitySchema = z.object({
  repositoryName: z.string().min(1),
  baseURL: z.string().min(1),
  protocolVersion: z.string().default("2.0"),
  adminEmails: z.array(z.string()).min(1),
  earliestDatestamp: z.string().min(1),
  deletedRecord: z.string().default("no"),
  granularity: z.string().default("YYYY-MM-DDThh:mm:ssZ"),
  descriptions: z.array(DescriptionSchema).default([]),
});

export const SetSchema = z.object({
  spec: z.string().min(1),
  name: z.string().min(1),
  description: z.string().optional(),
});

export const RecordSchema = z.object({
  identifier: z.string().min(1),
  datestamp: z.string().min(1),
  deleted: z.boolean().default(false),
  sets: z.array(z.string()).default([]),
  metadata: z.record(DataValueSchema).optional(),
});

export const RepositoryFileSchema = z.object({
  identity: IdentitySchema,
  formats: z.array(z.string().min(1)).min(1).default(["oai_dc"]),
  sets: z.array(SetSchema).default([]),
  records: z.array(RecordSchema).default([]),
});

export type RepositoryFile = z.infer<typeof RepositoryFileSchema>;

export interface RepositoryConfig {
  identity: RepositoryIdentity;
  formats: MetadataFormatRegistry;
  store: RecordStore;
}

// ── Environment placeholders ────────────────────────────────────────────────

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `${NAME}` in every string of `value` with `env.NAME`. */
export function resolvePlaceholders(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigurationError(`Environment variable ${name} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => resolvePlaceholders(item, env));
  }
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, resolvePlaceholders(item, env)]),
    );
  }
  return value;
}

// ── Domain construction ─────────────────────────────────────────────────────

function buildDescription(raw: z.infer<typeof DescriptionSchema>): Description {
  const namespaces = new MetadataNamespaceCollection(
    ...raw.namespaces.map(
      (ns) => new MetadataNamespace(new NamespacePrefix(ns.prefix), new AnyUri(ns.uri)),
    ),
  );
  const format = new DescriptionFormat(
    namespaces,
    new AnyUri(raw.schema),
    new MetadataRootTag(raw.rootTag),
  );
  return new Description(format, raw.data);
}

/** Build domain objects from an already validated repository file. */
export function buildRepositoryConfig(file: RepositoryFile): RepositoryConfig {
  const granularity = parseGranularity(file.identity.granularity);

  const identity = new RepositoryIdentity({
    repositoryName: new RepositoryName(file.identity.repositoryName),
    baseURL: new BaseURL(file.identity.baseURL),
    protocolVersion: new ProtocolVersion(file.identity.protocolVersion),
    adminEmails: new EmailCollection(...file.identity.adminEmails.map((e) => new Email(e))),
    earliestDatestamp: new UTCdatetime(file.identity.earliestDatestamp, granularity),
    deletedRecord: parseDeletedRecord(file.identity.deletedRecord),
    granularity,
    descriptions: new DescriptionCollection(...file.identity.descriptions.map(buildDescription)),
  });

  const sets = file.sets.map(
    (set) => new OaiSet(new SetSpec(set.spec), set.name, set.description ?? null),
  );

  const records = file.records.map((record) => {
    const header = new RecordHeader(
      new RecordIdentifier(record.identifier),
      new UTCdatetime(record.datestamp, granularity),
      record.deleted,
      record.sets.map((spec) => new SetSpec(spec)),
    );
    return new OaiRecord(header, record.deleted ? null : record.metadata ?? {});
  });

  return {
    identity,
    formats: MetadataFormatRegistry.fromPrefixes(file.formats),
    store: new InMemoryRecordStore(records, sets),
  };
}

/**
 * Parse and validate repository YAML text.
 *
 * @throws ConfigurationError naming `source` and every problem found.
 */
export function parseRepositoryConfig(
  text: string,
  source: string,
  env: NodeJS.ProcessEnv = process.env,
): RepositoryConfig {
  let raw: unknown;
  try {
    raw = resolvePlaceholders(parse(text), env);
  } catch (err) {
    if (err instanceof ConfigurationError) {
      throw new ConfigurationError(`${source}: ${err.message}`, { cause: err });
    }
    throw new ConfigurationError(`${source}: not valid YAML`, { cause: err });
  }

  const result = RepositoryFileSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ConfigurationError(`${source}: ${issues}`);
  }

  try {
    return buildRepositoryConfig(result.data);
  } catch (err) {
    if (err instanceof OaiPmhError) {
      throw new ConfigurationError(`${source}: ${err.message}`, { cause: err });
    }
    throw err;
  }
}

/** Read and parse the repository file at `filePath`. */
export function loadRepositoryConfig(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env,
): RepositoryConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Repository file not found: ${filePath}`);
  }
  return parseRepositoryConfig(fs.readFileSync(filePath, "utf-8"), filePath, env);
}
