// ---------------------------------------------------------------------------
// Application bootstrap.
// ---------------------------------------------------------------------------

import type { Hono } from "hono";
import path from "node:path";

import type { AppEnv } from "./api/env.js";
import { createApp } from "./api/server.js";
import { loadConfig } from "./config/config.js";
import { loadRepositoryConfig } from "./config/repository-config.js";
import type { AppConfig } from "./core/types.js";
import { BaseURL } from "./domain/identity/base-url.js";
import { createLogger } from "./logging/logger.js";
import type { Logger } from "./logging/logger.js";
import { OaiService } from "./protocol/oai-service.js";
import { RequestHandler } from "./verbs/request-handler.js";

export interface BuiltApp {
  app: Hono<AppEnv>;
  config: AppConfig;
  logger: Logger;
}

export function buildApp(env: NodeJS.ProcessEnv = process.env): BuiltApp {
  // 1. Load configuration
  const config = loadConfig(env);

  // 2. Create logger
  const logger = createLogger({
    level: config.logLevel,
    env: config.env,
    prettyPrint: config.env === "development" && env["NODE_ENV"] !== "test",
    redactSecrets: true,
  });

  // 3. Load the repository: identity, formats, sets and records
  const repositoryFile = path.resolve(config.repositoryFile);
  const repository = loadRepositoryConfig(repositoryFile, env);
  const identity =
    config.baseUrl === null
      ? repository.identity
      : repository.identity.withBaseURL(new BaseURL(config.baseUrl));

  // 4. Wire the protocol pipeline
  const handler = new RequestHandler({
    identity,
    formats: repository.formats,
    store: repository.store,
  });
  const oaiService = new OaiService({
    identity,
    handler,
    logger: logger.child({ module: "oai" }),
  });

  // 5. Create Hono app
  const app = createApp({ oaiService, logger });

  logger.info(
    {
      port: config.port,
      env: config.env,
      repositoryFile,
      baseURL: identity.baseURL.value,
      formats: repository.formats.list().map((p) => p.format.metadataPrefix.value),
      records: repository.store.listRecords().length,
      sets: repository.store.listSets().length,
    },
    "OAI-PMH repository ready",
  );

  return { app, config, logger };
}
