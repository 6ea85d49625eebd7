import { describe, it, expect } from "vitest";

import { createLogger } from "../../../src/logging/logger.js";

function capture(redactSecrets = true) {
  const lines: Record<string, unknown>[] = [];
  const logger = createLogger(
    { level: "info", env: "production", prettyPrint: false, redactSecrets },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

describe("createLogger", () => {
  it("stamps every line with service, env and an ISO time", () => {
    const { logger, lines } = capture();
    logger.info("ready");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      level: 30,
      msg: "ready",
      service: "oai-pmh-repository",
      env: "production",
    });
    expect(lines[0]?.["time"]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("drops lines below the configured level", () => {
    const { logger, lines } = capture();
    logger.debug("noise");
    expect(lines).toEqual([]);
  });

  it("redacts credential headers", () => {
    const { logger, lines } = capture();
    logger.info({ req: { headers: { authorization: "Basic test-secret", accept: "text/xml" } } }, "in");
    expect(lines[0]?.["req"]).toEqual({
      headers: { authorization: "[REDACTED]", accept: "text/xml" },
    });
  });

  it("leaves headers alone when redaction is off", () => {
    const { logger, lines } = capture(false);
    logger.info({ headers: { cookie: "session=test" } }, "in");
    expect(lines[0]?.["headers"]).toEqual({ cookie: "session=test" });
  });
});
