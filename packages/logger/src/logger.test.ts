import { describe, it, expect } from "vitest";
import { createChildLogger, createLogger } from "./logger.js";

function captureLogger(level = "info") {
  const lines: string[] = [];
  const logger = createLogger({
    level,
    service: "docguard-test",
    destination: {
      write: (line: string) => {
        lines.push(line);
      },
    },
  });
  const entries = () => lines.map((line): unknown => JSON.parse(line));
  return { logger, entries };
}

describe("createLogger", () => {
  it("masks e-mail addresses and SSNs in the message", () => {
    const { logger, entries } = captureLogger();

    logger.info("Query from jane@example.com about 123-45-6789");

    expect(entries()).toEqual([
      expect.objectContaining({ level: 30, name: "docguard-test", msg: "Query from [REDACTED] about [REDACTED]" }),
    ]);
  });

  it("masks printf-style arguments", () => {
    const { logger, entries } = captureLogger();

    logger.warn("Ingest requested by %s", "jane@example.com");

    expect(entries()[0]).toMatchObject({ level: 40, msg: "Ingest requested by [REDACTED]" });
  });

  it("masks string fields and censors credential keys in any case", () => {
    const { logger, entries } = captureLogger();

    logger.info(
      { query: "my SSN is 123-45-6789", apiKey: "test-secret", Token: "test-token", chunkCount: 3 },
      "Query received",
    );

    expect(entries()[0]).toMatchObject({
      query: "my SSN is [REDACTED]",
      apiKey: "[REDACTED]",
      Token: "[REDACTED]",
      chunkCount: 3,
      msg: "Query received",
    });
  });

  it("censors credential keys one level down", () => {
    const { logger, entries } = captureLogger();

    logger.info({ request: { authorization: "Bearer test-token", host: "qdrant.test" } }, "Outbound call");

    expect(entries()[0]).toMatchObject({ request: { authorization: "[REDACTED]", host: "qdrant.test" } });
  });

  it("keeps child bindings and redaction together", () => {
    const { logger, entries } = captureLogger();

    createChildLogger(logger, { documentId: "doc-1" }).info({ uploader: "jane@example.com" }, "Document ingested");

    expect(entries()[0]).toMatchObject({ documentId: "doc-1", uploader: "[REDACTED]", msg: "Document ingested" });
  });

  it("drops lines below the configured level", () => {
    const { logger, entries } = captureLogger("warn");

    logger.info("Query received");
    logger.debug("Request state");

    expect(entries()).toEqual([]);
  });
});
