import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import { createLogger, createChildLogger } from "./logger.js";
import { REDACT_PATHS, buildRedactPaths } from "./redaction.js";

function captureStream(lines: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      lines.push(chunk.toString());
      callback();
    },
  });
}

describe("buildRedactPaths", () => {
  it("covers each key at the top level and one level down", () => {
    expect(buildRedactPaths(["apiKey"])).toEqual([
      "apiKey",
      "*.apiKey",
      "headers.authorization",
      "headers.cookie",
      'headers["x-api-key"]',
      "req.headers.authorization",
      "req.headers.cookie",
      'req.headers["x-api-key"]',
    ]);
  });

  it("default paths include provider credentials", () => {
    expect(REDACT_PATHS).toContain("apiKey");
    expect(REDACT_PATHS).toContain("*.apiKey");
    expect(REDACT_PATHS).toContain("*.authorization");
  });
});

describe("createLogger", () => {
  it("writes JSON lines with the service name", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "info", service: "test-svc", destination: captureStream(lines) });

    logger.info({ documentId: "doc-1" }, "ingested");

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0] ?? "{}") as Record<string, unknown>;
    expect(entry["name"]).toBe("test-svc");
    expect(entry["msg"]).toBe("ingested");
    expect(entry["documentId"]).toBe("doc-1");
  });

  it("redacts nested api keys", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "info", destination: captureStream(lines) });

    logger.info({ pinecone: { apiKey: "test-secret", indexName: "rag-main" } }, "config");

    const entry = JSON.parse(lines[0] ?? "{}") as { pinecone: Record<string, unknown> };
    expect(entry.pinecone["apiKey"]).toBe("[REDACTED]");
    expect(entry.pinecone["indexName"]).toBe("rag-main");
  });

  it("child loggers carry their bindings", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "info", destination: captureStream(lines) });

    createChildLogger(logger, { requestId: "req-7" }).info("hello");

    const entry = JSON.parse(lines[0] ?? "{}") as Record<string, unknown>;
    expect(entry["requestId"]).toBe("req-7");
  });

  it("respects the level", () => {
    const lines: string[] = [];
    const logger = createLogger({ level: "warn", destination: captureStream(lines) });

    logger.info("dropped");
    logger.warn("kept");

    expect(lines).toHaveLength(1);
  });
});
