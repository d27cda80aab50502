import { describe, it, expect, beforeEach } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { parseEnv } from "@ragsync/config";
import type { IEmbeddingProvider } from "@ragsync/embeddings";
import { ProviderError, StoreError } from "@ragsync/errors";
import { createSilentLogger } from "@ragsync/logger";
import type { AppConfig, EmbeddingResult } from "@ragsync/types";
import { InMemoryVectorStore } from "@ragsync/vector-store";
import { createApp } from "./app.js";
import { buildContext, type ContextOverrides } from "./context.js";

const DIM = 64;

function testEnv(extra: Record<string, string> = {}): AppConfig {
  return parseEnv({
    NODE_ENV: "test",
    EMBEDDING_PROVIDER: "hashing",
    VECTOR_STORE: "memory",
    EMBED_DIM: String(DIM),
    CHUNK_SIZE: "60",
    CHUNK_LOOKBACK: "20",
    DELETE_PAGE_SIZE: "2",
    ...extra,
  });
}

function buildApp(overrides: ContextOverrides = {}, env: Record<string, string> = {}): Express {
  const ctx = buildContext(testEnv(env), createSilentLogger(), { deleteRetryDelayMs: 0, ...overrides });
  return createApp(ctx);
}

function unitVector(axis: number): number[] {
  const vector = new Array<number>(DIM).fill(0);
  vector[axis] = 1;
  return vector;
}

function docPoints(documentId: string, count: number) {
  return Array.from({ length: count }, (_, i) => ({
    id: `${documentId}#${String(i)}`,
    values: unitVector(i),
    metadata: { document_id: documentId, chunk_index: i },
  }));
}

/** Fails the Nth deleteByIds call. */
class FlakyVectorStore extends InMemoryVectorStore {
  private deleteCalls = 0;

  constructor(private readonly failOnCall: number) {
    super();
  }

  override deleteByIds(namespace: string, ids: string[]): Promise<void> {
    this.deleteCalls += 1;
    if (this.deleteCalls === this.failOnCall) {
      return Promise.reject(new StoreError("memory deleteByIds failed: injected", "memory", "deleteByIds"));
    }
    return super.deleteByIds(namespace, ids);
  }
}

class FailingProvider implements IEmbeddingProvider {
  readonly name = "stub";
  readonly maxBatchSize = 8;

  embed(): Promise<EmbeddingResult> {
    return Promise.reject(new ProviderError("stub embedding failed", "stub"));
  }

  healthCheck(): Promise<boolean> {
    return Promise.resolve(false);
  }
}

describe("API", () => {
  let app: Express;

  beforeEach(() => {
    app = buildApp();
  });

  describe("GET /health", () => {
    it("reports the configured index", async () => {
      const res = await request(app).get("/health");

      expect(res.status).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          ok: true,
          vectorStore: "memory",
          index: "rag-main",
          namespaceDefault: "default",
          embedDim: DIM,
          embeddingProvider: "hashing",
        },
      });
    });

    it("echoes an incoming request id", async () => {
      const res = await request(app).get("/health").set("x-request-id", "req-123");
      expect(res.headers["x-request-id"]).toBe("req-123");
    });
  });

  describe("POST /extract", () => {
    it("returns normalized text of an uploaded file", async () => {
      const res = await request(app)
        .post("/extract")
        .attach("file", Buffer.from("Hello   world.\n\n\nSecond paragraph."), "notes.txt");

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ text: "Hello world.\n\nSecond paragraph.", kind: "text", pageCount: 1 });
    });

    it("rejects an image with 415", async () => {
      const png = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00, 0x00, 0x00, 0x0d]);
      const res = await request(app)
        .post("/extract")
        .attach("file", png, { filename: "image.png", contentType: "image/png" });

      expect(res.status).toBe(415);
      expect(res.body.error.code).toBe("UNSUPPORTED_DOCUMENT_KIND");
      expect(res.body.error.message).toBe("Unsupported document kind: image/png");
    });

    it("requires a file", async () => {
      const res = await request(app).post("/extract").field("mime", "text/plain");

      expect(res.status).toBe(400);
      expect(res.body.error.details.fields).toEqual({ file: "is required" });
    });
  });

  describe("POST /embed", () => {
    it("returns one vector per text", async () => {
      const res = await request(app).post("/embed").send({ texts: ["alpha beta", "gamma"] });

      expect(res.status).toBe(200);
      expect(res.body.data.model).toBe("hashing-v1");
      expect(res.body.data.dimensions).toBe(DIM);
      expect(res.body.data.vectors).toHaveLength(2);
      expect(res.body.data.vectors[0]).toHaveLength(DIM);
    });

    it("rejects an empty text list", async () => {
      const res = await request(app).post("/embed").send({ texts: [] });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("VALIDATION_ERROR");
      expect(Object.keys(res.body.error.details.fields)).toEqual(["texts"]);
    });

    it("rejects malformed JSON", async () => {
      const res = await request(app).post("/embed").set("content-type", "application/json").send('{"texts":');

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("BAD_REQUEST");
    });

    it("maps provider failures to 502", async () => {
      const res = await request(buildApp({ embeddingProvider: new FailingProvider() }))
        .post("/embed")
        .send({ texts: ["alpha"] });

      expect(res.status).toBe(502);
      expect(res.body.error.code).toBe("PROVIDER_ERROR");
      expect(res.body.error.message).toBe("stub embedding failed");
    });
  });

  describe("ingest and query", () => {
    it("ingests JSON text and finds it again", async () => {
      const ingest = await request(app)
        .post("/ingest")
        .send({ documentId: "doc-1", text: "Cats purr softly." });
      await request(app).post("/ingest").send({ documentId: "doc-2", text: "Rockets launch from the pad." });

      expect(ingest.status).toBe(201);
      expect(ingest.body.data).toEqual({
        documentId: "doc-1",
        namespace: "default",
        chunkCount: 1,
        ids: ["doc-1#0"],
        tokensUsed: 3,
        dimensions: DIM,
      });

      const res = await request(app).post("/vectors/query").send({ text: "cats purr softly", topK: 1 });

      expect(res.status).toBe(200);
      expect(res.body.data.namespace).toBe("default");
      expect(res.body.data.matches).toHaveLength(1);
      expect(res.body.data.matches[0].id).toBe("doc-1#0");
      expect(res.body.data.matches[0].score).toBeCloseTo(1, 6);
      expect(res.body.data.matches[0].metadata).toEqual({
        document_id: "doc-1",
        chunk_index: 0,
        text: "Cats purr softly.",
        source_kind: "text",
      });
    });

    it("ingests a multipart upload with JSON metadata", async () => {
      await request(app).post("/ingest").send({ documentId: "doc-1", text: "Cats purr softly." });
      const ingest = await request(app)
        .post("/ingest")
        .field("documentId", "doc-3")
        .field("metadata", '{"topic":"pets"}')
        .attach("file", Buffer.from("Dogs bark loudly."), "dogs.txt");

      expect(ingest.status).toBe(201);
      expect(ingest.body.data.ids).toEqual(["doc-3#0"]);

      const res = await request(app)
        .post("/vectors/query")
        .send({ text: "dogs", filter: { topic: "pets" } });

      expect(res.body.data.matches.map((m: { id: string }) => m.id)).toEqual(["doc-3#0"]);
      expect(res.body.data.matches[0].metadata.topic).toBe("pets");
    });

    it("rejects metadata that is not a JSON object", async () => {
      const res = await request(app)
        .post("/ingest")
        .field("documentId", "doc-3")
        .field("metadata", "not json")
        .attach("file", Buffer.from("Dogs bark loudly."), "dogs.txt");

      expect(res.status).toBe(400);
      expect(res.body.error.details.fields).toEqual({
        metadata: "must be a JSON object of string, number or boolean values",
      });
    });

    it("rejects text and vector together", async () => {
      const res = await request(app).post("/vectors/query").send({ text: "x", vector: unitVector(0) });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("INVALID_QUERY");
      expect(res.body.error.message).toBe("Provide either text or vector, not both");
    });

    it("rejects a filter with an unknown operator", async () => {
      const res = await request(app)
        .post("/vectors/query")
        .send({ text: "x", filter: { page: { $where: 1 } } });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("INVALID_QUERY");
    });

    it("rejects a vector of the wrong dimension", async () => {
      const res = await request(app).post("/vectors/query").send({ vector: [0.1, 0.2, 0.3] });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("DIMENSION_MISMATCH");
      expect(res.body.error.details).toEqual({ expected: DIM, actual: 3, index: 0 });
    });
  });

  describe("vectors", () => {
    it("upserts raw points and deletes every page of them", async () => {
      const upsert = await request(app)
        .post("/vectors/upsert")
        .send({ points: docPoints("doc-r", 5) });
      expect(upsert.body.data).toEqual({ namespace: "default", count: 5 });

      const first = await request(app).post("/vectors/delete_by_document").send({ documentId: "doc-r" });
      expect(first.body.data).toEqual({ documentId: "doc-r", namespace: "default", deleted: 5, pages: 3 });

      const again = await request(app).post("/vectors/delete_by_document").send({ documentId: "doc-r" });
      expect(again.body.data).toEqual({ documentId: "doc-r", namespace: "default", deleted: 0, pages: 0 });
    });

    it("retries an interrupted delete and reports the total", async () => {
      const flaky = buildApp({ vectorStore: new FlakyVectorStore(2) });
      await request(flaky).post("/vectors/upsert").send({ points: docPoints("doc-r", 5) });

      const res = await request(flaky).post("/vectors/delete_by_document").send({ documentId: "doc-r" });

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({ documentId: "doc-r", namespace: "default", deleted: 5, pages: 2 });
    });

    it("reports the partial count when retries are exhausted", async () => {
      const flaky = buildApp({ vectorStore: new FlakyVectorStore(2) }, { DELETE_MAX_RETRIES: "0" });
      await request(flaky).post("/vectors/upsert").send({ points: docPoints("doc-r", 5) });

      const res = await request(flaky).post("/vectors/delete_by_document").send({ documentId: "doc-r" });

      expect(res.status).toBe(502);
      expect(res.body.error.code).toBe("PARTIAL_DELETE");
      expect(res.body.error.details).toEqual({ documentId: "doc-r", namespace: "default", deleted: 2 });
    });

    it("rejects points without a document id", async () => {
      const res = await request(app)
        .post("/vectors/upsert")
        .send({ points: [{ id: "p1", values: unitVector(0), metadata: {} }] });

      expect(res.status).toBe(400);
      expect(res.body.error.code).toBe("VALIDATION_ERROR");
    });
  });

  it("returns 404 for unknown routes", async () => {
    const res = await request(app).get("/nope");

    expect(res.status).toBe(404);
    expect(res.body.error).toMatchObject({ code: "NOT_FOUND", message: "Route GET /nope not found" });
  });
});
