import { z } from "zod";
import type { AppConfig } from "@ragsync/types";

const intFromString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

const nonNegativeIntFromString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().nonnegative());

/**
 * Zod schema for all environment variables defined in .env.example.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: intFromString("8000"),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Embeddings ----------
    EMBEDDING_PROVIDER: z.enum(["openai", "cohere", "bge-m3", "hashing"]).default("openai"),
    EMBED_DIM: intFromString("512"),
    EMBED_BATCH_SIZE: intFromString("96"),
    OPENAI_API_KEY: z.string().optional(),
    OPENAI_EMBED_MODEL: z.string().default("text-embedding-3-small"),
    COHERE_API_KEY: z.string().optional(),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),
    BGE_M3_URL: z.string().url().optional(),

    // ---------- Vector store ----------
    VECTOR_STORE: z.enum(["pinecone", "qdrant", "memory"]).default("pinecone"),
    PINECONE_API_KEY: z.string().optional(),
    PINECONE_INDEX: z.string().min(1).default("rag-main"),
    PINECONE_ENDPOINT: z.string().min(1).optional(),
    QDRANT_URL: z.string().url().optional(),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("rag-main"),
    RAG_NAMESPACE: z.string().trim().min(1).default("default"),

    // ---------- Indexing ----------
    CHUNK_STRATEGY: z.enum(["boundary", "fixed"]).default("boundary"),
    CHUNK_SIZE: intFromString("1000"),
    CHUNK_OVERLAP: nonNegativeIntFromString("0"),
    CHUNK_LOOKBACK: nonNegativeIntFromString("200"),
    CHUNK_UNIT: z.enum(["chars", "tokens"]).default("chars"),
    DEFAULT_TOP_K: intFromString("10"),
    DELETE_PAGE_SIZE: intFromString("100"),
    DELETE_MAX_RETRIES: nonNegativeIntFromString("2"),
    UPSTREAM_TIMEOUT_MS: intFromString("30000"),

    // ---------- HTTP ----------
    MAX_UPLOAD_BYTES: intFromString(String(20 * 1024 * 1024)),
    CORS_ORIGINS: z
      .string()
      .default("*")
      .transform((val) =>
        val.trim() === "*" ? ("*" as const) : val.split(",").map((origin) => origin.trim()),
      ),
  })
  .superRefine((env, ctx) => {
    const requireKey = (key: keyof typeof env, reason: string): void => {
      const value = env[key];
      if (value === undefined || value === "") {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `${key} is required when ${reason}`,
        });
      }
    };

    if (env.EMBEDDING_PROVIDER === "openai") requireKey("OPENAI_API_KEY", "EMBEDDING_PROVIDER=openai");
    if (env.EMBEDDING_PROVIDER === "cohere") requireKey("COHERE_API_KEY", "EMBEDDING_PROVIDER=cohere");
    if (env.EMBEDDING_PROVIDER === "bge-m3") requireKey("BGE_M3_URL", "EMBEDDING_PROVIDER=bge-m3");
    if (env.VECTOR_STORE === "pinecone") requireKey("PINECONE_API_KEY", "VECTOR_STORE=pinecone");
    if (env.VECTOR_STORE === "qdrant") requireKey("QDRANT_URL", "VECTOR_STORE=qdrant");

    if (env.CHUNK_OVERLAP >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_OVERLAP"],
        message: "CHUNK_OVERLAP must be smaller than CHUNK_SIZE",
      });
    }
    if (env.CHUNK_LOOKBACK >= env.CHUNK_SIZE) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["CHUNK_LOOKBACK"],
        message: "CHUNK_LOOKBACK must be smaller than CHUNK_SIZE",
      });
    }
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  // `KEY=` lines in .env files arrive as empty strings; treat them as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
  );
  const parsed = envSchema.parse(present);
  const timeoutMs = parsed.UPSTREAM_TIMEOUT_MS;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    logLevel: parsed.LOG_LEVEL,

    embedding: {
      provider: parsed.EMBEDDING_PROVIDER,
      dimensions: parsed.EMBED_DIM,
      batchSize: parsed.EMBED_BATCH_SIZE,
      timeoutMs,
      openai: {
        apiKey: parsed.OPENAI_API_KEY ?? "",
        model: parsed.OPENAI_EMBED_MODEL,
      },
      cohere: {
        apiKey: parsed.COHERE_API_KEY ?? "",
        model: parsed.COHERE_EMBED_MODEL,
      },
      bgeM3: {
        baseUrl: parsed.BGE_M3_URL ?? "",
      },
    },

    vectorStore: {
      type: parsed.VECTOR_STORE,
      timeoutMs,
      pinecone: {
        apiKey: parsed.PINECONE_API_KEY ?? "",
        indexName: parsed.PINECONE_INDEX,
        host: parsed.PINECONE_ENDPOINT,
      },
      qdrant: {
        url: parsed.QDRANT_URL ?? "",
        apiKey: parsed.QDRANT_API_KEY,
        collectionName: parsed.QDRANT_COLLECTION,
      },
    },

    indexing: {
      embedDim: parsed.EMBED_DIM,
      defaultNamespace: parsed.RAG_NAMESPACE,
      indexName: parsed.VECTOR_STORE === "qdrant" ? parsed.QDRANT_COLLECTION : parsed.PINECONE_INDEX,
      chunking: {
        strategy: parsed.CHUNK_STRATEGY,
        maxSize: parsed.CHUNK_SIZE,
        overlap: parsed.CHUNK_OVERLAP,
        lookBack: parsed.CHUNK_LOOKBACK,
        unit: parsed.CHUNK_UNIT,
      },
      embedBatchSize: parsed.EMBED_BATCH_SIZE,
      defaultTopK: parsed.DEFAULT_TOP_K,
      deletePageSize: parsed.DELETE_PAGE_SIZE,
      deleteMaxRetries: parsed.DELETE_MAX_RETRIES,
    },

    http: {
      corsOrigins: parsed.CORS_ORIGINS,
      maxUploadBytes: parsed.MAX_UPLOAD_BYTES,
    },
  };
}
