import type { ChunkingConfig } from "./chunk.js";

export type EmbeddingProviderName = "openai" | "cohere" | "bge-m3" | "hashing";

export type VectorStoreName = "pinecone" | "qdrant" | "memory";

export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  port: number;
  logLevel: "debug" | "info" | "warn" | "error";
  embedding: EmbeddingConfig;
  vectorStore: VectorStoreConfig;
  indexing: IndexingConfig;
  http: HttpConfig;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  dimensions: number;
  batchSize: number;
  timeoutMs: number;
  openai: OpenAIConfig;
  cohere: CohereConfig;
  bgeM3: BgeM3Config;
}

export interface OpenAIConfig {
  apiKey: string;
  model: string;
}

export interface CohereConfig {
  apiKey: string;
  model: string;
}

export interface BgeM3Config {
  baseUrl: string;
}

export interface VectorStoreConfig {
  type: VectorStoreName;
  timeoutMs: number;
  pinecone: PineconeConfig;
  qdrant: QdrantConfig;
}

export interface PineconeConfig {
  apiKey: string;
  indexName: string;
  host?: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collectionName: string;
}

/**
 * Settings the orchestrators need. Passed in at construction so that several
 * indices can live in one process.
 */
export interface IndexingConfig {
  embedDim: number;
  defaultNamespace: string;
  indexName: string;
  chunking: ChunkingConfig;
  embedBatchSize: number;
  defaultTopK: number;
  deletePageSize: number;
  deleteMaxRetries: number;
}

export interface HttpConfig {
  corsOrigins: string[] | "*";
  maxUploadBytes: number;
}
