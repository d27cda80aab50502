import { createChunker } from "@ragsync/chunker";
import { IndexingOrchestrator, RetrievalOrchestrator } from "@ragsync/core";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@ragsync/embeddings";
import type { Logger } from "@ragsync/logger";
import { TextNormalizer } from "@ragsync/parser";
import type { AppConfig } from "@ragsync/types";
import { createVectorStore, type IVectorStore } from "@ragsync/vector-store";

const DEFAULT_DELETE_RETRY_DELAY_MS = 250;

/** Everything a request handler needs, built once at startup. */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  normalizer: TextNormalizer;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  indexing: IndexingOrchestrator;
  retrieval: RetrievalOrchestrator;
  deleteRetryDelayMs: number;
}

export interface ContextOverrides {
  embeddingProvider?: IEmbeddingProvider;
  vectorStore?: IVectorStore;
  normalizer?: TextNormalizer;
  deleteRetryDelayMs?: number;
}

export function buildContext(config: AppConfig, logger: Logger, overrides: ContextOverrides = {}): AppContext {
  const embeddingProvider = overrides.embeddingProvider ?? createEmbeddingProvider(config.embedding);
  const vectorStore = overrides.vectorStore ?? createVectorStore(config.vectorStore);
  const normalizer = overrides.normalizer ?? new TextNormalizer();

  const indexing = new IndexingOrchestrator({
    config: config.indexing,
    chunker: createChunker(config.indexing.chunking.strategy),
    embeddingProvider,
    vectorStore,
    normalizer,
    logger: logger.child({ component: "indexing" }),
  });

  const retrieval = new RetrievalOrchestrator({
    config: config.indexing,
    embeddingProvider,
    vectorStore,
    logger: logger.child({ component: "retrieval" }),
  });

  return {
    config,
    logger,
    normalizer,
    embeddingProvider,
    vectorStore,
    indexing,
    retrieval,
    deleteRetryDelayMs: overrides.deleteRetryDelayMs ?? DEFAULT_DELETE_RETRY_DELAY_MS,
  };
}
