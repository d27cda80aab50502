import { InvalidQueryError, ProviderError } from "@ragsync/errors";
import type { IEmbeddingProvider } from "@ragsync/embeddings";
import { createSilentLogger, type Logger } from "@ragsync/logger";
import type { IndexingConfig, QueryRequest, QueryResult } from "@ragsync/types";
import type { IVectorStore } from "@ragsync/vector-store";
import { assertVectorDimensions } from "./dimension-contract.js";
import { embedInBatches } from "./embed-batches.js";
import { validateMetadataFilter } from "./filter-validator.js";
import { resolveNamespace, resolveTopK } from "./namespace.js";

export interface RetrievalDependencies {
  config: IndexingConfig;
  embeddingProvider: IEmbeddingProvider;
  vectorStore: IVectorStore;
  logger?: Logger;
}

/**
 * Retrieval: Validate -> Embed (text queries) -> Check dimensions -> Query.
 *
 * All request validation happens before any upstream call. Matches come back
 * exactly as the store ranked and scored them.
 */
export class RetrievalOrchestrator {
  private readonly config: IndexingConfig;
  private readonly embeddingProvider: IEmbeddingProvider;
  private readonly vectorStore: IVectorStore;
  private readonly logger: Logger;

  constructor(deps: RetrievalDependencies) {
    this.config = deps.config;
    this.embeddingProvider = deps.embeddingProvider;
    this.vectorStore = deps.vectorStore;
    this.logger = deps.logger ?? createSilentLogger();
  }

  async query(request: QueryRequest): Promise<QueryResult> {
    const namespace = resolveNamespace(request.namespace, this.config.defaultNamespace);
    const text = request.text?.trim() ? request.text : undefined;
    const { vector: suppliedVector } = request;

    if (text !== undefined && suppliedVector !== undefined) {
      throw new InvalidQueryError("Provide either text or vector, not both");
    }
    const filter = request.filter === undefined ? undefined : validateMetadataFilter(request.filter);
    const topK = resolveTopK(request.topK, this.config.defaultTopK);

    let vector: number[];
    if (suppliedVector !== undefined) {
      vector = suppliedVector;
    } else if (text !== undefined) {
      vector = await this.embedQuery(text);
    } else {
      throw new InvalidQueryError("Provide either text or vector");
    }
    assertVectorDimensions([vector], this.config.embedDim);

    const start = Date.now();
    const matches = await this.vectorStore.query(namespace, {
      vector,
      topK,
      filter,
      includeValues: request.includeValues ?? false,
      includeMetadata: request.includeMetadata ?? true,
    });

    this.logger.debug(
      { namespace, topK, matches: matches.length, queryTimeMs: Date.now() - start },
      "Query completed",
    );
    return { namespace, matches };
  }

  private async embedQuery(text: string): Promise<number[]> {
    const embedded = await embedInBatches(this.embeddingProvider, [text], {
      dimensions: this.config.embedDim,
      batchSize: 1,
      inputType: "query",
    });
    const [vector] = embedded.embeddings;
    if (vector === undefined) {
      throw new ProviderError("Failed to generate embedding for query", this.embeddingProvider.name);
    }
    return vector;
  }
}
