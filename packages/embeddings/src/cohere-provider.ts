import { CohereClient } from "cohere-ai";
import type { EmbeddingResult } from "@ragsync/types";
import type { EmbedOptions, IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-error.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_TIMEOUT_MS = 30_000;
const HEALTH_CHECK_DIMENSIONS = 256;
const BATCH_SIZE = 96; // Cohere limit
// v3 models have one fixed size and reject outputDimension
const FIXED_DIMENSION_MODEL = /-v3\./;

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

/**
 * Cohere v2 embed. embed-v4 models are asked for the index dimension
 * (256, 512, 1024 or 1536); v3 models return their native size, which the
 * dimension contract in core checks.
 */
export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "cohere";
  readonly maxBatchSize = BATCH_SIZE;
  private client: CohereClient;
  private model: string;
  private timeoutInSeconds: number;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.timeoutInSeconds = Math.ceil((config.timeoutMs ?? DEFAULT_TIMEOUT_MS) / 1000);
  }

  async embed(texts: string[], dimensions: number, options?: EmbedOptions): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions };
    }

    try {
      const response = await this.client.v2.embed(
        {
          texts,
          model: this.model,
          inputType: options?.inputType === "query" ? "search_query" : "search_document",
          embeddingTypes: ["float"],
          ...(FIXED_DIMENSION_MODEL.test(this.model) ? {} : { outputDimension: dimensions }),
        },
        { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 },
      );

      const embeddings = response.embeddings.float ?? [];

      return {
        embeddings,
        model: this.model,
        // Use actual tokensUsed from Cohere response for billing accuracy
        tokensUsed: response.meta?.billedUnits?.inputTokens ?? 0,
        dimensions: embeddings[0]?.length ?? dimensions,
      };
    } catch (err) {
      throw toProviderError(this.name, err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      const result = await this.embed(["health check"], HEALTH_CHECK_DIMENSIONS);
      return result.embeddings.length === 1;
    } catch {
      return false;
    }
  }
}
