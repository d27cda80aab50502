import OpenAI from "openai";
import type { EmbeddingResult } from "@ragsync/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { toProviderError } from "./provider-error.js";

const DEFAULT_MODEL = "text-embedding-3-small";
const DEFAULT_TIMEOUT_MS = 30_000;
const BATCH_SIZE = 2048; // OpenAI input array limit

export interface OpenAIProviderConfig {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
}

/**
 * OpenAI text-embedding-3 models. The requested dimension is passed through
 * as the `dimensions` parameter so the model shortens its output server-side.
 */
export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "openai";
  readonly maxBatchSize = BATCH_SIZE;
  private client: OpenAI;
  private model: string;

  constructor(config: OpenAIProviderConfig) {
    this.client = new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxRetries: 0,
    });
    this.model = config.model ?? DEFAULT_MODEL;
  }

  async embed(texts: string[], dimensions: number): Promise<EmbeddingResult> {
    if (texts.length === 0) {
      return { embeddings: [], model: this.model, tokensUsed: 0, dimensions };
    }

    try {
      const response = await this.client.embeddings.create({
        model: this.model,
        input: texts,
        dimensions,
      });

      const embeddings = [...response.data]
        .sort((a, b) => a.index - b.index)
        .map((item) => item.embedding);

      return {
        embeddings,
        model: response.model,
        tokensUsed: response.usage.total_tokens,
        dimensions,
      };
    } catch (err) {
      throw toProviderError(this.name, err);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.retrieve(this.model);
      return true;
    } catch {
      return false;
    }
  }
}
