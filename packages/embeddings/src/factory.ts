import type { EmbeddingConfig } from "@ragsync/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider } from "./openai-provider.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
import { HashingEmbeddingProvider } from "./hashing-provider.js";

export function createEmbeddingProvider(config: EmbeddingConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai.apiKey) {
        throw new Error("OpenAI API key is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider({ ...config.openai, timeoutMs: config.timeoutMs });
    case "cohere":
      if (!config.cohere.apiKey) {
        throw new Error("Cohere API key is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider({ ...config.cohere, timeoutMs: config.timeoutMs });
    case "bge-m3":
      if (!config.bgeM3.baseUrl) {
        throw new Error("BGE-M3 base URL is required when provider is 'bge-m3'");
      }
      return new BgeM3EmbeddingProvider({ ...config.bgeM3, timeoutMs: config.timeoutMs });
    case "hashing":
      return new HashingEmbeddingProvider();
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
