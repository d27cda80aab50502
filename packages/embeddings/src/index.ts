export type {
  IEmbeddingProvider,
  EmbedOptions,
  EmbeddingInputType,
} from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { BgeM3EmbeddingProvider } from "./bge-m3-provider.js";
export type { BgeM3ProviderConfig } from "./bge-m3-provider.js";
export { HashingEmbeddingProvider, tokenize } from "./hashing-provider.js";
export { createEmbeddingProvider } from "./factory.js";
