import type { EmbeddingResult } from "@ragsync/types";

/** Providers that distinguish stored passages from search queries use this hint. */
export type EmbeddingInputType = "document" | "query";

export interface EmbedOptions {
  inputType?: EmbeddingInputType;
}

export interface IEmbeddingProvider {
  readonly name: string;
  /** Largest number of texts accepted by a single `embed` call. */
  readonly maxBatchSize: number;

  /**
   * Returns one vector per input text, in input order. Upstream failures
   * surface as ProviderError.
   */
  embed(texts: string[], dimensions: number, options?: EmbedOptions): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
